/**
 * Registro vivo das unidades de codigo carregadas no processo host.
 * Identidades sao strings opacas; a consulta por prefixo atribui unidades a uma extensao.
 */
export interface ModuleRegistry {
  list(prefix: string): string[];
  has(id: string): boolean;
  get(id: string): unknown;
  /** Reexecuta a unidade. Pode lancar; quem chama decide se remove a unidade. */
  reload(id: string): void;
  /** Remove a unidade carregada, forcando carga nova na proxima referencia. */
  evict(id: string): boolean;
}

export interface LoadableModuleRegistry extends ModuleRegistry {
  load(id: string): unknown;
}
