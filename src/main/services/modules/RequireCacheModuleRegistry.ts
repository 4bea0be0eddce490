import { createRequire } from 'node:module';
import type { LoadableModuleRegistry } from '@main/services/modules/ModuleRegistry';

/**
 * Registro sobre o `require.cache` do CommonJS. Identidades sao caminhos absolutos,
 * entao o prefixo natural de uma extensao e o seu diretorio de instalacao.
 */
export class RequireCacheModuleRegistry implements LoadableModuleRegistry {
  private readonly requireFn: NodeRequire;

  constructor(requireFn?: NodeRequire) {
    this.requireFn = requireFn ?? createRequire(__filename);
  }

  list(prefix: string): string[] {
    return Object.keys(this.requireFn.cache).filter((id) => id.startsWith(prefix));
  }

  has(id: string): boolean {
    return this.requireFn.cache[id] !== undefined;
  }

  get(id: string): unknown {
    return this.requireFn.cache[id]?.exports;
  }

  load(id: string): unknown {
    return this.requireFn(id);
  }

  reload(id: string): void {
    if (!this.has(id)) {
      throw new Error(`Modulo nao carregado: ${id}`);
    }

    delete this.requireFn.cache[id];
    this.requireFn(id);
  }

  evict(id: string): boolean {
    if (!this.has(id)) {
      return false;
    }

    delete this.requireFn.cache[id];
    return true;
  }
}
