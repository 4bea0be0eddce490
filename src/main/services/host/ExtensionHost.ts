import type { ExtensionMetadata, SessionSettings } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';

/** Consultas somente leitura que o verificador de prontidao faz ao host. */
export interface HostCapabilityRegistry {
  listUiSurfaces(prefix: string): string[];
  listCommands(prefix: string): string[];
  getMetadata(namespace: string): ExtensionMetadata | null;
  getSessionSettings(namespace: string): SessionSettings | null;
}

export interface ExtensionEntryModule {
  metadata?: ExtensionMetadata;
  register?: (host: ExtensionHost) => void;
  unregister?: (host: ExtensionHost) => void;
}

export class ExtensionHost implements HostCapabilityRegistry {
  private readonly uiSurfaces = new Set<string>();
  private readonly commands = new Set<string>();
  private readonly metadata = new Map<string, ExtensionMetadata>();
  private readonly sessionSettings = new Map<string, SessionSettings>();
  private readonly active = new Map<string, ExtensionEntryModule>();

  constructor(private readonly logger?: LogSink) {}

  registerUiSurface(id: string): void {
    this.uiSurfaces.add(requireId(id, 'UI surface'));
  }

  unregisterUiSurface(id: string): void {
    this.uiSurfaces.delete(id);
  }

  registerCommand(id: string): void {
    this.commands.add(requireId(id, 'comando'));
  }

  unregisterCommand(id: string): void {
    this.commands.delete(id);
  }

  setMetadata(namespace: string, metadata: ExtensionMetadata): void {
    this.metadata.set(namespace, { ...metadata });
  }

  attachSessionSettings(namespace: string, settings: SessionSettings): void {
    this.sessionSettings.set(namespace, settings);
  }

  detachSessionSettings(namespace: string): void {
    this.sessionSettings.delete(namespace);
  }

  listUiSurfaces(prefix: string): string[] {
    return [...this.uiSurfaces].filter((id) => id.startsWith(prefix)).sort();
  }

  listCommands(prefix: string): string[] {
    return [...this.commands].filter((id) => id.startsWith(prefix)).sort();
  }

  getMetadata(namespace: string): ExtensionMetadata | null {
    return this.metadata.get(namespace) ?? null;
  }

  getSessionSettings(namespace: string): SessionSettings | null {
    return this.sessionSettings.get(namespace) ?? null;
  }

  /**
   * Ativa (ou reativa) o modulo de entrada de uma extensao. Registros anteriores do
   * namespace sao removidos antes, para que um modulo recarregado nao duplique nada.
   * Settings de sessao sobrevivem a reativacao.
   */
  activate(namespace: string, entry: unknown): void {
    if (!isEntryModule(entry)) {
      throw new Error(`Modulo de entrada de ${namespace} nao exporta register/metadata.`);
    }

    this.deactivate(namespace, { keepSettings: true });
    if (entry.metadata) {
      this.setMetadata(namespace, entry.metadata);
    }
    entry.register?.(this);
    this.active.set(namespace, entry);
    this.logger?.info('host.extension.activated', {
      namespace,
      version: entry.metadata?.version ?? null,
      uiSurfaces: this.listUiSurfaces(capabilityPrefix(namespace)).length,
      commands: this.listCommands(capabilityPrefix(namespace)).length
    });
  }

  deactivate(namespace: string, options?: { keepSettings?: boolean }): void {
    const previous = this.active.get(namespace);
    if (previous?.unregister) {
      try {
        previous.unregister(this);
      } catch (error) {
        this.logger?.warn('host.extension.unregister_error', {
          namespace,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }

    this.active.delete(namespace);
    this.metadata.delete(namespace);
    for (const id of this.listUiSurfaces(capabilityPrefix(namespace))) {
      this.uiSurfaces.delete(id);
    }
    for (const id of this.listCommands(capabilityPrefix(namespace))) {
      this.commands.delete(id);
    }
    if (!options?.keepSettings) {
      this.sessionSettings.delete(namespace);
    }
  }

  isActive(namespace: string): boolean {
    return this.active.has(namespace);
  }
}

function requireId(id: string, kind: string): string {
  const normalized = typeof id === 'string' ? id.trim() : '';
  if (!normalized) {
    throw new Error(`Identificador de ${kind} vazio.`);
  }
  return normalized;
}

function isEntryModule(value: unknown): value is ExtensionEntryModule {
  if (!value || typeof value !== 'object') {
    return false;
  }

  const register: unknown = Reflect.get(value, 'register');
  const unregister: unknown = Reflect.get(value, 'unregister');
  const metadata: unknown = Reflect.get(value, 'metadata');
  if (register !== undefined && typeof register !== 'function') {
    return false;
  }
  if (unregister !== undefined && typeof unregister !== 'function') {
    return false;
  }
  if (metadata !== undefined && !isMetadata(metadata)) {
    return false;
  }
  return register !== undefined || metadata !== undefined;
}

function isMetadata(value: unknown): value is ExtensionMetadata {
  return (
    !!value &&
    typeof value === 'object' &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'version') === 'string'
  );
}

/** Ids de UI surfaces e comandos de uma extensao comecam por `<namespace>.`. */
export function capabilityPrefix(namespace: string): string {
  return `${namespace}.`;
}
