import type { LoadableModuleRegistry } from '@main/services/modules/ModuleRegistry';

export type ModuleLoader = () => unknown;

interface ModuleSlot {
  loader: ModuleLoader;
  loaded: boolean;
  exports: unknown;
}

export class InMemoryModuleRegistry implements LoadableModuleRegistry {
  private readonly slots = new Map<string, ModuleSlot>();

  define(id: string, loader: ModuleLoader): void {
    const current = this.slots.get(id);
    this.slots.set(id, {
      loader,
      loaded: current?.loaded ?? false,
      exports: current?.exports
    });
  }

  load(id: string): unknown {
    const slot = this.slots.get(id);
    if (!slot) {
      throw new Error(`Modulo desconhecido: ${id}`);
    }
    if (!slot.loaded) {
      slot.exports = slot.loader();
      slot.loaded = true;
    }
    return slot.exports;
  }

  list(prefix: string): string[] {
    return [...this.slots.entries()].filter(([id, slot]) => slot.loaded && id.startsWith(prefix)).map(([id]) => id);
  }

  has(id: string): boolean {
    return this.slots.get(id)?.loaded === true;
  }

  get(id: string): unknown {
    const slot = this.slots.get(id);
    return slot?.loaded ? slot.exports : undefined;
  }

  reload(id: string): void {
    const slot = this.slots.get(id);
    if (!slot || !slot.loaded) {
      throw new Error(`Modulo nao carregado: ${id}`);
    }

    slot.exports = slot.loader();
  }

  evict(id: string): boolean {
    const slot = this.slots.get(id);
    if (!slot || !slot.loaded) {
      return false;
    }

    slot.loaded = false;
    slot.exports = undefined;
    return true;
  }
}
