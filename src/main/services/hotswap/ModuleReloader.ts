import type { ReloadOutcome, ReloadReport } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import type { ModuleRegistry } from '@main/services/modules/ModuleRegistry';
import { ReloadError, describeError } from '@main/services/hotswap/errors';

export class ModuleReloader {
  constructor(
    private readonly registry: ModuleRegistry,
    private readonly logger: LogSink
  ) {}

  /**
   * Recarrega, em ordem lexicografica, toda unidade viva cujo id comeca com `prefix`.
   * Uma unidade que falha e removida do registro e registrada como `evicted`; nunca lanca.
   */
  reload(prefix: string): ReloadReport {
    const outcomes: Record<string, ReloadOutcome> = {};
    let discovered: string[] = [];

    try {
      discovered = [...this.registry.list(prefix)].sort();
    } catch (error) {
      this.logger.error('hotswap.reload.discovery_error', { prefix, reason: describeError(error) });
      return { prefix, discovered: 0, reloaded: 0, outcomes };
    }

    let reloaded = 0;
    for (const id of discovered) {
      try {
        this.registry.reload(id);
        outcomes[id] = { status: 'reloaded' };
        reloaded += 1;
      } catch (error) {
        const failure = new ReloadError(id, error);
        outcomes[id] = { status: 'evicted', reason: describeError(error) };
        this.evictQuietly(id);
        this.logger.warn('hotswap.reload.unit_failed', { id, code: failure.code, reason: failure.message });
      }
    }

    this.logger.info('hotswap.reload.finish', { prefix, discovered: discovered.length, reloaded });
    return { prefix, discovered: discovered.length, reloaded, outcomes };
  }

  private evictQuietly(id: string): void {
    try {
      this.registry.evict(id);
    } catch (error) {
      this.logger.error('hotswap.reload.evict_error', { id, reason: describeError(error) });
    }
  }
}
