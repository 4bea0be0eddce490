import path from 'node:path';
import type {
  HostNotification,
  HotReloadResult,
  HotSwapConfig,
  HotSwapRequest,
  HotSwapResult,
  ReadinessReport
} from '@shared/contracts';
import { ConfigStore } from '@main/services/config/ConfigStore';
import { ExtensionHost } from '@main/services/host/ExtensionHost';
import { ArchiveExtractor } from '@main/services/hotswap/ArchiveExtractor';
import { ArtifactValidator } from '@main/services/hotswap/ArtifactValidator';
import { BackupManager } from '@main/services/hotswap/BackupManager';
import { ExtensionInstaller } from '@main/services/hotswap/ExtensionInstaller';
import { HotSwapAttemptStore } from '@main/services/hotswap/HotSwapAttemptStore';
import { HotSwapOrchestrator, type ScheduleFn } from '@main/services/hotswap/HotSwapOrchestrator';
import { ModuleReloader } from '@main/services/hotswap/ModuleReloader';
import { ReadinessVerifier } from '@main/services/hotswap/ReadinessVerifier';
import type { UpdateLock } from '@main/services/hotswap/UpdateLock';
import { Logger, type LogSink } from '@main/services/logging/Logger';
import type { LoadableModuleRegistry } from '@main/services/modules/ModuleRegistry';
import { RequireCacheModuleRegistry } from '@main/services/modules/RequireCacheModuleRegistry';

export interface HotSwapEngineOptions {
  /** Diretorio de dados do motor: logs/, config/ e updates/. */
  baseDir: string;
  installDir: string;
  config?: Partial<HotSwapConfig>;
  host?: ExtensionHost;
  modules?: LoadableModuleRegistry;
  logger?: LogSink;
  logMirrorPath?: string | null;
  lock?: UpdateLock;
  schedule?: ScheduleFn;
  notify?: (notification: HostNotification) => void;
  refreshUi?: () => void;
  reconfigure?: () => void;
}

export interface HotSwapEngine {
  readonly config: HotSwapConfig;
  readonly host: ExtensionHost;
  readonly modules: LoadableModuleRegistry;
  readonly logger: LogSink;
  readonly orchestrator: HotSwapOrchestrator;
  readonly attemptStore: HotSwapAttemptStore;
  /** Carrega o modulo de entrada instalado e registra a extensao no host. */
  activate(): void;
  applyUpdate(request: HotSwapRequest): HotSwapResult;
  hotReload(): HotReloadResult;
  checkReady(): ReadinessReport;
}

export function createHotSwapEngine(options: HotSwapEngineOptions): HotSwapEngine {
  const configStore = new ConfigStore(options.baseDir);
  const config = options.config ? configStore.patch(options.config) : configStore.get();
  const logger = options.logger ?? new Logger(options.baseDir, { mirrorFilePath: options.logMirrorPath ?? null });
  const installDir = path.resolve(options.installDir);
  const modules = options.modules ?? new RequireCacheModuleRegistry();
  const host = options.host ?? new ExtensionHost(logger);
  const modulePrefix = config.modulePrefix ?? `${installDir}${path.sep}`;
  const entryId = path.join(installDir, config.entryPointFile);
  const attemptStore = new HotSwapAttemptStore(options.baseDir);

  const activate = (): void => {
    const entry = modules.has(entryId) ? modules.get(entryId) : modules.load(entryId);
    host.activate(config.namespace, entry);
  };

  const verifier = new ReadinessVerifier({
    modules,
    host,
    minUiSurfaces: config.minUiSurfaces,
    minCommands: config.minCommands,
    modulePrefix,
    settingsProbeField: config.settingsProbeField
  });

  const orchestrator = new HotSwapOrchestrator({
    installDir,
    namespace: config.namespace,
    modulePrefix,
    reverifyDelayMs: config.reverifyDelayMs,
    reconfigureDelayMs: config.reconfigureDelayMs,
    logger,
    validator: new ArtifactValidator({ entryPointFile: config.entryPointFile }),
    extractor: new ArchiveExtractor(config.entryPointFile),
    backupManager: new BackupManager({ logger }),
    installer: new ExtensionInstaller({ logger }),
    reloader: new ModuleReloader(modules, logger),
    verifier,
    attemptStore,
    lock: options.lock,
    schedule: options.schedule,
    notify: options.notify,
    onReloaded: activate,
    refreshUi: options.refreshUi,
    reconfigure: options.reconfigure
  });

  const retained = attemptStore.get();
  if (retained?.retainedBackupPath) {
    logger.warn('hotswap.startup.retained_backup', {
      backupPath: retained.retainedBackupPath,
      phase: retained.phase,
      finishedAt: retained.finishedAt
    });
  }

  return {
    config,
    host,
    modules,
    logger,
    orchestrator,
    attemptStore,
    activate,
    applyUpdate: (request) => orchestrator.applyUpdate(request),
    hotReload: () => orchestrator.hotReload(),
    checkReady: () => verifier.checkReady(config.namespace)
  };
}
