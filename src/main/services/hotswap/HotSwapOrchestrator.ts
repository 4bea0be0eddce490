import fs from 'node:fs';
import path from 'node:path';
import type {
  HostNotification,
  HotReloadResult,
  HotSwapErrorCode,
  HotSwapPhase,
  HotSwapRequest,
  HotSwapResult,
  HotSwapTerminalPhase,
  ReadinessReport,
  ReloadReport
} from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';
import type { ArchiveExtractor } from '@main/services/hotswap/ArchiveExtractor';
import type { ArtifactValidator } from '@main/services/hotswap/ArtifactValidator';
import type { BackupManager } from '@main/services/hotswap/BackupManager';
import type { ExtensionInstaller } from '@main/services/hotswap/ExtensionInstaller';
import type { HotSwapAttemptStore } from '@main/services/hotswap/HotSwapAttemptStore';
import type { ModuleReloader } from '@main/services/hotswap/ModuleReloader';
import type { ReadinessVerifier } from '@main/services/hotswap/ReadinessVerifier';
import { UpdateLock, processUpdateLock } from '@main/services/hotswap/UpdateLock';
import { RollbackError, describeError } from '@main/services/hotswap/errors';

export type ScheduleFn = (fn: () => void, delayMs: number) => void;

interface HotSwapOrchestratorOptions {
  installDir: string;
  namespace: string;
  modulePrefix?: string | null;
  reverifyDelayMs?: number;
  reconfigureDelayMs?: number;
  logger: LogSink;
  validator: ArtifactValidator;
  extractor: ArchiveExtractor;
  backupManager: BackupManager;
  installer: ExtensionInstaller;
  reloader: ModuleReloader;
  verifier: ReadinessVerifier;
  attemptStore?: HotSwapAttemptStore;
  lock?: UpdateLock;
  schedule?: ScheduleFn;
  notify?: (notification: HostNotification) => void;
  /** Reativa a extensao depois do reload; uma falha aqui dispara rollback. */
  onReloaded?: (report: ReloadReport) => void;
  refreshUi?: () => void;
  reconfigure?: () => void;
  onTransition?: (from: HotSwapPhase, to: HotSwapPhase) => void;
  now?: () => Date;
}

interface Attempt {
  artifactPath: string;
  version: string | null;
  startedAt: string;
  phase: HotSwapPhase;
  backupPath: string | null;
  reload: ReloadReport | null;
  readiness: ReadinessReport | null;
}

const LOCK_HOLDER_APPLY = 'apply-update';
const LOCK_HOLDER_RELOAD = 'hot-reload';

export class HotSwapOrchestrator {
  private readonly installDir: string;
  private readonly stagingDir: string;
  private readonly namespace: string;
  private readonly modulePrefix: string;
  private readonly reverifyDelayMs: number;
  private readonly reconfigureDelayMs: number;
  private readonly logger: LogSink;
  private readonly validator: ArtifactValidator;
  private readonly extractor: ArchiveExtractor;
  private readonly backupManager: BackupManager;
  private readonly installer: ExtensionInstaller;
  private readonly reloader: ModuleReloader;
  private readonly verifier: ReadinessVerifier;
  private readonly attemptStore: HotSwapAttemptStore | null;
  private readonly lock: UpdateLock;
  private readonly schedule: ScheduleFn;
  private readonly notify: ((notification: HostNotification) => void) | null;
  private readonly onReloaded: ((report: ReloadReport) => void) | null;
  private readonly refreshUi: (() => void) | null;
  private readonly reconfigure: (() => void) | null;
  private readonly onTransition: ((from: HotSwapPhase, to: HotSwapPhase) => void) | null;
  private readonly now: () => Date;
  private currentPhase: HotSwapPhase = 'idle';

  constructor(options: HotSwapOrchestratorOptions) {
    this.installDir = path.resolve(options.installDir);
    this.stagingDir = path.join(path.dirname(this.installDir), `${path.basename(this.installDir)}_staging`);
    this.namespace = options.namespace;
    this.modulePrefix = options.modulePrefix ?? options.namespace;
    this.reverifyDelayMs = normalizeDelay(options.reverifyDelayMs, 1000);
    this.reconfigureDelayMs = normalizeDelay(options.reconfigureDelayMs, 1500);
    this.logger = options.logger;
    this.validator = options.validator;
    this.extractor = options.extractor;
    this.backupManager = options.backupManager;
    this.installer = options.installer;
    this.reloader = options.reloader;
    this.verifier = options.verifier;
    this.attemptStore = options.attemptStore ?? null;
    this.lock = options.lock ?? processUpdateLock;
    this.schedule = options.schedule ?? ((fn, delayMs) => void setTimeout(fn, delayMs).unref());
    this.notify = options.notify ?? null;
    this.onReloaded = options.onReloaded ?? null;
    this.refreshUi = options.refreshUi ?? null;
    this.reconfigure = options.reconfigure ?? null;
    this.onTransition = options.onTransition ?? null;
    this.now = options.now ?? (() => new Date());
  }

  get phase(): HotSwapPhase {
    return this.currentPhase;
  }

  get stagingPath(): string {
    return this.stagingDir;
  }

  applyUpdate(request: HotSwapRequest): HotSwapResult {
    const version = normalizeVersion(request.version);
    if (!this.lock.tryAcquire(LOCK_HOLDER_APPLY)) {
      this.logger.warn('hotswap.busy', { artifactPath: request.artifactPath, heldBy: this.lock.heldBy });
      const busy = buildResult({
        phase: 'failed',
        errorCode: 'busy',
        message: 'Ja existe um update em andamento.',
        version
      });
      this.emitNotification(busy);
      return busy;
    }

    const attempt: Attempt = {
      artifactPath: request.artifactPath,
      version,
      startedAt: this.now().toISOString(),
      phase: 'idle',
      backupPath: null,
      reload: null,
      readiness: null
    };

    try {
      this.logger.info('hotswap.start', {
        artifactPath: attempt.artifactPath,
        version,
        installDir: this.installDir,
        namespace: this.namespace
      });

      let result: HotSwapResult;
      try {
        result = this.execute(attempt, request.signal);
      } finally {
        this.cleanupStaging();
      }

      this.currentPhase = 'idle';
      this.recordAttempt(attempt, result);
      this.logSummary(result);
      this.emitNotification(result);
      return result;
    } finally {
      this.lock.release(LOCK_HOLDER_APPLY);
    }
  }

  hotReload(): HotReloadResult {
    if (!this.lock.tryAcquire(LOCK_HOLDER_RELOAD)) {
      this.logger.warn('hotswap.busy', { operation: 'hot-reload', heldBy: this.lock.heldBy });
      return { ok: false, message: 'Ja existe um update em andamento.', reload: null };
    }

    try {
      this.logger.info('hotswap.hot_reload.start', { namespace: this.namespace, modulePrefix: this.modulePrefix });
      const report = this.reloader.reload(this.modulePrefix);

      try {
        this.onReloaded?.(report);
      } catch (error) {
        const reason = describeError(error);
        this.logger.error('hotswap.hot_reload.error', { namespace: this.namespace, reason });
        return { ok: false, message: `Falha ao reativar extensao: ${reason}`, reload: report };
      }

      this.runReconfigure();
      this.logger.info('hotswap.hot_reload.finish', { reloaded: report.reloaded, discovered: report.discovered });
      return { ok: true, message: `Recarregados ${report.reloaded} modulos.`, reload: report };
    } finally {
      this.lock.release(LOCK_HOLDER_RELOAD);
    }
  }

  private execute(attempt: Attempt, signal: AbortSignal | undefined): HotSwapResult {
    if (signal?.aborted) {
      return this.cancel(attempt);
    }

    this.transition(attempt, 'validating');
    const validation = this.validator.validate(attempt.artifactPath);
    if (!validation.ok) {
      return this.fail(attempt, 'validation_failed', validation.reason);
    }

    if (signal?.aborted) {
      return this.cancel(attempt);
    }

    this.transition(attempt, 'staging');
    let extractedRoot: string;
    try {
      extractedRoot = this.extractor.extract(validation.archive, this.stagingDir);
    } catch (error) {
      return this.fail(attempt, 'staging_failed', describeError(error));
    }

    if (signal?.aborted) {
      return this.cancel(attempt);
    }

    if (fs.existsSync(this.installDir)) {
      this.transition(attempt, 'backing-up');
      try {
        attempt.backupPath = this.backupManager.backup(this.installDir);
      } catch (error) {
        return this.fail(attempt, 'backup_failed', describeError(error));
      }
    } else {
      this.logger.info('hotswap.backup.skipped', { reason: 'fresh_install', installDir: this.installDir });
    }

    this.transition(attempt, 'replacing');
    try {
      this.installer.replace(extractedRoot, this.installDir);

      this.transition(attempt, 'reloading');
      attempt.reload = this.reloader.reload(this.modulePrefix);
      this.onReloaded?.(attempt.reload);
      this.runRefreshUi();

      this.transition(attempt, 'verifying');
      attempt.readiness = this.verify(attempt.version);
    } catch (error) {
      return this.rollback(attempt, error);
    }

    if (signal?.aborted) {
      this.logger.warn('hotswap.cancel.ignored', { reason: 'cancel requested after backup started' });
    }

    this.transition(attempt, 'succeeded');
    const retainedBackup = this.discardBackup(attempt.backupPath);
    if (this.reconfigure) {
      this.schedule(() => this.runReconfigure(), this.reconfigureDelayMs);
    }

    return buildResult({
      phase: 'succeeded',
      message: attempt.version ? `Update ${attempt.version} aplicado sem reiniciar o host.` : 'Update aplicado sem reiniciar o host.',
      version: attempt.version,
      backupPath: retainedBackup,
      reload: attempt.reload,
      readiness: attempt.readiness
    });
  }

  private verify(version: string | null): ReadinessReport {
    const readiness = this.verifier.checkReady(this.namespace);
    if (readiness.ready) {
      this.logger.info('hotswap.verify.ready', { detail: readiness.detail });
    } else {
      this.logger.warn('hotswap.verify.unready', { detail: readiness.detail, recheckInMs: this.reverifyDelayMs });
      this.schedule(() => this.recheck(), this.reverifyDelayMs);
    }

    if (version && readiness.version && readiness.version !== version) {
      this.logger.warn('hotswap.verify.version_mismatch', { expected: version, loaded: readiness.version });
    }

    return readiness;
  }

  private recheck(): void {
    const readiness = this.verifier.checkReady(this.namespace);
    if (readiness.ready) {
      this.logger.info('hotswap.verify.recheck_ready', { detail: readiness.detail });
      return;
    }

    this.logger.warn('hotswap.verify.recheck_unready', { detail: readiness.detail });
  }

  private rollback(attempt: Attempt, error: unknown): HotSwapResult {
    const failedPhase = attempt.phase;
    const errorCode: HotSwapErrorCode = failedPhase === 'replacing' ? 'replace_failed' : 'reload_failed';
    const reason = describeError(error);
    this.logger.error('hotswap.phase.error', { phase: failedPhase, code: errorCode, reason });
    this.logger.warn('hotswap.rollback.start', { installDir: this.installDir, backupPath: attempt.backupPath });

    try {
      if (attempt.backupPath) {
        this.backupManager.restore(attempt.backupPath, this.installDir);
      } else {
        fs.rmSync(this.installDir, { recursive: true, force: true });
      }
    } catch (restoreError) {
      const failure = new RollbackError(attempt.backupPath, restoreError);
      this.logger.error('hotswap.rollback.error', {
        backupPath: attempt.backupPath,
        reason: describeError(restoreError),
        code: failure.code
      });
      this.transition(attempt, 'failed');
      return buildResult({
        phase: 'failed',
        errorCode: failure.code,
        message: `${reason}; ${failure.message}`,
        version: attempt.version,
        backupPath: attempt.backupPath,
        manualRecoveryRequired: true,
        reload: attempt.reload,
        readiness: attempt.readiness
      });
    }

    const retainedBackup = this.discardBackup(attempt.backupPath);
    this.reloadRestored();
    this.logger.info('hotswap.rollback.finish', { installDir: this.installDir, restoredFrom: attempt.backupPath });
    this.transition(attempt, 'rolled-back');
    return buildResult({
      phase: 'rolled-back',
      errorCode,
      message: `Update revertido: ${reason}`,
      version: attempt.version,
      backupPath: retainedBackup,
      reload: attempt.reload,
      readiness: attempt.readiness
    });
  }

  private reloadRestored(): void {
    if (!fs.existsSync(this.installDir)) {
      return;
    }

    const report = this.reloader.reload(this.modulePrefix);
    try {
      this.onReloaded?.(report);
    } catch (error) {
      this.logger.error('hotswap.rollback.reactivate_error', { reason: describeError(error) });
    }
  }

  private fail(attempt: Attempt, errorCode: HotSwapErrorCode, reason: string): HotSwapResult {
    this.logger.error('hotswap.phase.error', { phase: attempt.phase, code: errorCode, reason });
    this.transition(attempt, 'failed');
    return buildResult({
      phase: 'failed',
      errorCode,
      message: reason,
      version: attempt.version
    });
  }

  private cancel(attempt: Attempt): HotSwapResult {
    this.logger.info('hotswap.cancelled', { phase: attempt.phase });
    if (attempt.phase !== 'idle') {
      this.transition(attempt, 'idle');
    }
    return buildResult({
      phase: 'idle',
      errorCode: 'cancelled',
      message: 'Update cancelado antes do backup.',
      version: attempt.version,
      cancelled: true
    });
  }

  private transition(attempt: Attempt, next: HotSwapPhase): void {
    const previous = attempt.phase;
    attempt.phase = next;
    this.currentPhase = next;
    this.logger.info('hotswap.phase.enter', { from: previous, to: next });

    if (!this.onTransition) {
      return;
    }
    try {
      this.onTransition(previous, next);
    } catch (error) {
      this.logger.warn('hotswap.phase.listener_error', { to: next, reason: describeError(error) });
    }
  }

  private discardBackup(backupPath: string | null): string | null {
    if (!backupPath) {
      return null;
    }

    try {
      this.backupManager.discard(backupPath);
      return null;
    } catch (error) {
      this.logger.warn('hotswap.backup.discard_error', { backupPath, reason: describeError(error) });
      return backupPath;
    }
  }

  private cleanupStaging(): void {
    try {
      fs.rmSync(this.stagingDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('hotswap.staging.cleanup_error', { stagingDir: this.stagingDir, reason: describeError(error) });
    }
  }

  private runRefreshUi(): void {
    if (!this.refreshUi) {
      return;
    }
    try {
      this.refreshUi();
      this.logger.info('hotswap.ui.refreshed');
    } catch (error) {
      this.logger.warn('hotswap.ui.refresh_error', { reason: describeError(error) });
    }
  }

  private runReconfigure(): void {
    if (!this.reconfigure) {
      return;
    }
    try {
      this.reconfigure();
      this.logger.info('hotswap.reconfigure.finish', { namespace: this.namespace });
    } catch (error) {
      this.logger.error('hotswap.reconfigure.error', { namespace: this.namespace, reason: describeError(error) });
    }
  }

  private recordAttempt(attempt: Attempt, result: HotSwapResult): void {
    if (!this.attemptStore) {
      return;
    }
    try {
      this.attemptStore.set({
        artifactPath: attempt.artifactPath,
        targetVersion: attempt.version,
        phase: result.phase,
        errorCode: result.errorCode,
        message: result.message,
        retainedBackupPath: result.backupPath,
        startedAt: attempt.startedAt,
        finishedAt: this.now().toISOString()
      });
    } catch (error) {
      this.logger.warn('hotswap.attempt.persist_error', { reason: describeError(error) });
    }
  }

  private logSummary(result: HotSwapResult): void {
    const meta = {
      phase: result.phase,
      ok: result.ok,
      version: result.version,
      code: result.errorCode,
      message: result.message,
      backupPath: result.backupPath
    };

    if (result.ok) {
      this.logger.info('hotswap.summary', meta);
    } else if (result.manualRecoveryRequired || result.phase === 'failed') {
      this.logger.error('hotswap.summary', meta);
    } else {
      this.logger.warn('hotswap.summary', meta);
    }
  }

  private emitNotification(result: HotSwapResult): void {
    if (!this.notify) {
      return;
    }
    try {
      this.notify({ level: notificationLevel(result), message: result.message });
    } catch (error) {
      this.logger.warn('hotswap.notify.error', { reason: describeError(error) });
    }
  }
}

function buildResult(input: {
  phase: HotSwapTerminalPhase;
  message: string;
  version: string | null;
  errorCode?: HotSwapErrorCode;
  backupPath?: string | null;
  manualRecoveryRequired?: boolean;
  cancelled?: boolean;
  reload?: ReloadReport | null;
  readiness?: ReadinessReport | null;
}): HotSwapResult {
  return {
    ok: input.phase === 'succeeded',
    phase: input.phase,
    message: input.message,
    errorCode: input.errorCode ?? null,
    version: input.version,
    backupPath: input.backupPath ?? null,
    manualRecoveryRequired: input.manualRecoveryRequired === true,
    cancelled: input.cancelled === true,
    reload: input.reload ?? null,
    readiness: input.readiness ?? null
  };
}

function notificationLevel(result: HotSwapResult): HostNotification['level'] {
  if (result.ok) {
    return 'info';
  }
  return result.phase === 'failed' ? 'error' : 'warning';
}

function normalizeVersion(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function normalizeDelay(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : fallback;
}
