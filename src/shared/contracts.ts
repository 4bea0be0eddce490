export type HotSwapPhase =
  | 'idle'
  | 'validating'
  | 'staging'
  | 'backing-up'
  | 'replacing'
  | 'reloading'
  | 'verifying'
  | 'succeeded'
  | 'rolled-back'
  | 'failed';

export type HotSwapTerminalPhase = Extract<HotSwapPhase, 'idle' | 'succeeded' | 'rolled-back' | 'failed'>;

export type HotSwapErrorCode =
  | 'validation_failed'
  | 'staging_failed'
  | 'backup_failed'
  | 'replace_failed'
  | 'reload_failed'
  | 'rollback_failed'
  | 'busy'
  | 'cancelled';

export interface HotSwapConfig {
  namespace: string;
  modulePrefix: string | null;
  entryPointFile: string;
  minUiSurfaces: number;
  minCommands: number;
  settingsProbeField: string | null;
  reverifyDelayMs: number;
  reconfigureDelayMs: number;
}

export interface HotSwapRequest {
  artifactPath: string;
  version?: string | null;
  signal?: AbortSignal;
}

export interface ReadinessReport {
  ready: boolean;
  detail: string;
  uiSurfaces: number;
  commands: number;
  version: string | null;
}

export type ReloadOutcome = { status: 'reloaded' } | { status: 'evicted'; reason: string };

export interface ReloadReport {
  prefix: string;
  discovered: number;
  reloaded: number;
  outcomes: Record<string, ReloadOutcome>;
}

export interface HotSwapResult {
  ok: boolean;
  phase: HotSwapTerminalPhase;
  message: string;
  errorCode: HotSwapErrorCode | null;
  version: string | null;
  backupPath: string | null;
  manualRecoveryRequired: boolean;
  cancelled: boolean;
  reload: ReloadReport | null;
  readiness: ReadinessReport | null;
}

export interface HotSwapAttemptRecord {
  artifactPath: string;
  targetVersion: string | null;
  phase: HotSwapTerminalPhase;
  errorCode: HotSwapErrorCode | null;
  message: string;
  retainedBackupPath: string | null;
  startedAt: string;
  finishedAt: string;
}

export type HostNotificationLevel = 'info' | 'warning' | 'error';

export interface HostNotification {
  level: HostNotificationLevel;
  message: string;
}

export interface ExtensionMetadata {
  name: string;
  version: string;
  description?: string;
}

export type SessionSettings = Record<string, unknown>;

export interface HotReloadResult {
  ok: boolean;
  message: string;
  reload: ReloadReport | null;
}
