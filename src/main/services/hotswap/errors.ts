import type { HotSwapErrorCode } from '@shared/contracts';

export class HotSwapError extends Error {
  constructor(
    readonly code: HotSwapErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends HotSwapError {
  constructor(message: string) {
    super('validation_failed', message);
  }
}

export class StagingError extends HotSwapError {
  constructor(message: string, cause?: unknown) {
    super('staging_failed', message, { cause });
  }
}

export class BackupError extends HotSwapError {
  constructor(message: string, cause?: unknown) {
    super('backup_failed', message, { cause });
  }
}

export class ReplaceError extends HotSwapError {
  constructor(message: string, cause?: unknown) {
    super('replace_failed', message, { cause });
  }
}

export class ReloadError extends HotSwapError {
  constructor(
    readonly unitId: string,
    cause: unknown
  ) {
    super('reload_failed', `Falha ao recarregar ${unitId}: ${describeError(cause)}`, { cause });
  }
}

export class RollbackError extends HotSwapError {
  constructor(
    readonly backupPath: string | null,
    cause: unknown
  ) {
    super(
      'rollback_failed',
      backupPath
        ? `manual recovery required, backup retained at ${backupPath}`
        : 'manual recovery required, no backup was taken for this install',
      { cause }
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
