import fs from 'node:fs';
import path from 'node:path';
import type { HotSwapAttemptRecord, HotSwapErrorCode, HotSwapTerminalPhase } from '@shared/contracts';

interface PersistedAttemptFile {
  last: HotSwapAttemptRecord | null;
}

export class HotSwapAttemptStore {
  private readonly filePath: string;
  private cache: HotSwapAttemptRecord | null;

  constructor(baseDir: string) {
    const updateDir = path.join(baseDir, 'updates');
    fs.mkdirSync(updateDir, { recursive: true });
    this.filePath = path.join(updateDir, 'hotswap-attempt.json');
    this.cache = this.load();
  }

  get(): HotSwapAttemptRecord | null {
    return this.cache ? { ...this.cache } : null;
  }

  set(record: HotSwapAttemptRecord): HotSwapAttemptRecord | null {
    this.cache = normalizeRecord(record);
    this.persist(this.cache);
    return this.get();
  }

  clear(): void {
    this.cache = null;
    this.persist(null);
  }

  private load(): HotSwapAttemptRecord | null {
    if (!fs.existsSync(this.filePath)) {
      this.persist(null);
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      const last = parsed && typeof parsed === 'object' ? Reflect.get(parsed, 'last') : null;
      const normalized = normalizeRecord(last);
      this.persist(normalized);
      return normalized;
    } catch {
      this.persist(null);
      return null;
    }
  }

  private persist(last: HotSwapAttemptRecord | null): void {
    const payload: PersistedAttemptFile = { last };
    fs.writeFileSync(this.filePath, JSON.stringify(payload, null, 2), 'utf8');
  }
}

function normalizeRecord(value: unknown): HotSwapAttemptRecord | null {
  if (!value || typeof value !== 'object') {
    return null;
  }

  const field = (key: keyof HotSwapAttemptRecord): unknown => Reflect.get(value, key);
  const artifactPath = field('artifactPath');
  const targetVersion = field('targetVersion');
  const phase = field('phase');
  const errorCode = field('errorCode');
  const message = field('message');
  const retainedBackupPath = field('retainedBackupPath');
  const startedAt = field('startedAt');
  const finishedAt = field('finishedAt');

  if (
    typeof artifactPath !== 'string' ||
    !isNullableString(targetVersion) ||
    !isTerminalPhase(phase) ||
    !isNullableErrorCode(errorCode) ||
    typeof message !== 'string' ||
    !isNullableString(retainedBackupPath) ||
    !isTimestamp(startedAt) ||
    !isTimestamp(finishedAt)
  ) {
    return null;
  }

  return {
    artifactPath,
    targetVersion,
    phase,
    errorCode,
    message,
    retainedBackupPath,
    startedAt: new Date(startedAt).toISOString(),
    finishedAt: new Date(finishedAt).toISOString()
  };
}

function isTerminalPhase(value: unknown): value is HotSwapTerminalPhase {
  return value === 'idle' || value === 'succeeded' || value === 'rolled-back' || value === 'failed';
}

function isNullableErrorCode(value: unknown): value is HotSwapErrorCode | null {
  return (
    value === null ||
    value === 'validation_failed' ||
    value === 'staging_failed' ||
    value === 'backup_failed' ||
    value === 'replace_failed' ||
    value === 'reload_failed' ||
    value === 'rollback_failed' ||
    value === 'busy' ||
    value === 'cancelled'
  );
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isTimestamp(value: unknown): value is string {
  return typeof value === 'string' && Number.isFinite(Date.parse(value));
}
