import fs from 'node:fs';
import path from 'node:path';
import type { LogSink } from '@main/services/logging/Logger';
import { BackupError, describeError } from '@main/services/hotswap/errors';

interface BackupManagerOptions {
  logger: LogSink;
  now?: () => Date;
  copyDir?: (from: string, to: string) => void;
  removeDir?: (dir: string) => void;
}

export class BackupManager {
  private readonly logger: LogSink;
  private readonly now: () => Date;
  private readonly copyDir: (from: string, to: string) => void;
  private readonly removeDir: (dir: string) => void;

  constructor(options: BackupManagerOptions) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.copyDir =
      options.copyDir ??
      ((from, to) => fs.cpSync(from, to, { recursive: true, errorOnExist: true, force: false, verbatimSymlinks: true }));
    this.removeDir = options.removeDir ?? ((dir) => fs.rmSync(dir, { recursive: true, force: true }));
  }

  backup(installDir: string): string {
    const source = path.resolve(installDir);
    const backupPath = path.join(path.dirname(source), `${path.basename(source)}_backup_${formatTimestamp(this.now())}`);

    try {
      if (fs.existsSync(backupPath)) {
        this.removeDir(backupPath);
      }
      this.copyDir(source, backupPath);
    } catch (error) {
      throw new BackupError(`Falha ao criar backup de ${source}: ${describeError(error)}`, error);
    }

    this.logger.info('hotswap.backup.created', { installDir: source, backupPath });
    return backupPath;
  }

  restore(backupPath: string, installDir: string): void {
    if (!fs.existsSync(backupPath)) {
      throw new BackupError(`Backup nao encontrado: ${backupPath}`);
    }

    try {
      if (fs.existsSync(installDir)) {
        this.removeDir(installDir);
      }
      this.copyDir(backupPath, installDir);
    } catch (error) {
      throw new BackupError(`Falha ao restaurar ${installDir} a partir de ${backupPath}: ${describeError(error)}`, error);
    }

    this.logger.info('hotswap.backup.restored', { installDir, backupPath });
  }

  discard(backupPath: string): void {
    if (!fs.existsSync(backupPath)) {
      return;
    }

    this.removeDir(backupPath);
    this.logger.info('hotswap.backup.discarded', { backupPath });
  }
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
