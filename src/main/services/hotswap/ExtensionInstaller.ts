import fs from 'node:fs';
import type { LogSink } from '@main/services/logging/Logger';
import { ReplaceError, describeError } from '@main/services/hotswap/errors';

interface ExtensionInstallerOptions {
  logger: LogSink;
  renameSync?: (from: string, to: string) => void;
  removeDir?: (dir: string) => void;
  copyDir?: (from: string, to: string) => void;
}

export class ExtensionInstaller {
  private readonly logger: LogSink;
  private readonly renameSync: (from: string, to: string) => void;
  private readonly removeDir: (dir: string) => void;
  private readonly copyDir: (from: string, to: string) => void;

  constructor(options: ExtensionInstallerOptions) {
    this.logger = options.logger;
    this.renameSync = options.renameSync ?? fs.renameSync;
    this.removeDir = options.removeDir ?? ((dir) => fs.rmSync(dir, { recursive: true, force: true }));
    this.copyDir = options.copyDir ?? ((from, to) => fs.cpSync(from, to, { recursive: true, verbatimSymlinks: true }));
  }

  replace(stagingDir: string, installDir: string): void {
    if (!fs.existsSync(stagingDir)) {
      throw new ReplaceError(`Conteudo staged nao encontrado: ${stagingDir}`);
    }

    try {
      if (fs.existsSync(installDir)) {
        this.removeDir(installDir);
      }
      this.move(stagingDir, installDir);
    } catch (error) {
      throw new ReplaceError(`Falha ao substituir ${installDir}: ${describeError(error)}`, error);
    }

    this.logger.info('hotswap.install.replaced', { stagingDir, installDir });
  }

  private move(from: string, to: string): void {
    try {
      this.renameSync(from, to);
    } catch (error) {
      if (!isCrossDeviceError(error)) {
        throw error;
      }

      this.logger.warn('hotswap.install.cross_device_copy', { from, to });
      this.copyDir(from, to);
      this.removeDir(from);
    }
  }
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}
