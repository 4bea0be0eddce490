import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = Pick<Logger, 'info' | 'warn' | 'error'> & Partial<Pick<Logger, 'debug'>>;

interface LoggerOptions {
  fileName?: string;
  maxBytes?: number;
  mirrorFilePath?: string | null;
}

const DEFAULT_MAX_BYTES = 2 * 1024 * 1024;

export class Logger {
  private readonly filePath: string;
  private readonly mirrorFilePath: string | null;
  private readonly maxBytes: number;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, normalizeFileName(options?.fileName));
    this.maxBytes = normalizeMaxBytes(options?.maxBytes);
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  get path(): string {
    return this.filePath;
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch {
        // o espelho e opcional; o arquivo principal ja recebeu a linha
      }
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    if (fs.statSync(this.filePath).size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    fs.rmSync(rotated, { force: true });
    fs.renameSync(this.filePath, rotated);
  }
}

function normalizeFileName(value: string | undefined): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  return trimmed ? path.basename(trimmed) : 'hotswap.log';
}

function normalizeMaxBytes(value: number | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.trunc(value) : DEFAULT_MAX_BYTES;
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
