import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { HotSwapConfig } from '@shared/contracts';

const configSchema = z.object({
  namespace: z.string().trim().min(1),
  modulePrefix: z.string().trim().min(1).nullable(),
  entryPointFile: z
    .string()
    .trim()
    .min(1)
    .refine((value) => !value.includes('/') && !value.includes('\\'), 'entryPointFile must be a bare file name'),
  minUiSurfaces: z.number().int().nonnegative(),
  minCommands: z.number().int().nonnegative(),
  settingsProbeField: z.string().trim().min(1).nullable(),
  reverifyDelayMs: z.number().int().nonnegative(),
  reconfigureDelayMs: z.number().int().nonnegative()
});

export const DEFAULT_CONFIG: HotSwapConfig = {
  namespace: 'extension',
  modulePrefix: null,
  entryPointFile: 'index.js',
  minUiSurfaces: 6,
  minCommands: 10,
  settingsProbeField: null,
  reverifyDelayMs: 1000,
  reconfigureDelayMs: 1500
};

export class ConfigStore {
  private readonly filePath: string;
  private cache: HotSwapConfig;

  constructor(baseDir: string) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'hotswap.config.json');
    this.cache = this.load();
  }

  get(): HotSwapConfig {
    return { ...this.cache };
  }

  patch(patch: Partial<HotSwapConfig>): HotSwapConfig {
    const parsed = configSchema.safeParse({ ...this.cache, ...patch });
    if (!parsed.success) {
      throw new Error(
        `Configuracao invalida: ${parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`
      );
    }

    this.cache = parsed.data;
    this.persist(this.cache);
    return this.get();
  }

  private load(): HotSwapConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(DEFAULT_CONFIG);
      return { ...DEFAULT_CONFIG };
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = configSchema.safeParse({ ...DEFAULT_CONFIG, ...toObject(JSON.parse(raw)) });
      if (parsed.success) {
        return parsed.data;
      }
    } catch {
      // arquivo corrompido: volta ao default abaixo
    }

    this.persist(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  private persist(config: HotSwapConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}

function toObject(value: unknown): Record<string, unknown> {
  return value && typeof value === 'object' && !Array.isArray(value) ? { ...value } : {};
}
