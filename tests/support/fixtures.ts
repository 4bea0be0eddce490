import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { strToU8, zipSync, type Zippable } from 'fflate';
import { vi } from 'vitest';

export function createTempDir(registry: string[], prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), `hotswap-${prefix}-`));
  registry.push(dir);
  return dir;
}

export function writeZip(filePath: string, entries: Record<string, string>): string {
  const zippable: Zippable = {};
  for (const [name, content] of Object.entries(entries)) {
    zippable[name] = strToU8(content);
  }
  fs.writeFileSync(filePath, zipSync(zippable));
  return filePath;
}

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, ...relative.split('/'));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
  }
}

/** Conteudo de cada arquivo sob `root`, indexado pelo caminho relativo com `/`. */
export function readTree(root: string): Record<string, string> {
  const result: Record<string, string> = {};
  const walk = (dir: string, base: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name))) {
      const relative = base ? `${base}/${entry.name}` : entry.name;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath, relative);
      } else {
        result[relative] = fs.readFileSync(fullPath, 'utf-8');
      }
    }
  };
  walk(root, '');
  return result;
}

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}
