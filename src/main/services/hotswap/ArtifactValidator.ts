import fs from 'node:fs';
import CRC32 from 'crc-32';
import { strFromU8, unzipSync, type Unzipped } from 'fflate';

export interface ValidatedArchive {
  artifactPath: string;
  rootFolder: string;
  /** Arquivos relativos a `rootFolder`, sempre com `/`. */
  files: Map<string, Uint8Array>;
  directories: string[];
}

export type ArtifactValidationResult = { ok: true; archive: ValidatedArchive } | { ok: false; reason: string };

interface ArtifactValidatorOptions {
  entryPointFile: string;
  readFileSync?: (filePath: string) => Uint8Array;
  statSync?: (filePath: string) => { isFile(): boolean } | undefined;
}

const LOCAL_FILE_HEADER = [0x50, 0x4b, 0x03, 0x04];
const END_OF_CENTRAL_DIRECTORY = [0x50, 0x4b, 0x05, 0x06];
const CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
const END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;
const ZIP64_MARKER = 0xffffffff;

export class ArtifactValidator {
  private readonly entryPointFile: string;
  private readonly readFileSync: (filePath: string) => Uint8Array;
  private readonly statSync: (filePath: string) => { isFile(): boolean } | undefined;

  constructor(options: ArtifactValidatorOptions) {
    this.entryPointFile = options.entryPointFile;
    this.readFileSync = options.readFileSync ?? ((filePath) => fs.readFileSync(filePath));
    this.statSync = options.statSync ?? ((filePath) => fs.statSync(filePath, { throwIfNoEntry: false }));
  }

  validate(artifactPath: string): ArtifactValidationResult {
    const normalizedPath = typeof artifactPath === 'string' ? artifactPath.trim() : '';
    if (!normalizedPath) {
      return { ok: false, reason: 'Nenhum arquivo informado.' };
    }

    const stats = this.statSync(normalizedPath);
    if (!stats) {
      return { ok: false, reason: `Arquivo nao encontrado: ${normalizedPath}` };
    }
    if (!stats.isFile()) {
      return { ok: false, reason: `Caminho nao e um arquivo: ${normalizedPath}` };
    }

    let data: Uint8Array;
    try {
      data = this.readFileSync(normalizedPath);
    } catch (error) {
      return { ok: false, reason: `Falha ao ler arquivo: ${error instanceof Error ? error.message : String(error)}` };
    }

    if (!startsWith(data, LOCAL_FILE_HEADER) && !startsWith(data, END_OF_CENTRAL_DIRECTORY)) {
      return { ok: false, reason: 'Arquivo nao e um ZIP valido.' };
    }

    let unzipped: Unzipped;
    try {
      unzipped = unzipSync(data);
    } catch (error) {
      return { ok: false, reason: `ZIP corrompido: ${error instanceof Error ? error.message : String(error)}` };
    }

    const checksums = readCentralDirectoryChecksums(data);
    if (typeof checksums === 'string') {
      return { ok: false, reason: `ZIP corrompido: ${checksums}` };
    }
    for (const [name, content] of Object.entries(unzipped)) {
      const expected = checksums.get(name);
      if (expected === undefined) {
        return { ok: false, reason: `ZIP corrompido: ${name} ausente do diretorio central` };
      }
      if (CRC32.buf(content) >>> 0 !== expected) {
        return { ok: false, reason: `ZIP corrompido: CRC invalido em ${name}` };
      }
    }

    const names = Object.keys(unzipped);
    if (!names.some((name) => !isDirectoryEntry(name))) {
      return { ok: false, reason: 'ZIP vazio.' };
    }

    const firstName = normalizeEntryName(names[0] ?? '');
    const rootFolder = firstName.split('/')[0] ?? '';
    if (!firstName.includes('/') || !isSafeSegment(rootFolder)) {
      return { ok: false, reason: 'ZIP sem pasta raiz da extensao.' };
    }

    const files = new Map<string, Uint8Array>();
    const directories = new Set<string>();
    for (const rawName of names) {
      const name = normalizeEntryName(rawName);
      const segments = name.split('/').filter((segment) => segment.length > 0);
      if (name.startsWith('/') || /^[a-zA-Z]:/.test(name) || !segments.every(isSafeSegment)) {
        return { ok: false, reason: `Entrada insegura no ZIP: ${rawName}` };
      }
      if (segments[0] !== rootFolder) {
        return { ok: false, reason: `Entrada fora da pasta raiz ${rootFolder}: ${rawName}` };
      }

      const relative = segments.slice(1).join('/');
      if (!relative) {
        continue;
      }

      const content = unzipped[rawName];
      if (isDirectoryEntry(name) || !content) {
        directories.add(relative);
        continue;
      }

      files.set(relative, content);
    }

    if (!files.has(this.entryPointFile)) {
      return { ok: false, reason: `Arquivo de entrada ${this.entryPointFile} ausente em ${rootFolder}/.` };
    }

    return {
      ok: true,
      archive: {
        artifactPath: normalizedPath,
        rootFolder,
        files,
        directories: [...directories].sort()
      }
    };
  }
}

/** CRC-32 de cada entrada segundo o diretorio central, ou o motivo da falha de leitura. */
function readCentralDirectoryChecksums(data: Uint8Array): Map<string, number> | string {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  let end = data.length - 22;
  while (end >= 0 && view.getUint32(end, true) !== END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
    end -= 1;
  }
  if (end < 0) {
    return 'fim do diretorio central nao encontrado';
  }

  const entryCount = view.getUint16(end + 10, true);
  const directoryOffset = view.getUint32(end + 16, true);
  if (directoryOffset === ZIP64_MARKER) {
    return 'ZIP64 nao suportado';
  }

  const checksums = new Map<string, number>();
  let offset = directoryOffset;
  for (let index = 0; index < entryCount; index += 1) {
    if (offset + 46 > data.length || view.getUint32(offset, true) !== CENTRAL_DIRECTORY_SIGNATURE) {
      return 'diretorio central truncado';
    }

    const utf8 = (view.getUint16(offset + 8, true) & 0x0800) !== 0;
    const crc = view.getUint32(offset + 16, true);
    const nameLength = view.getUint16(offset + 28, true);
    const extraLength = view.getUint16(offset + 30, true);
    const commentLength = view.getUint16(offset + 32, true);
    const name = strFromU8(data.subarray(offset + 46, offset + 46 + nameLength), !utf8);
    checksums.set(name, crc);
    offset += 46 + nameLength + extraLength + commentLength;
  }

  return checksums;
}

function startsWith(data: Uint8Array, signature: number[]): boolean {
  return data.length >= signature.length && signature.every((byte, index) => data[index] === byte);
}

function normalizeEntryName(name: string): string {
  return name.replace(/\\/g, '/');
}

function isDirectoryEntry(name: string): boolean {
  return name.endsWith('/') || name.endsWith('\\');
}

function isSafeSegment(segment: string): boolean {
  return segment.length > 0 && segment !== '.' && segment !== '..';
}
