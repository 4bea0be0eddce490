import fs from 'node:fs';
import path from 'node:path';
import type { ValidatedArchive } from '@main/services/hotswap/ArtifactValidator';
import { StagingError, describeError } from '@main/services/hotswap/errors';

export class ArchiveExtractor {
  constructor(private readonly entryPointFile: string) {}

  /**
   * Escreve o conteudo validado em `stagingDir/<rootFolder>` e retorna esse caminho.
   * Qualquer resto de uma tentativa anterior no staging e descartado antes.
   */
  extract(archive: ValidatedArchive, stagingDir: string): string {
    const extractedRoot = path.join(stagingDir, archive.rootFolder);

    try {
      fs.rmSync(stagingDir, { recursive: true, force: true });
      fs.mkdirSync(extractedRoot, { recursive: true });

      for (const directory of archive.directories) {
        fs.mkdirSync(resolveInside(extractedRoot, directory), { recursive: true });
      }

      for (const [relative, content] of archive.files) {
        const target = resolveInside(extractedRoot, relative);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, content);
      }
    } catch (error) {
      throw new StagingError(`Falha ao extrair ${path.basename(archive.artifactPath)}: ${describeError(error)}`, error);
    }

    if (!fs.existsSync(path.join(extractedRoot, this.entryPointFile))) {
      throw new StagingError(`Arquivo de entrada ${this.entryPointFile} ausente apos extracao.`);
    }

    return extractedRoot;
  }
}

function resolveInside(root: string, relative: string): string {
  const target = path.resolve(root, ...relative.split('/'));
  const fromRoot = path.relative(root, target);
  if (!fromRoot || fromRoot.startsWith('..') || path.isAbsolute(fromRoot)) {
    throw new Error(`Entrada fora do staging: ${relative}`);
  }
  return target;
}
