import fs from 'node:fs';
import path from 'node:path';
import { strToU8, zipSync } from 'fflate';
import { afterEach, describe, expect, it } from 'vitest';
import { ArchiveExtractor } from '@main/services/hotswap/ArchiveExtractor';
import { ArtifactValidator } from '@main/services/hotswap/ArtifactValidator';
import { StagingError } from '@main/services/hotswap/errors';
import { createTempDir, readTree, writeZip } from './support/fixtures';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('ArtifactValidator', () => {
  const validator = new ArtifactValidator({ entryPointFile: 'index.js' });

  it('rejeita caminho inexistente', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const missing = path.join(dir, 'nada.zip');

    expect(validator.validate(missing)).toEqual({ ok: false, reason: `Arquivo nao encontrado: ${missing}` });
  });

  it('rejeita caminho vazio e diretorios', () => {
    const dir = createTempDir(tempDirs, 'validator');

    expect(validator.validate('   ')).toEqual({ ok: false, reason: 'Nenhum arquivo informado.' });
    expect(validator.validate(dir)).toEqual({ ok: false, reason: `Caminho nao e um arquivo: ${dir}` });
  });

  it('rejeita arquivo que nao e zip', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const filePath = path.join(dir, 'notas.zip');
    fs.writeFileSync(filePath, 'isto nao e um zip', 'utf-8');

    expect(validator.validate(filePath)).toEqual({ ok: false, reason: 'Arquivo nao e um ZIP valido.' });
  });

  it('rejeita zip corrompido sem diretorio central', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const filePath = path.join(dir, 'corrompido.zip');
    fs.writeFileSync(filePath, Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.alloc(96, 7)]));

    const result = validator.validate(filePath);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toContain('ZIP corrompido');
    }
  });

  it('rejeita zip cujo conteudo nao confere com o CRC do diretorio central', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const filePath = path.join(dir, 'ext-2.0.0.zip');
    const raw = Buffer.from(
      zipSync({ 'ext/index.js': [strToU8("exports.metadata = { version: '2.0.0' };\n"), { level: 0 }] })
    );
    raw[raw.indexOf("'2.0.0'") + 1] = '9'.charCodeAt(0);
    fs.writeFileSync(filePath, raw);

    expect(validator.validate(filePath)).toEqual({ ok: false, reason: 'ZIP corrompido: CRC invalido em ext/index.js' });
  });

  it('aceita zip armazenado sem compressao quando o CRC confere', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const filePath = path.join(dir, 'ext-2.0.0.zip');
    fs.writeFileSync(filePath, zipSync({ 'ext/index.js': [strToU8("exports.metadata = { version: '2.0.0' };\n"), { level: 0 }] }));

    expect(validator.validate(filePath).ok).toBe(true);
  });

  it('rejeita zip vazio', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const filePath = writeZip(path.join(dir, 'vazio.zip'), {});

    expect(validator.validate(filePath)).toEqual({ ok: false, reason: 'ZIP vazio.' });
  });

  it('rejeita zip sem arquivo de entrada na pasta raiz', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const noEntry = writeZip(path.join(dir, 'sem-entrada.zip'), {
      'ext/readme.txt': 'leia',
      'ext/sub/index.js': 'module.exports = {};'
    });

    expect(validator.validate(noEntry)).toEqual({ ok: false, reason: 'Arquivo de entrada index.js ausente em ext/.' });
  });

  it('rejeita zip sem pasta raiz', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const flat = writeZip(path.join(dir, 'plano.zip'), { 'index.js': 'module.exports = {};' });

    expect(validator.validate(flat)).toEqual({ ok: false, reason: 'ZIP sem pasta raiz da extensao.' });
  });

  it('rejeita entradas que escapam da pasta raiz', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const traversal = writeZip(path.join(dir, 'traversal.zip'), {
      'ext/index.js': 'module.exports = {};',
      'ext/../fora.js': 'x'
    });
    const secondRoot = writeZip(path.join(dir, 'duas-raizes.zip'), {
      'ext/index.js': 'module.exports = {};',
      'outra/x.js': 'x'
    });

    expect(validator.validate(traversal)).toEqual({ ok: false, reason: 'Entrada insegura no ZIP: ext/../fora.js' });
    expect(validator.validate(secondRoot)).toEqual({ ok: false, reason: 'Entrada fora da pasta raiz ext: outra/x.js' });
  });

  it('aceita zip valido e expoe os arquivos relativos a raiz', () => {
    const dir = createTempDir(tempDirs, 'validator');
    const filePath = writeZip(path.join(dir, 'ext-2.0.0.zip'), {
      'ext/index.js': 'module.exports = { v: 2 };',
      'ext/lib/util.js': 'module.exports = 1;'
    });

    const result = validator.validate(filePath);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.archive.rootFolder).toBe('ext');
      expect([...result.archive.files.keys()].sort()).toEqual(['index.js', 'lib/util.js']);
    }
  });
});

describe('ArchiveExtractor', () => {
  it('extrai para o staging descartando restos de tentativa anterior', () => {
    const dir = createTempDir(tempDirs, 'extractor');
    const filePath = writeZip(path.join(dir, 'ext.zip'), {
      'ext/index.js': 'module.exports = { v: 2 };',
      'ext/lib/util.js': 'module.exports = 1;'
    });
    const staging = path.join(dir, 'ext_staging');
    fs.mkdirSync(path.join(staging, 'lixo'), { recursive: true });
    fs.writeFileSync(path.join(staging, 'lixo', 'antigo.txt'), 'antigo', 'utf-8');

    const result = new ArtifactValidator({ entryPointFile: 'index.js' }).validate(filePath);
    if (!result.ok) {
      throw new Error(result.reason);
    }

    const extractedRoot = new ArchiveExtractor('index.js').extract(result.archive, staging);

    expect(extractedRoot).toBe(path.join(staging, 'ext'));
    expect(readTree(staging)).toEqual({
      'ext/index.js': 'module.exports = { v: 2 };',
      'ext/lib/util.js': 'module.exports = 1;'
    });
  });

  it('falha com StagingError quando o arquivo de entrada nao chega ao disco', () => {
    const dir = createTempDir(tempDirs, 'extractor');
    const staging = path.join(dir, 'ext_staging');
    const archive = {
      artifactPath: path.join(dir, 'ext.zip'),
      rootFolder: 'ext',
      files: new Map([['main.js', new Uint8Array([0x31])]]),
      directories: []
    };

    expect(() => new ArchiveExtractor('index.js').extract(archive, staging)).toThrow(StagingError);
  });
});
