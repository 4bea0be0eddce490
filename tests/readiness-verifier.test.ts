import { describe, expect, it } from 'vitest';
import { ExtensionHost } from '@main/services/host/ExtensionHost';
import { ReadinessVerifier } from '@main/services/hotswap/ReadinessVerifier';
import { InMemoryModuleRegistry } from '@main/services/modules/InMemoryModuleRegistry';

describe('ReadinessVerifier', () => {
  it('aponta falta de UI surfaces com 5/6 mesmo com comandos suficientes', () => {
    const { verifier } = setup({ uiSurfaces: 5, commands: 12 });

    const report = verifier.checkReady('ext');
    expect(report.ready).toBe(false);
    expect(report.detail).toBe('Only 5/6 UI surfaces registered (1 missing)');
    expect(report.uiSurfaces).toBe(5);
  });

  it('aponta falta de comandos', () => {
    const { verifier } = setup({ uiSurfaces: 6, commands: 9 });

    expect(verifier.checkReady('ext')).toMatchObject({
      ready: false,
      detail: 'Only 9/10 commands registered (1 missing)',
      uiSurfaces: 6,
      commands: 9
    });
  });

  it('confirma prontidao quando tudo esta registrado', () => {
    const { verifier } = setup({ uiSurfaces: 6, commands: 10 });

    expect(verifier.checkReady('ext')).toEqual({
      ready: true,
      detail: 'All features ready (6 UI surfaces, 10 commands)',
      uiSurfaces: 6,
      commands: 10,
      version: '2.0.0'
    });
    expect(verifier.checkReady('ext').ready).toBe(true);
  });

  it('nao conta UI surfaces de outra extensao cujo namespace comeca igual', () => {
    const { verifier, host } = setup({ uiSurfaces: 5, commands: 10 });
    for (let index = 0; index < 3; index += 1) {
      host.registerUiSurface(`extra.panel.${index}`);
    }

    expect(verifier.checkReady('ext')).toMatchObject({
      ready: false,
      detail: 'Only 5/6 UI surfaces registered (1 missing)',
      uiSurfaces: 5
    });
  });

  it('exige o namespace no registro de modulos', () => {
    const { verifier, modules } = setup({ uiSurfaces: 6, commands: 10 });
    modules.evict('ext');
    modules.evict('ext.ops');

    expect(verifier.checkReady('ext')).toMatchObject({ ready: false, detail: 'ext not present in module registry' });
  });

  it('exige metadata da extensao', () => {
    const { verifier, host } = setup({ uiSurfaces: 6, commands: 10, metadata: false });
    expect(host.getMetadata('ext')).toBeNull();

    expect(verifier.checkReady('ext').detail).toBe('Extension metadata not found');
  });

  it('exige settings de sessao anexados e legiveis', () => {
    const { verifier, host } = setup({ uiSurfaces: 6, commands: 10 });

    host.detachSessionSettings('ext');
    expect(verifier.checkReady('ext').detail).toBe('Session settings not attached');

    host.attachSessionSettings('ext', {});
    expect(verifier.checkReady('ext').detail).toBe('Session settings have no readable field');

    const broken = {};
    Object.defineProperty(broken, 'bakeType', {
      enumerable: true,
      get() {
        throw new Error('propriedade nao inicializada');
      }
    });
    host.attachSessionSettings('ext', broken);
    expect(verifier.checkReady('ext').detail).toBe('Session settings not accessible: propriedade nao inicializada');
  });

  it('usa o campo de sonda configurado', () => {
    const { host, modules } = setup({ uiSurfaces: 6, commands: 10 });
    const verifier = new ReadinessVerifier({
      modules,
      host,
      minUiSurfaces: 6,
      minCommands: 10,
      settingsProbeField: 'resolution'
    });

    expect(verifier.checkReady('ext').detail).toBe('Session settings missing field resolution');
  });
});

function setup(options: { uiSurfaces: number; commands: number; metadata?: boolean }) {
  const modules = new InMemoryModuleRegistry();
  modules.define('ext', () => ({}));
  modules.define('ext.ops', () => ({}));
  modules.load('ext');
  modules.load('ext.ops');

  const host = new ExtensionHost();
  for (let index = 0; index < options.uiSurfaces; index += 1) {
    host.registerUiSurface(`ext.panel.${index}`);
  }
  for (let index = 0; index < options.commands; index += 1) {
    host.registerCommand(`ext.command.${index}`);
  }
  host.registerCommand('outra.command.0');
  if (options.metadata !== false) {
    host.setMetadata('ext', { name: 'Ext', version: '2.0.0' });
  }
  host.attachSessionSettings('ext', { bakeType: 'normal' });

  const verifier = new ReadinessVerifier({ modules, host, minUiSurfaces: 6, minCommands: 10 });
  return { verifier, host, modules };
}
