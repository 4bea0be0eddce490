import { describe, expect, it, vi } from 'vitest';
import { ExtensionHost } from '@main/services/host/ExtensionHost';
import { mockLogger } from './support/fixtures';

describe('ExtensionHost', () => {
  it('lista capacidades por prefixo em ordem', () => {
    const host = new ExtensionHost();
    host.registerCommand('ext.bake');
    host.registerCommand('ext.apply');
    host.registerCommand('outra.bake');
    host.registerUiSurface('ext.panel.main');

    expect(host.listCommands('ext.')).toEqual(['ext.apply', 'ext.bake']);
    expect(host.listUiSurfaces('ext.')).toEqual(['ext.panel.main']);
    expect(() => host.registerCommand('  ')).toThrow('Identificador de comando vazio.');
  });

  it('ativa o modulo de entrada e reativa sem duplicar registros', () => {
    const logger = mockLogger();
    const host = new ExtensionHost(logger);
    const unregister = vi.fn();
    const entry = {
      metadata: { name: 'Ext', version: '1.0.0' },
      register: (target: ExtensionHost) => {
        target.registerUiSurface('ext.panel.bake');
        target.registerCommand('ext.bake');
      },
      unregister
    };
    host.attachSessionSettings('ext', { bakeType: 'normal' });

    host.activate('ext', entry);
    host.activate('ext', { ...entry, metadata: { name: 'Ext', version: '2.0.0' } });

    expect(unregister).toHaveBeenCalledTimes(1);
    expect(host.getMetadata('ext')).toEqual({ name: 'Ext', version: '2.0.0' });
    expect(host.listCommands('ext')).toEqual(['ext.bake']);
    expect(host.getSessionSettings('ext')).toEqual({ bakeType: 'normal' });
    expect(host.isActive('ext')).toBe(true);
    expect(logger.info).toHaveBeenLastCalledWith('host.extension.activated', {
      namespace: 'ext',
      version: '2.0.0',
      uiSurfaces: 1,
      commands: 1
    });
  });

  it('rejeita modulo de entrada sem register nem metadata', () => {
    const host = new ExtensionHost();

    expect(() => host.activate('ext', { outra: true })).toThrow('Modulo de entrada de ext nao exporta register/metadata.');
    expect(() => host.activate('ext', { register: 'nao e funcao' })).toThrow();
    expect(host.isActive('ext')).toBe(false);
  });

  it('desativa removendo tudo do namespace', () => {
    const host = new ExtensionHost();
    host.activate('ext', {
      metadata: { name: 'Ext', version: '1.0.0' },
      register: (target: ExtensionHost) => target.registerCommand('ext.bake')
    });
    host.attachSessionSettings('ext', { bakeType: 'normal' });

    host.deactivate('ext');

    expect(host.listCommands('ext')).toEqual([]);
    expect(host.getMetadata('ext')).toBeNull();
    expect(host.getSessionSettings('ext')).toBeNull();
  });

  it('desativa sem remover comandos de namespace com o mesmo inicio', () => {
    const host = new ExtensionHost();
    host.registerCommand('extra.bake');
    host.registerUiSurface('extra.panel.main');
    host.activate('ext', { register: (target: ExtensionHost) => target.registerCommand('ext.bake') });

    host.deactivate('ext');

    expect(host.listCommands('ext')).toEqual(['extra.bake']);
    expect(host.listUiSurfaces('extra.')).toEqual(['extra.panel.main']);
  });
});
