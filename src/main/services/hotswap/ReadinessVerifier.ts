import type { ReadinessReport } from '@shared/contracts';
import { capabilityPrefix, type HostCapabilityRegistry } from '@main/services/host/ExtensionHost';
import type { ModuleRegistry } from '@main/services/modules/ModuleRegistry';

interface ReadinessVerifierOptions {
  modules: ModuleRegistry;
  host: HostCapabilityRegistry;
  minUiSurfaces: number;
  minCommands: number;
  /** Prefixo das unidades no registro de modulos; default e o proprio namespace. */
  modulePrefix?: string | null;
  settingsProbeField?: string | null;
}

export class ReadinessVerifier {
  private readonly modules: ModuleRegistry;
  private readonly host: HostCapabilityRegistry;
  private readonly minUiSurfaces: number;
  private readonly minCommands: number;
  private readonly modulePrefix: string | null;
  private readonly settingsProbeField: string | null;

  constructor(options: ReadinessVerifierOptions) {
    this.modules = options.modules;
    this.host = options.host;
    this.minUiSurfaces = normalizeThreshold(options.minUiSurfaces);
    this.minCommands = normalizeThreshold(options.minCommands);
    this.modulePrefix = options.modulePrefix ?? null;
    this.settingsProbeField = options.settingsProbeField ?? null;
  }

  checkReady(namespace: string): ReadinessReport {
    try {
      return this.inspect(namespace);
    } catch (error) {
      return unready(`Verification error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private inspect(namespace: string): ReadinessReport {
    const modulePrefix = this.modulePrefix ?? namespace;
    if (this.modules.list(modulePrefix).length === 0) {
      return unready(`${modulePrefix} not present in module registry`);
    }

    const metadata = this.host.getMetadata(namespace);
    if (!metadata) {
      return unready('Extension metadata not found');
    }

    const uiSurfaces = this.host.listUiSurfaces(capabilityPrefix(namespace)).length;
    if (uiSurfaces < this.minUiSurfaces) {
      return {
        ...unready(
          `Only ${uiSurfaces}/${this.minUiSurfaces} UI surfaces registered (${this.minUiSurfaces - uiSurfaces} missing)`
        ),
        uiSurfaces,
        version: metadata.version
      };
    }

    const commands = this.host.listCommands(capabilityPrefix(namespace)).length;
    if (commands < this.minCommands) {
      return {
        ...unready(`Only ${commands}/${this.minCommands} commands registered (${this.minCommands - commands} missing)`),
        uiSurfaces,
        commands,
        version: metadata.version
      };
    }

    const settings = this.host.getSessionSettings(namespace);
    if (!settings) {
      return { ...unready('Session settings not attached'), uiSurfaces, commands, version: metadata.version };
    }

    const probeField: string | undefined = this.settingsProbeField ?? Object.keys(settings)[0];
    if (probeField === undefined) {
      return { ...unready('Session settings have no readable field'), uiSurfaces, commands, version: metadata.version };
    }

    if (!(probeField in settings)) {
      return {
        ...unready(`Session settings missing field ${probeField}`),
        uiSurfaces,
        commands,
        version: metadata.version
      };
    }

    try {
      void Reflect.get(settings, probeField);
    } catch (error) {
      return {
        ...unready(`Session settings not accessible: ${error instanceof Error ? error.message : String(error)}`),
        uiSurfaces,
        commands,
        version: metadata.version
      };
    }

    return {
      ready: true,
      detail: `All features ready (${uiSurfaces} UI surfaces, ${commands} commands)`,
      uiSurfaces,
      commands,
      version: metadata.version
    };
  }
}

function unready(detail: string): ReadinessReport {
  return {
    ready: false,
    detail,
    uiSurfaces: 0,
    commands: 0,
    version: null
  };
}

function normalizeThreshold(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}
