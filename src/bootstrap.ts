import debug from 'debug';
import {
  validateConfig,
  type TBootstrapConfig,
  type TBootstrapOptions
} from './config';
import { NativesInstaller, type TInstallSteps } from './installer';
import {
  ERuntimeState,
  type TNativeBridge,
  type TRuntimeHandle
} from './types';

const GPU_LIBRARIES = ['EGL', 'GLESv2', 'vk_swiftshader'];
const CEF_LIBRARIES = ['libcef', 'cef', 'jcef'];
const DISABLE_GPU_ARG = '--disable-gpu';

type TGuardState<H> =
  | { status: 'idle' }
  | { status: 'building'; pending: Promise<H> }
  | { status: 'ready'; instance: H };

type TBootstrapDeps<H extends TRuntimeHandle> = {
  bridge: TNativeBridge<H>;
  steps?: Partial<TInstallSteps>;
  registerExitHook?: (hook: () => void) => void;
};

const processExitHook = (hook: () => void) => {
  process.once('exit', hook);
};

/**
 * Owns at most one native runtime instance. Concurrent callers of
 * `getOrBuild` share a single install and initialization and all observe the
 * same instance, or the same error.
 */
class NativesBootstrap<H extends TRuntimeHandle = TRuntimeHandle> {
  public readonly config: TBootstrapConfig;
  private readonly bridge: TNativeBridge<H>;
  private readonly installer: NativesInstaller;
  private readonly registerExitHook: (hook: () => void) => void;
  private guard: TGuardState<H> = { status: 'idle' };
  private exitHookRegistered = false;

  constructor(options: TBootstrapOptions, deps: TBootstrapDeps<H>) {
    this.config = validateConfig(options);
    this.bridge = deps.bridge;
    this.installer = new NativesInstaller(this.config, deps.steps);
    this.registerExitHook = deps.registerExitHook ?? processExitHook;

    debug('natives:bootstrap')(
      `Initialized bootstrap for ${this.config.installDir}`
    );
  }

  public get state(): TGuardState<H>['status'] {
    return this.guard.status;
  }

  public getOrBuild = async (): Promise<H> => {
    if (this.guard.status === 'ready') {
      return this.guard.instance;
    }

    if (this.guard.status === 'building') {
      debug('natives:bootstrap')('Build already in progress, waiting...');

      return this.guard.pending;
    }

    // the guard must read `building` before any progress callback can re-enter
    const pending = Promise.resolve().then(this.build);

    this.guard = { status: 'building', pending };

    try {
      const instance = await pending;

      this.guard = { status: 'ready', instance };

      return instance;
    } catch (error) {
      this.guard = { status: 'idle' };
      throw error;
    }
  };

  public initFromRuntime = (): H | null => {
    if (this.guard.status === 'ready') {
      return this.guard.instance;
    }

    if (this.guard.status === 'building') {
      debug('natives:bootstrap')('Build in progress, not attaching');

      return null;
    }

    try {
      const instance = this.attachToRuntime();

      if (!instance) {
        return null;
      }

      this.guard = { status: 'ready', instance };
      this.observeInitialization(instance);

      return instance;
    } catch (error) {
      debug('natives:bootstrap')(
        `Could not attach to a loaded runtime: ${error instanceof Error ? error.message : String(error)}`
      );

      return null;
    }
  };

  public dispose = () => {
    if (this.guard.status !== 'ready') {
      return;
    }

    const { instance } = this.guard;

    this.guard = { status: 'idle' };
    instance.dispose();
  };

  private build = async (): Promise<H> => {
    const { installDir, args, settings, progress } = this.config;

    await this.installer.ensureInstalled();

    progress.initializing();

    const instance = await this.bridge.initialize(installDir, args, settings);

    this.ensureExitHook();
    this.observeInitialization(instance);

    debug('natives:bootstrap')('Native runtime created');

    return instance;
  };

  private ensureExitHook = () => {
    if (this.exitHookRegistered) return;

    this.exitHookRegistered = true;
    this.registerExitHook(() => this.dispose());
  };

  private observeInitialization = (instance: H) => {
    let notified = false;

    instance.onInitialization((state) => {
      if (state === ERuntimeState.INITIALIZED && !notified) {
        notified = true;
        this.config.progress.initialized();
      }
    });
  };

  private attachToRuntime = (): H | undefined => {
    const { args, settings } = this.config;
    const gpuDisabled = args.some(
      (arg) => arg.trim().toLowerCase() === DISABLE_GPU_ARG
    );

    if (!gpuDisabled) {
      GPU_LIBRARIES.forEach((name) => this.bridge.loadLibrary(name));
    }

    if (!CEF_LIBRARIES.some((name) => this.bridge.loadLibrary(name))) {
      debug('natives:bootstrap')('No CEF library could be loaded');
      return undefined;
    }

    if (!this.bridge.startup(args)) {
      debug('natives:bootstrap')('Native startup failed');
      return undefined;
    }

    return (
      this.bridge.getInstanceIfAny() ??
      this.tryGetInstance(() => this.bridge.getInstance(settings)) ??
      this.tryGetInstance(() => this.bridge.getInstance())
    );
  };

  private tryGetInstance = (get: () => H): H | undefined => {
    try {
      return get();
    } catch (error) {
      debug('natives:bootstrap')(
        `Native getInstance failed: ${error instanceof Error ? error.message : String(error)}`
      );

      return undefined;
    }
  };
}

export { CEF_LIBRARIES, DISABLE_GPU_ARG, GPU_LIBRARIES, NativesBootstrap };
export type { TBootstrapDeps, TGuardState };
