// ===============================================
// APP STARTUP SEQUENCE
// ===============================================

import type { FirebaseOptions } from 'firebase/app';
import type { AppConfig } from './config';
import { type BootstrapError, toBootstrapError } from './errors';
import type { LoggerInstance } from './logger';
import type { SplashControl } from './splash';

export enum BootstrapState {
  STARTING = 'Starting',
  REMOTE_INIT_IN_PROGRESS = 'RemoteInitInProgress',
  READY = 'Ready',
  FAILED = 'Failed'
}

export interface RemoteBackend {
  initialize(options: FirebaseOptions): Promise<void>;
}

// What the root of the UI should show once startup settles
export type RootScreen =
  | { kind: 'app'; config: AppConfig }
  | { kind: 'error'; message: string };

export interface BootstrapDeps {
  splash: SplashControl;
  backend: RemoteBackend;
  loadConfig: () => AppConfig;
  mount: (screen: RootScreen) => void;
  logger: LoggerInstance;
  onStateChange?: (state: BootstrapState) => void;
}

export type BootstrapResult =
  | { state: BootstrapState.READY }
  | { state: BootstrapState.FAILED; error: BootstrapError };

/**
 * Runs the startup sequence once:
 * Starting -> RemoteInitInProgress -> Ready | Failed.
 *
 * The splash is held before any async work and released exactly once.
 * Any failure after that point mounts the error screen instead of the app;
 * there is no retry, restarting the app is the only way out of `Failed`.
 */
export async function runBootstrap(deps: BootstrapDeps): Promise<BootstrapResult> {
  const { splash, backend, logger } = deps;

  let splashReleased = false;
  const releaseSplash = () => {
    if (splashReleased) return;
    splashReleased = true;
    splash.release();
  };

  const enter = (state: BootstrapState) => {
    logger.debug(`Bootstrap state: ${state}`);
    deps.onStateChange?.(state);
  };

  enter(BootstrapState.STARTING);
  splash.preserve();

  try {
    enter(BootstrapState.REMOTE_INIT_IN_PROGRESS);
    logger.info('Starting app initialization...');

    const config = deps.loadConfig();
    await backend.initialize(config.firebase);
    logger.info('Initialization complete');

    releaseSplash();
    deps.mount({ kind: 'app', config });
    enter(BootstrapState.READY);
    return { state: BootstrapState.READY };
  } catch (cause) {
    const error = toBootstrapError(cause);
    logger.error(
      `Failed to initialize app [${error.code}]: ${error.message}`,
      cause instanceof Error ? cause.stack : cause
    );

    releaseSplash();
    deps.mount({ kind: 'error', message: error.message });
    enter(BootstrapState.FAILED);
    return { state: BootstrapState.FAILED, error };
  }
}
