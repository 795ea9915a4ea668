/* src/runner/launch/types.ts
 * Seams between the launch pipeline and the tools it drives.
 */
import type { LaunchError } from './errors';
import type { Result } from './result';

export type SessionSpec = {
  name: string;
  window: string;
  command: string;
  /** Working directory of the window's command. */
  cwd: string;
  /** Launcher-assigned marker distinguishing this session instance. */
  generation: string;
};

/** Narrow capability set of a terminal multiplexer. */
export interface SessionManager {
  exists(name: string): Promise<Result<boolean, LaunchError>>;
  kill(name: string): Promise<Result<void, LaunchError>>;
  create(spec: SessionSpec): Promise<Result<void, LaunchError>>;
}

/** Isolated runtime environment (e.g. a Python venv) provisioning. */
export interface EnvironmentProvisioner {
  exists(envPath: string): Promise<boolean>;
  /** Create the environment at envPath, labelled for display. */
  create(envPath: string, label: string): Promise<Result<void, LaunchError>>;
  /** Install the manifest's dependencies with the environment activated. */
  install(
    envPath: string,
    manifestPath: string,
  ): Promise<Result<void, LaunchError>>;
  /** True when the last install used the manifest's current contents. */
  isCurrent(envPath: string, manifestPath: string): Promise<boolean>;
}

export interface SessionLock {
  readonly path: string;
  release(): Promise<void>;
}

export type AcquireLock = (
  name: string,
) => Promise<Result<SessionLock, LaunchError>>;

export type LaunchOptions = {
  name: string;
  window: string;
  command: string;
  cwd: string;
  envPath?: string;
  manifestPath?: string;
  /** Reinstall into an existing environment when the manifest changed. */
  verifyManifest?: boolean;
  /** Hold the per-session lock for the whole launch (default true). */
  lock?: boolean;
};

export type LaunchDeps = {
  sessions: SessionManager;
  provisioner: EnvironmentProvisioner;
  acquireLock: AcquireLock;
  /** Generation marker source; defaults to a random UUID. */
  generation?: () => string;
};

export type EnvironmentOutcome = 'absent' | 'existing' | 'created' | 'refreshed';

export type LaunchReport = {
  session: string;
  window: string;
  command: string;
  generation: string;
  environment: EnvironmentOutcome;
  /** True when a previous session of the same name was terminated. */
  killed: boolean;
};

export type LaunchEvent =
  | { type: 'lock-acquired'; path: string }
  | { type: 'env-found'; path: string }
  | { type: 'env-missing'; path: string }
  | { type: 'env-stale'; path: string; manifest: string }
  | { type: 'env-created'; path: string }
  | { type: 'deps-installing'; path: string; manifest: string }
  | { type: 'session-found'; name: string }
  | { type: 'session-missing'; name: string }
  | { type: 'session-killed'; name: string }
  | { type: 'session-created'; name: string; window: string; generation: string };

export type LaunchHooks = {
  onEvent?: (event: LaunchEvent) => void;
};
