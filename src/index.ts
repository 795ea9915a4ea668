/** Library entry point: the launch pipeline and its tmux/venv adapters. */
export { makeCli } from './cli';
export { loadConfig, type LoadedConfig } from './cli/config/load';
export type { LaunchConfig } from './cli/config/schema';
export { MANIFEST_STAMP_FILE } from './runner/environment/manifest';
export {
  VenvProvisioner,
  type VenvProvisionerOptions,
} from './runner/environment/venv';
export {
  type CommandResult,
  type RunCommand,
  runCommand,
} from './runner/exec/run-command';
export * from './runner/launch';
export { createLockAcquirer, type LockOptions } from './runner/lock/session-lock';
export {
  GENERATION_ENV,
  TmuxSessionManager,
  type TmuxSessionManagerOptions,
} from './runner/session/tmux';
