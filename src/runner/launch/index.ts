export { ensureSession } from './ensure-session';
export { exitStatusOf, LaunchError, type LaunchErrorKind } from './errors';
export { describeEvent } from './events';
export { renderLaunchPlan } from './plan';
export { done, failure, type Result, success } from './result';
export type {
  AcquireLock,
  EnvironmentOutcome,
  EnvironmentProvisioner,
  LaunchDeps,
  LaunchEvent,
  LaunchHooks,
  LaunchOptions,
  LaunchReport,
  SessionLock,
  SessionManager,
  SessionSpec,
} from './types';
