/* src/runner/launch/ensure-session.ts
 * (Re)create a named session: optional environment bootstrap, then
 * probe -> kill -> create. Destructive: an existing session is always
 * replaced, never updated in place.
 */
import { randomUUID } from 'node:crypto';

import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_LAUNCH_STEP } from '@/runner/util/debug-scopes';

import type { LaunchError } from './errors';
import { failure, type Result, success } from './result';
import { LAUNCH_STEPS, type LaunchContext } from './steps';
import type {
  LaunchDeps,
  LaunchHooks,
  LaunchOptions,
  LaunchReport,
  SessionLock,
} from './types';

/**
 * Ensure exactly one fresh session named `options.name` runs
 * `options.command` in a window named `options.window`.
 *
 * Steps run strictly in order and stop at the first failure: nothing is
 * retried and nothing already done is rolled back (a killed session stays
 * killed if creation then fails). The per-session lock, when enabled, is
 * held across all steps and released on every outcome.
 */
export const ensureSession = async (
  options: LaunchOptions,
  deps: LaunchDeps,
  hooks?: LaunchHooks,
): Promise<Result<LaunchReport, LaunchError>> => {
  const emit = hooks?.onEvent ?? (() => undefined);

  let lock: SessionLock | undefined;
  if (options.lock !== false) {
    const acquired = await deps.acquireLock(options.name);
    if (!acquired.ok) return failure(acquired.error);
    lock = acquired.value;
    emit({ type: 'lock-acquired', path: lock.path });
  }

  const ctx: LaunchContext = {
    options,
    deps,
    emit,
    generation: (deps.generation ?? randomUUID)(),
    environment: 'absent',
    sessionExists: false,
    killed: false,
  };

  try {
    for (const step of LAUNCH_STEPS) {
      debugLog(DBG_SCOPE_LAUNCH_STEP, step.name);
      const res = await step.run(ctx);
      if (!res.ok) {
        debugLog(
          DBG_SCOPE_LAUNCH_STEP,
          `${step.name} failed: ${res.error.kind}`,
        );
        return failure(res.error);
      }
    }
  } finally {
    await lock?.release();
  }

  return success({
    session: options.name,
    window: options.window,
    command: options.command,
    generation: ctx.generation,
    environment: ctx.environment,
    killed: ctx.killed,
  });
};
