// src/cli/launch/action.ts
import type { Command } from 'commander';

import { loadConfig } from '@/cli/config/load';
import {
  ensureSession,
  exitStatusOf,
  renderLaunchPlan,
} from '@/runner/launch';

import { createLaunchDeps } from './deps';
import { printEvent, printFailure, printReport } from './print';
import { type LaunchFlags, resolveLaunch } from './resolve';

/**
 * Resolve options and run the launch pipeline (or print its plan).
 *
 * @returns Process exit status: 0 on success, else the failing tool's status
 * (1 when it had none). Config errors are thrown.
 */
export const performLaunch = async (
  flags: LaunchFlags,
  cwd = process.cwd(),
): Promise<number> => {
  const eff = resolveLaunch(flags, await loadConfig(cwd), cwd);

  if (flags.dryRun) {
    console.log(renderLaunchPlan(eff.options));
    return 0;
  }

  const result = await ensureSession(eff.options, createLaunchDeps(eff), {
    onEvent: printEvent,
  });
  if (!result.ok) {
    printFailure(result.error);
    return exitStatusOf(result.error);
  }
  printReport(result.value);
  return 0;
};

export function registerLaunchAction(sub: Command): void {
  sub.action(async (opts: LaunchFlags) => {
    process.exitCode = await performLaunch(opts);
  });
}
