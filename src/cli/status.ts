/** src/cli/status.ts
 * "relaunch status": report whether the configured session is running.
 */
import type { Command } from 'commander';

import { loadConfig } from '@/cli/config/load';
import { exitStatusOf } from '@/runner/launch';
import { ok, warn } from '@/runner/util/color';

import { applyCliSafety } from './cli-utils';
import { createSessionManager } from './launch/deps';
import { printFailure } from './launch/print';
import { resolveSessionName, resolveTmuxBin } from './launch/resolve';

/** @returns 0 when the session exists, 1 when it does not. */
export const performStatus = async (
  flags: { session?: string },
  cwd = process.cwd(),
): Promise<number> => {
  const { config } = await loadConfig(cwd);
  const name = resolveSessionName(flags.session, config);
  const sessions = createSessionManager(resolveTmuxBin(config));
  const found = await sessions.exists(name);
  if (!found.ok) {
    printFailure(found.error);
    return exitStatusOf(found.error);
  }
  const state = found.value ? ok('running') : warn('not running');
  console.log(`relaunch: session "${name}" ${state}`);
  return found.value ? 0 : 1;
};

export function registerStatus(cli: Command): Command {
  const sub = cli
    .command('status')
    .description('Report whether the session is running (exit 1 when not)')
    .option('-s, --session <name>', 'session name (config: session)');
  applyCliSafety(sub);
  sub.action(async (opts: { session?: string }) => {
    process.exitCode = await performStatus(opts);
  });
  return cli;
}
