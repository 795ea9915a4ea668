/** src/cli/launch/index.ts
 * Launch CLI: the default subcommand, so `relaunch -s bot` launches.
 */
import type { Command } from 'commander';

import { applyCliSafety } from '../cli-utils';
import { registerLaunchAction } from './action';
import { attachLaunchOptions } from './options';

export function registerLaunch(cli: Command): Command {
  const sub = cli
    .command('launch', { isDefault: true })
    .description(
      'Ensure the environment, kill any session of the same name, and start a fresh detached session',
    );
  applyCliSafety(sub);
  attachLaunchOptions(sub);
  registerLaunchAction(sub);
  return cli;
}
