/* Root CLI factory for "relaunch".
 * - Registers launch (default), status and init.
 * - Never calls process.exit; actions set process.exitCode.
 */
import { Command, Option } from 'commander';

import { applyCliSafety, rootDefaults, tagDefault } from './cli-utils';
import { registerInit } from './init';
import { registerLaunch } from './launch';
import { registerStatus } from './status';

/**
 * Build the root CLI without side effects (safe for tests).
 * Global `--debug` and `--boring` defaults come from `cliDefaults` in
 * relaunch.config.*; explicit flags win.
 */
export const makeCli = (): Command => {
  const cli = new Command();
  const { debugDefault, boringDefault } = rootDefaults(process.cwd());

  cli
    .name('relaunch')
    .description(
      'Recreate a detached tmux session (tmux 3.2 or later) running your entry point, provisioning its Python virtual environment first when it is missing.',
    );

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option(
    '-D, --no-debug',
    'disable verbose debug logging',
  );
  tagDefault(debugDefault ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(boringDefault ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  applyCliSafety(cli);

  // Resolve -d/-b before any subcommand action: flags > env > config.
  cli.hook('preAction', () => {
    const opts = cli.opts<{ debug?: boolean; boring?: boolean }>();
    const fromCli = (name: 'debug' | 'boring'): boolean | undefined =>
      cli.getOptionValueSource(name) === 'cli'
        ? Boolean(opts[name])
        : undefined;

    const debugFinal =
      fromCli('debug') ??
      (process.env.RELAUNCH_DEBUG === '1' || debugDefault);
    const boringFinal =
      fromCli('boring') ??
      (process.env.RELAUNCH_BORING === '1' || boringDefault);

    if (debugFinal) process.env.RELAUNCH_DEBUG = '1';
    else delete process.env.RELAUNCH_DEBUG;
    if (boringFinal) {
      process.env.RELAUNCH_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    } else {
      delete process.env.RELAUNCH_BORING;
    }
  });

  registerLaunch(cli);
  registerStatus(cli);
  registerInit(cli);

  return cli;
};
