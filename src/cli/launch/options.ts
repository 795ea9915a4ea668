// src/cli/launch/options.ts
import { type Command, Option } from 'commander';

import { tagDefault } from '@/cli/cli-utils';
import { loadConfigSync } from '@/cli/config/load';

import { LAUNCH_DEFAULTS } from './defaults';

/** Effective lock/verify defaults for help tagging (config > built-ins). */
const configuredDefaults = (): { lock: boolean; verifyManifest: boolean } => {
  try {
    const { config } = loadConfigSync(process.cwd());
    const env = config.environment === false ? undefined : config.environment;
    return {
      lock: config.lock ?? LAUNCH_DEFAULTS.lock,
      verifyManifest: env?.verifyManifest ?? LAUNCH_DEFAULTS.verifyManifest,
    };
  } catch {
    // Built-ins for help rendering; the action reports the config error.
    return {
      lock: LAUNCH_DEFAULTS.lock,
      verifyManifest: LAUNCH_DEFAULTS.verifyManifest,
    };
  }
};

/** Attach launch flags; paired boolean flags carry a (default) tag. */
export function attachLaunchOptions(sub: Command): void {
  sub
    .option('-s, --session <name>', 'session name (config: session)')
    .option(
      '-w, --window <name>',
      `window name (default: ${LAUNCH_DEFAULTS.window})`,
    )
    .option(
      '-c, --command <cmd>',
      `command run in the window (default: <env>/bin/python ${LAUNCH_DEFAULTS.entry})`,
    )
    .option('-e, --env <path>', 'virtual environment directory to ensure')
    .option('--no-env', 'skip environment provisioning')
    .option(
      '-m, --manifest <path>',
      `dependency manifest (default: ${LAUNCH_DEFAULTS.manifest})`,
    );

  const defs = configuredDefaults();

  const optVerify = new Option(
    '--verify-manifest',
    'reinstall into an existing environment when the manifest changed',
  );
  const optNoVerify = new Option(
    '--no-verify-manifest',
    'treat an existing environment as provisioned',
  );
  tagDefault(optVerify, defs.verifyManifest);
  tagDefault(optNoVerify, !defs.verifyManifest);

  const optLock = new Option(
    '--lock',
    'hold a per-session lock while launching',
  );
  const optNoLock = new Option('--no-lock', 'launch without the session lock');
  tagDefault(optLock, defs.lock);
  tagDefault(optNoLock, !defs.lock);

  sub
    .addOption(optVerify)
    .addOption(optNoVerify)
    .addOption(optLock)
    .addOption(optNoLock)
    .option('-n, --dry-run', 'print the launch plan and exit');
}
