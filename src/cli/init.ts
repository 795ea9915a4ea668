/** src/cli/init.ts
 * "relaunch init": write relaunch.config.yml with the built-in defaults.
 */
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import YAML from 'yaml';

import { configPathIn } from '@/cli/config/load';
import type { LaunchConfig } from '@/cli/config/schema';

import { applyCliSafety } from './cli-utils';
import { LAUNCH_DEFAULTS } from './launch/defaults';

export const INIT_FILE_NAME = 'relaunch.config.yml';

/** Session name from a directory name, restricted to [A-Za-z0-9_-]. */
export const deriveSessionName = (dir: string): string => {
  const base = path
    .basename(path.resolve(dir))
    .replace(/[^A-Za-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return base || 'session';
};

export const buildInitialConfig = (dir: string): LaunchConfig => ({
  session: deriveSessionName(dir),
  window: LAUNCH_DEFAULTS.window,
  command: `${LAUNCH_DEFAULTS.envPath}/bin/python ${LAUNCH_DEFAULTS.entry}`,
  environment: {
    path: LAUNCH_DEFAULTS.envPath,
    manifest: LAUNCH_DEFAULTS.manifest,
    interpreter: LAUNCH_DEFAULTS.interpreter,
    verifyManifest: LAUNCH_DEFAULTS.verifyManifest,
  },
  lock: LAUNCH_DEFAULTS.lock,
});

export type InitResult = { target: string; text: string; written: boolean };

/**
 * Write (or with dryRun, only print) the initial config.
 *
 * @returns null when a config already exists and force is not set.
 */
export async function performInit(opts: {
  cwd?: string;
  force?: boolean;
  dryRun?: boolean;
}): Promise<InitResult | null> {
  const cwd = opts.cwd ?? process.cwd();
  const existing = configPathIn(cwd);
  if (existing && !opts.force) {
    console.error(
      `relaunch: ${existing} already exists; use --force to overwrite`,
    );
    return null;
  }
  const target = path.join(cwd, INIT_FILE_NAME);
  const text = YAML.stringify(buildInitialConfig(cwd));
  if (opts.dryRun) {
    console.log(`relaunch: would write ${target}\n${text}`);
    return { target, text, written: false };
  }
  await writeFile(target, text, 'utf8');
  console.log(`relaunch: wrote ${target}`);
  return { target, text, written: true };
}

export function registerInit(cli: Command): Command {
  const sub = cli
    .command('init')
    .description('Create relaunch.config.yml with default settings')
    .option('-f, --force', 'overwrite an existing config')
    .option('-n, --dry-run', 'print the config instead of writing it');
  applyCliSafety(sub);
  sub.action(async (opts: { force?: boolean; dryRun?: boolean }) => {
    const res = await performInit({
      force: Boolean(opts.force),
      dryRun: Boolean(opts.dryRun),
    });
    if (!res) process.exitCode = 1;
  });
  return cli;
}
