/* src/cli/launch/resolve.ts
 * Merge flags > config > built-ins into concrete launch options.
 * Flag paths resolve against the working directory; config paths against
 * the config file's directory.
 */
import path from 'node:path';

import { formatZodError, type LoadedConfig } from '@/cli/config/load';
import { type LaunchConfig, sessionNameSchema } from '@/cli/config/schema';
import type { LaunchOptions } from '@/runner/launch';

import { defaultCommand, LAUNCH_DEFAULTS } from './defaults';

export type LaunchFlags = {
  session?: string;
  window?: string;
  command?: string;
  /** Path from --env, or false from --no-env. */
  env?: string | false;
  manifest?: string;
  verifyManifest?: boolean;
  lock?: boolean;
  dryRun?: boolean;
};

export type EffectiveLaunch = {
  options: LaunchOptions;
  interpreter: string;
  tmux: string;
  lockDir?: string;
};

export const resolveSessionName = (
  flag: string | undefined,
  config: LaunchConfig,
): string => {
  const raw = flag ?? config.session;
  if (raw === undefined) {
    throw new Error(
      'relaunch: no session name; pass --session <name> or set "session" in relaunch.config.yml',
    );
  }
  const parsed = sessionNameSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `relaunch: invalid session name "${raw}"\n${formatZodError(parsed.error)}`,
    );
  }
  return parsed.data;
};

export const resolveTmuxBin = (
  config: LaunchConfig,
  env: NodeJS.ProcessEnv = process.env,
): string => {
  const fromEnv = env.RELAUNCH_TMUX_BIN?.trim();
  return fromEnv || config.tmux || LAUNCH_DEFAULTS.tmux;
};

export const resolveLaunch = (
  flags: LaunchFlags,
  loaded: LoadedConfig,
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): EffectiveLaunch => {
  const { config, dir } = loaded;
  const fromCwd = (p: string) => path.resolve(cwd, p);
  const fromConfig = (p: string) => path.resolve(dir, p);
  const envConfig =
    config.environment === false ? undefined : config.environment;

  let envPath: string | undefined;
  if (typeof flags.env === 'string') {
    envPath = fromCwd(flags.env);
  } else if (flags.env !== false && config.environment !== false) {
    // Provisioning is on unless --no-env or `environment: false` says not.
    envPath = fromConfig(envConfig?.path ?? LAUNCH_DEFAULTS.envPath);
  }

  // A manifest only matters when there is an environment to install into.
  const configManifest = envConfig?.manifest;
  let manifestPath: string | undefined;
  if (envPath && typeof flags.manifest === 'string') {
    manifestPath = fromCwd(flags.manifest);
  } else if (envPath && configManifest !== false) {
    manifestPath = fromConfig(configManifest ?? LAUNCH_DEFAULTS.manifest);
  }

  const options: LaunchOptions = {
    name: resolveSessionName(flags.session, config),
    window: flags.window ?? config.window ?? LAUNCH_DEFAULTS.window,
    command: flags.command ?? config.command ?? defaultCommand(envPath),
    cwd: dir,
    envPath,
    manifestPath,
    verifyManifest:
      flags.verifyManifest ??
      envConfig?.verifyManifest ??
      LAUNCH_DEFAULTS.verifyManifest,
    lock: flags.lock ?? config.lock ?? LAUNCH_DEFAULTS.lock,
  };

  return {
    options,
    interpreter: envConfig?.interpreter ?? LAUNCH_DEFAULTS.interpreter,
    tmux: resolveTmuxBin(config, env),
    lockDir: config.lockDir ? fromConfig(config.lockDir) : undefined,
  };
};
