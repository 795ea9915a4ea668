/* src/cli/config/load.ts
 * Discover and validate relaunch.config.* (nearest ancestor wins).
 */
import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { type LaunchConfig, launchConfigSchema } from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/runner/util/debug-scopes';

/** Candidate names, checked in this order in each directory. */
export const CONFIG_FILE_NAMES = [
  'relaunch.config.yml',
  'relaunch.config.yaml',
  'relaunch.config.json',
] as const;

export type LoadedConfig = {
  /** Absolute config path, or null when none was found. */
  path: string | null;
  /** Base for relative paths: the config's directory, else cwd. */
  dir: string;
  config: LaunchConfig;
};

/** Config file directly inside `dir` (no ancestor search). */
export const configPathIn = (dir: string): string | null => {
  for (const name of CONFIG_FILE_NAMES) {
    const p = path.join(dir, name);
    if (existsSync(p)) return p;
  }
  return null;
};

/** Resolve the nearest relaunch.config.* walking up from `cwd`. */
export const findConfigPathSync = (cwd: string): string | null => {
  let cur = path.resolve(cwd);
  for (;;) {
    const hit = configPathIn(cur);
    if (hit) return hit;
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};

export const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

const parseConfig = (cfgPath: string, text: string): LaunchConfig => {
  const rel = cfgPath.replace(/\\/g, '/');
  let node: unknown;
  try {
    node = parseText(cfgPath, text);
  } catch (e) {
    throw new Error(`relaunch: cannot parse ${rel}\n${String(e)}`, {
      cause: e,
    });
  }
  try {
    return launchConfigSchema.parse(node);
  } catch (e) {
    throw new Error(
      `relaunch: invalid config in ${rel}\n${formatZodError(e)}`,
      { cause: e },
    );
  }
};

const loaded = (
  cwd: string,
  cfgPath: string | null,
  config: LaunchConfig,
): LoadedConfig => ({
  path: cfgPath,
  dir: cfgPath ? path.dirname(cfgPath) : path.resolve(cwd),
  config,
});

/** Load and validate the nearest config; an absent config is an empty one. */
export const loadConfig = async (cwd: string): Promise<LoadedConfig> => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) {
    debugLog(DBG_SCOPE_CONFIG_LOAD, `no config found from ${cwd}`);
    return loaded(cwd, null, {});
  }
  debugLog(DBG_SCOPE_CONFIG_LOAD, `using ${cfgPath}`);
  const text = await readFile(cfgPath, 'utf8');
  return loaded(cwd, cfgPath, parseConfig(cfgPath, text));
};

/** Synchronous variant for CLI construction/help default tagging. */
export const loadConfigSync = (cwd: string): LoadedConfig => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) return loaded(cwd, null, {});
  const text = readFileSync(cfgPath, 'utf8');
  return loaded(cwd, cfgPath, parseConfig(cfgPath, text));
};
