/** Shared Commander helpers for the relaunch CLI. */
import { type Command, CommanderError, type Option } from 'commander';

import { loadConfigSync } from '@/cli/config/load';

/**
 * Make Commander throw instead of calling process.exit (safe in tests);
 * bin/relaunch.ts maps the thrown error to an exit code.
 */
export function applyCliSafety(cmd: Command): void {
  cmd.exitOverride();
}

/** Exit status for an error escaping parseAsync. */
export const exitCodeForError = (e: unknown): number =>
  e instanceof CommanderError ? e.exitCode : 1;

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** Root-level boolean defaults (debug/boring) from config or built-ins. */
export const rootDefaults = (
  dir: string,
): { debugDefault: boolean; boringDefault: boolean } => {
  try {
    const cli = loadConfigSync(dir).config.cliDefaults;
    return {
      debugDefault: cli?.debug ?? false,
      boringDefault: cli?.boring ?? false,
    };
  } catch {
    // Built-ins for help rendering; the action reports the config error.
    return { debugDefault: false, boringDefault: false };
  }
};
