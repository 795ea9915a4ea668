/* src/runner/util/color.ts
 * Styling for relaunch status lines. Plain text under -b/--boring, NO_COLOR,
 * FORCE_COLOR=0, or when stdout is piped (tests, cron, CI logs).
 */
import chalk from 'chalk';

export function isBoring(): boolean {
  const env = process.env;
  if (env.RELAUNCH_BORING === '1') return true;
  if (env.NO_COLOR === '1' || env.FORCE_COLOR === '0') return true;
  // Checked per call: output can move between a terminal and a pipe.
  return !process.stdout.isTTY;
}

/** Semantic aliases (unstyled in BORING/non-TTY) */
export function ok(s: string): string {
  return isBoring() ? s : chalk.green(s);
}
export function alert(s: string): string {
  return isBoring() ? s : chalk.cyan(s);
}
export function go(s: string): string {
  return isBoring() ? s : chalk.blue(s);
}
export function error(s: string): string {
  return isBoring() ? s : chalk.red(s);
}
export function warn(s: string): string {
  return isBoring() ? s : chalk.hex('#FFA500')(s);
} // orange

/** Text styles (unstyled in BORING/non-TTY) */
export function bold(s: string): string {
  return isBoring() ? s : chalk.bold(s);
}
export function dim(s: string): string {
  return isBoring() ? s : chalk.dim(s);
}
