/* src/runner/exec/env.ts
 * Child environment for commands run "inside" a virtual environment.
 * Activation is scoped to the child: the launcher's own env is never touched.
 */
import { delimiter, join } from 'node:path';

/** Directory holding the environment's interpreter and console scripts. */
export const venvBinDir = (envPath: string): string =>
  join(envPath, process.platform === 'win32' ? 'Scripts' : 'bin');

/** Interpreter inside the environment. */
export const venvPython = (envPath: string): string =>
  join(
    venvBinDir(envPath),
    process.platform === 'win32' ? 'python.exe' : 'python',
  );

/**
 * Build the env an activate script would produce: VIRTUAL_ENV set, the
 * environment's bin directory first on PATH, PYTHONHOME unset.
 */
export const buildActivatedEnv = (
  envPath: string,
  parentEnv: NodeJS.ProcessEnv,
): NodeJS.ProcessEnv => {
  // Windows may expose PATH as "Path"
  const origPath = parentEnv.PATH ?? parentEnv.Path ?? '';
  const env: NodeJS.ProcessEnv = { ...parentEnv };
  delete env.PYTHONHOME;
  delete env.Path;
  return {
    ...env,
    VIRTUAL_ENV: envPath,
    PATH: [venvBinDir(envPath), origPath].filter(Boolean).join(delimiter),
  };
};
