// src/cli/launch/defaults.ts
import { venvPython } from '@/runner/exec/env';
import { shellQuote } from '@/runner/exec/run-command';

/** Built-in launch defaults (lowest precedence: flags > config > these). */
export const LAUNCH_DEFAULTS = {
  window: 'main',
  envPath: 'venv',
  manifest: 'requirements.txt',
  interpreter: 'python3',
  tmux: 'tmux',
  entry: 'main.py',
  lock: true,
  verifyManifest: false,
} as const;

/** Entry command: the environment's interpreter when there is one. */
export const defaultCommand = (envAbs?: string): string =>
  envAbs
    ? `${shellQuote(venvPython(envAbs))} ${LAUNCH_DEFAULTS.entry}`
    : `${LAUNCH_DEFAULTS.interpreter} ${LAUNCH_DEFAULTS.entry}`;
