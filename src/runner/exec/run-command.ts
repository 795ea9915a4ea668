/* src/runner/exec/run-command.ts
 * Spawn an external tool, wait for it, and report exit code plus output.
 */
import { spawn } from 'node:child_process';

import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_EXEC } from '@/runner/util/debug-scopes';

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type RunCommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Mirror child output to this process's stdout/stderr while capturing. */
  stream?: boolean;
};

/**
 * Runs `file` with `args` (no shell). Resolves with the exit status once the
 * child has closed; rejects only when the child could not be spawned
 * (e.g. ENOENT for a missing binary).
 */
export type RunCommand = (
  file: string,
  args: readonly string[],
  opts?: RunCommandOptions,
) => Promise<CommandResult>;

/** POSIX single-quote a word unless it is plainly safe. */
export const shellQuote = (a: string): string =>
  /^[\w@%+=:,./-]+$/.test(a) ? a : `'${a.replace(/'/g, `'\\''`)}'`;

/** Render an argv for messages and trace output. */
export const formatArgv = (file: string, args: readonly string[]): string =>
  [file, ...args].map(shellQuote).join(' ');

export const runCommand: RunCommand = (file, args, opts) => {
  debugLog(DBG_SCOPE_EXEC, formatArgv(file, args));
  const child = spawn(file, [...args], {
    cwd: opts?.cwd,
    env: opts?.env ?? process.env,
    windowsHide: true,
  });
  // Nothing is ever written to the child.
  child.stdin.end();

  let stdout = '';
  let stderr = '';
  child.stdout.on('data', (d: Buffer) => {
    stdout += d.toString('utf8');
    if (opts?.stream) process.stdout.write(d);
  });
  child.stderr.on('data', (d: Buffer) => {
    stderr += d.toString('utf8');
    if (opts?.stream) process.stderr.write(d);
  });

  return new Promise<CommandResult>((resolveP, rejectP) => {
    child.on('error', (e) =>
      rejectP(e instanceof Error ? e : new Error(String(e))),
    );
    // Killed by a signal: report a failure rather than success.
    child.on('close', (code: number | null) =>
      resolveP({ code: code ?? 1, stdout, stderr }),
    );
  });
};

/** Message of a thrown value, e.g. "spawn tmux ENOENT". */
export const describeError = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
