/* src/runner/session/tmux.ts
 * tmux-backed SessionManager. Targets use the "=name" form so lookups match
 * the session name exactly rather than by prefix.
 */
import {
  type CommandResult,
  describeError,
  formatArgv,
  type RunCommand,
  runCommand,
} from '@/runner/exec/run-command';
import { LaunchError, type LaunchErrorKind } from '@/runner/launch/errors';
import {
  done,
  failure,
  type Result,
  success,
} from '@/runner/launch/result';
import type { SessionManager, SessionSpec } from '@/runner/launch/types';

/** Variable exported into every session created by the launcher. */
export const GENERATION_ENV = 'RELAUNCH_GENERATION';

export type TmuxSessionManagerOptions = {
  /** tmux binary (default "tmux"). */
  bin?: string;
  run?: RunCommand;
};

/** First tmux release whose new-session takes -e. */
export const MIN_TMUX_VERSION = '3.2';

// How tmux before 3.2 rejects `new-session -e`.
const OLD_TMUX_STDERR = /unknown option -- e|usage: new-session/;

const exactTarget = (name: string): string => `=${name}`;

export class TmuxSessionManager implements SessionManager {
  private readonly bin: string;
  private readonly run: RunCommand;

  constructor(opts: TmuxSessionManagerOptions = {}) {
    this.bin = opts.bin ?? 'tmux';
    this.run = opts.run ?? runCommand;
  }

  /** Run tmux; a spawn failure means tmux is unavailable. */
  private async tmux(
    args: string[],
  ): Promise<Result<CommandResult, LaunchError>> {
    try {
      return success(await this.run(this.bin, args));
    } catch (e) {
      return failure(
        new LaunchError(
          'SessionManagerUnavailable',
          `cannot run ${this.bin}: ${describeError(e)}`,
          { cause: e },
        ),
      );
    }
  }

  private nonZero(
    kind: LaunchErrorKind,
    args: string[],
    res: CommandResult,
    hint = '',
  ): Result<never, LaunchError> {
    return failure(
      new LaunchError(
        kind,
        `${formatArgv(this.bin, args)} exited with code ${res.code}${hint}`,
        { exitCode: res.code, stderr: res.stderr },
      ),
    );
  }

  async exists(name: string): Promise<Result<boolean, LaunchError>> {
    const args = ['has-session', '-t', exactTarget(name)];
    const res = await this.tmux(args);
    if (!res.ok) return res;
    // 1 covers both "no such session" and "no server running".
    if (res.value.code === 0) return success(true);
    if (res.value.code === 1) return success(false);
    return this.nonZero('SessionManagerUnavailable', args, res.value);
  }

  async kill(name: string): Promise<Result<void, LaunchError>> {
    const args = ['kill-session', '-t', exactTarget(name)];
    const res = await this.tmux(args);
    if (!res.ok) return res;
    if (res.value.code !== 0) {
      return this.nonZero('SessionKillFailed', args, res.value);
    }
    return done();
  }

  async create(spec: SessionSpec): Promise<Result<void, LaunchError>> {
    const args = [
      'new-session',
      '-d',
      '-s',
      spec.name,
      '-n',
      spec.window,
      '-c',
      spec.cwd,
      '-e',
      `${GENERATION_ENV}=${spec.generation}`,
      spec.command,
    ];
    const res = await this.tmux(args);
    if (!res.ok) return res;
    if (res.value.code !== 0) {
      const hint = OLD_TMUX_STDERR.test(res.value.stderr)
        ? ` (new-session -e needs tmux ${MIN_TMUX_VERSION} or later)`
        : '';
      return this.nonZero('SessionCreationFailed', args, res.value, hint);
    }
    return done();
  }
}
