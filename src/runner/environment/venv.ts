/* src/runner/environment/venv.ts
 * Python virtual environment provisioning (python -m venv + pip).
 */
import { stat } from 'node:fs/promises';
import path from 'node:path';

import { pathExists } from 'fs-extra';

import { buildActivatedEnv, venvPython } from '@/runner/exec/env';
import {
  type CommandResult,
  describeError,
  formatArgv,
  type RunCommand,
  runCommand,
} from '@/runner/exec/run-command';
import { LaunchError } from '@/runner/launch/errors';
import { done, failure, type Result } from '@/runner/launch/result';
import type { EnvironmentProvisioner } from '@/runner/launch/types';

import { isManifestCurrent, writeManifestStamp } from './manifest';

export type VenvProvisionerOptions = {
  /** Interpreter used to create environments (default "python3"). */
  interpreter?: string;
  /** Base for relative environment and manifest paths. */
  cwd?: string;
  /** Parent environment the activated env is derived from. */
  env?: NodeJS.ProcessEnv;
  /** Mirror venv/pip output to the terminal. */
  stream?: boolean;
  run?: RunCommand;
};

export class VenvProvisioner implements EnvironmentProvisioner {
  private readonly interpreter: string;
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly stream: boolean;
  private readonly run: RunCommand;

  constructor(opts: VenvProvisionerOptions = {}) {
    this.interpreter = opts.interpreter ?? 'python3';
    this.cwd = opts.cwd ?? process.cwd();
    this.env = opts.env ?? process.env;
    this.stream = opts.stream ?? false;
    this.run = opts.run ?? runCommand;
  }

  private abs(p: string): string {
    return path.resolve(this.cwd, p);
  }

  async exists(envPath: string): Promise<boolean> {
    const abs = this.abs(envPath);
    if (!(await pathExists(abs))) return false;
    return (await stat(abs)).isDirectory();
  }

  async create(
    envPath: string,
    label: string,
  ): Promise<Result<void, LaunchError>> {
    const args = ['-m', 'venv', '--prompt', label, this.abs(envPath)];
    let res: CommandResult;
    try {
      res = await this.run(this.interpreter, args, {
        cwd: this.cwd,
        env: this.env,
        stream: this.stream,
      });
    } catch (e) {
      return failure(
        new LaunchError(
          'EnvironmentCreationFailed',
          `cannot run ${this.interpreter}: ${describeError(e)}`,
          { cause: e },
        ),
      );
    }
    if (res.code !== 0) {
      return failure(
        new LaunchError(
          'EnvironmentCreationFailed',
          `${formatArgv(this.interpreter, args)} exited with code ${res.code}`,
          { exitCode: res.code, stderr: res.stderr },
        ),
      );
    }
    return done();
  }

  async install(
    envPath: string,
    manifestPath: string,
  ): Promise<Result<void, LaunchError>> {
    const envAbs = this.abs(envPath);
    const manifestAbs = this.abs(manifestPath);
    if (!(await pathExists(manifestAbs))) {
      return failure(
        new LaunchError(
          'DependencyInstallFailed',
          `manifest ${manifestAbs} not found`,
        ),
      );
    }
    const python = venvPython(envAbs);
    const args = ['-m', 'pip', 'install', '-r', manifestAbs];
    let res: CommandResult;
    try {
      res = await this.run(python, args, {
        cwd: this.cwd,
        env: buildActivatedEnv(envAbs, this.env),
        stream: this.stream,
      });
    } catch (e) {
      return failure(
        new LaunchError(
          'DependencyInstallFailed',
          `cannot run ${python}: ${describeError(e)}`,
          { cause: e },
        ),
      );
    }
    if (res.code !== 0) {
      return failure(
        new LaunchError(
          'DependencyInstallFailed',
          `pip install -r ${manifestAbs} exited with code ${res.code}`,
          { exitCode: res.code, stderr: res.stderr },
        ),
      );
    }
    try {
      await writeManifestStamp(envAbs, manifestAbs);
    } catch (e) {
      return failure(
        new LaunchError(
          'DependencyInstallFailed',
          `dependencies installed but the manifest stamp could not be written: ${describeError(e)}`,
          { cause: e },
        ),
      );
    }
    return done();
  }

  isCurrent(envPath: string, manifestPath: string): Promise<boolean> {
    return isManifestCurrent(this.abs(envPath), this.abs(manifestPath));
  }
}
