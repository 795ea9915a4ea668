/* src/runner/launch/steps.ts
 * The launch pipeline's ordered steps. Each returns a Result; the pipeline
 * stops at the first failure and never revisits an earlier step.
 */
import { describeError } from '@/runner/exec/run-command';

import { LaunchError } from './errors';
import { done, failure, type Result, success } from './result';
import type {
  EnvironmentOutcome,
  LaunchDeps,
  LaunchEvent,
  LaunchOptions,
} from './types';

export type LaunchContext = {
  readonly options: LaunchOptions;
  readonly deps: LaunchDeps;
  readonly emit: (event: LaunchEvent) => void;
  readonly generation: string;
  environment: EnvironmentOutcome;
  sessionExists: boolean;
  killed: boolean;
};

export type LaunchStep = {
  name: string;
  run: (ctx: LaunchContext) => Promise<Result<void, LaunchError>>;
};

/** A stamp that cannot be read fails the launch like a failed install. */
const checkCurrent = async (
  ctx: LaunchContext,
  envPath: string,
  manifest: string,
): Promise<Result<boolean, LaunchError>> => {
  try {
    return success(await ctx.deps.provisioner.isCurrent(envPath, manifest));
  } catch (e) {
    return failure(
      new LaunchError(
        'DependencyInstallFailed',
        `cannot verify ${envPath} against ${manifest}: ${describeError(e)}`,
        { cause: e },
      ),
    );
  }
};

const installDeps = async (
  ctx: LaunchContext,
  envPath: string,
  manifest: string,
): Promise<Result<void, LaunchError>> => {
  ctx.emit({ type: 'deps-installing', path: envPath, manifest });
  return ctx.deps.provisioner.install(envPath, manifest);
};

/** Create and provision the environment when missing (or stale, when verifying). */
export const provisionEnvironment: LaunchStep = {
  name: 'environment',
  run: async (ctx) => {
    const { envPath, manifestPath, name, verifyManifest } = ctx.options;
    if (!envPath) return done();
    const { provisioner } = ctx.deps;

    if (await provisioner.exists(envPath)) {
      ctx.emit({ type: 'env-found', path: envPath });
      ctx.environment = 'existing';
      if (verifyManifest === true && manifestPath) {
        const current = await checkCurrent(ctx, envPath, manifestPath);
        if (!current.ok) return failure(current.error);
        if (current.value) return done();
        ctx.emit({ type: 'env-stale', path: envPath, manifest: manifestPath });
        const installed = await installDeps(ctx, envPath, manifestPath);
        if (!installed.ok) return failure(installed.error);
        ctx.environment = 'refreshed';
      }
      return done();
    }

    ctx.emit({ type: 'env-missing', path: envPath });
    const created = await provisioner.create(envPath, name);
    if (!created.ok) return failure(created.error);
    ctx.emit({ type: 'env-created', path: envPath });
    if (manifestPath) {
      const installed = await installDeps(ctx, envPath, manifestPath);
      if (!installed.ok) return failure(installed.error);
    }
    ctx.environment = 'created';
    return done();
  },
};

export const probeSession: LaunchStep = {
  name: 'probe',
  run: async (ctx) => {
    const { name } = ctx.options;
    const found = await ctx.deps.sessions.exists(name);
    if (!found.ok) return failure(found.error);
    ctx.sessionExists = found.value;
    ctx.emit({ type: found.value ? 'session-found' : 'session-missing', name });
    return done();
  },
};

/** Unconditional teardown of a session found by probeSession. */
export const killExisting: LaunchStep = {
  name: 'kill',
  run: async (ctx) => {
    if (!ctx.sessionExists) return done();
    const { name } = ctx.options;
    const killed = await ctx.deps.sessions.kill(name);
    if (!killed.ok) return failure(killed.error);
    ctx.killed = true;
    ctx.emit({ type: 'session-killed', name });
    return done();
  },
};

export const createSession: LaunchStep = {
  name: 'create',
  run: async (ctx) => {
    const { name, window, command, cwd } = ctx.options;
    const created = await ctx.deps.sessions.create({
      name,
      window,
      command,
      cwd,
      generation: ctx.generation,
    });
    if (!created.ok) return failure(created.error);
    ctx.emit({
      type: 'session-created',
      name,
      window,
      generation: ctx.generation,
    });
    return done();
  },
};

export const LAUNCH_STEPS: readonly LaunchStep[] = [
  provisionEnvironment,
  probeSession,
  killExisting,
  createSession,
];
