import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { LaunchDeps, SessionManager } from '@/runner/launch';
import {
  createFakeLocks,
  FakeProvisioner,
  FakeSessionManager,
  makeTempDir,
  rmDirWithRetries,
} from '@/test';

import type { EffectiveLaunch } from './resolve';

const wiring = vi.hoisted(() => {
  const state: {
    deps?: LaunchDeps;
    sessions?: SessionManager;
    built: EffectiveLaunch[];
  } = { built: [] };
  return state;
});

vi.mock('@/cli/launch/deps', () => ({
  createLaunchDeps: (eff: EffectiveLaunch) => {
    wiring.built.push(eff);
    return wiring.deps;
  },
  createSessionManager: () => wiring.sessions,
}));

import { performLaunch } from './action';

describe('performLaunch', () => {
  let dir: string;
  let sessions: FakeSessionManager;
  let provisioner: FakeProvisioner;
  let logs: string[];
  let errors: string[];

  beforeEach(async () => {
    dir = await makeTempDir('launch');
    process.env.RELAUNCH_BORING = '1';
    sessions = new FakeSessionManager();
    provisioner = new FakeProvisioner();
    wiring.sessions = sessions;
    wiring.deps = {
      sessions,
      provisioner,
      acquireLock: createFakeLocks().acquireLock,
      generation: () => 'gen-1',
    };
    wiring.built = [];
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((m: string) => {
      logs.push(m);
    });
    vi.spyOn(console, 'error').mockImplementation((m: string) => {
      errors.push(m);
    });
    await writeFile(
      path.join(dir, 'relaunch.config.yml'),
      'session: bot\nenvironment:\n  path: venv\n',
      'utf8',
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rmDirWithRetries(dir);
  });

  it('provisions, creates and reports the session', async () => {
    const venv = path.join(dir, 'venv');
    const manifest = path.join(dir, 'requirements.txt');

    expect(await performLaunch({}, dir)).toBe(0);
    expect(logs).toEqual([
      'relaunch: lock /locks/bot.lock',
      `relaunch: environment ${venv} not found; creating`,
      `relaunch: environment ${venv} created`,
      `relaunch: installing dependencies from ${manifest}`,
      'relaunch: session "bot" not found',
      'relaunch: session "bot" created (window "main", generation gen-1)',
      `relaunch: ready session "bot" window "main": ${path.join(venv, 'bin', 'python')} main.py`,
    ]);
    expect(errors).toEqual([]);
    expect(sessions.sessions.get('bot')?.generation).toBe('gen-1');
  });

  it('prints the failure and returns the installer exit status', async () => {
    provisioner.failInstallWith = 3;

    expect(await performLaunch({}, dir)).toBe(3);
    expect(errors).toEqual([
      'relaunch: DependencyInstallFailed: pip install failed',
      'ERROR: No matching distribution found for nosuchpkg',
    ]);
    expect(sessions.calls).toEqual([]);
  });

  it('prints the plan on dry run without wiring any tools', async () => {
    expect(
      await performLaunch({ dryRun: true, env: false, lock: false }, dir),
    ).toBe(0);
    expect(wiring.built).toEqual([]);
    expect(logs).toHaveLength(1);
    expect(logs[0]?.split('\n')).toEqual([
      'relaunch:',
      '  relaunch plan',
      '  session: bot',
      '  window: main',
      '  command: python3 main.py',
      `  cwd: ${dir}`,
      '  environment: none',
      '  lock: no',
      '  steps: environment -> probe -> kill (if found) -> create',
    ]);
  });

  it('throws on config problems', async () => {
    await writeFile(path.join(dir, 'relaunch.config.yml'), 'window: w\n');
    await expect(performLaunch({}, dir)).rejects.toThrow(/no session name/);
  });
});
