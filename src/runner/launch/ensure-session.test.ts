import { describe, expect, it, vi } from 'vitest';

import {
  createFakeLocks,
  FakeProvisioner,
  FakeSessionManager,
} from '@/test';

import { ensureSession } from './ensure-session';
import { exitStatusOf } from './errors';
import type { LaunchDeps, LaunchEvent, LaunchOptions } from './types';

const ENV = '/srv/bot/venv';
const MANIFEST = '/srv/bot/requirements.txt';

const baseOptions: LaunchOptions = {
  name: 'bot',
  window: 'main',
  command: 'venv/bin/python main.py',
  cwd: '/srv/bot',
  envPath: ENV,
  manifestPath: MANIFEST,
};

const setup = (held?: Set<string>) => {
  const log: string[] = [];
  const sessions = new FakeSessionManager(log);
  const provisioner = new FakeProvisioner(log);
  const locks = createFakeLocks(held);
  let n = 0;
  const deps: LaunchDeps = {
    sessions,
    provisioner,
    acquireLock: locks.acquireLock,
    generation: () => `gen-${++n}`,
  };
  const events: LaunchEvent[] = [];
  const hooks = { onEvent: (e: LaunchEvent) => events.push(e) };
  return { log, sessions, provisioner, locks, deps, events, hooks };
};

describe('ensureSession', () => {
  it('provisions a missing environment, then creates the session (fresh host)', async () => {
    const t = setup();
    const res = await ensureSession(baseOptions, t.deps, t.hooks);

    expect(res).toEqual({
      ok: true,
      value: {
        session: 'bot',
        window: 'main',
        command: 'venv/bin/python main.py',
        generation: 'gen-1',
        environment: 'created',
        killed: false,
      },
    });
    expect(t.log).toEqual([
      `env-exists:${ENV}`,
      `env-create:${ENV}:bot`,
      `env-install:${ENV}:${MANIFEST}`,
      'exists:bot',
      'create:bot',
    ]);
    expect(t.provisioner.envs.get(ENV)).toEqual([MANIFEST]);
    expect([...t.sessions.sessions.entries()]).toEqual([
      [
        'bot',
        {
          window: 'main',
          command: 'venv/bin/python main.py',
          generation: 'gen-1',
        },
      ],
    ]);
    expect(t.events.map((e) => e.type)).toEqual([
      'lock-acquired',
      'env-missing',
      'env-created',
      'deps-installing',
      'session-missing',
      'session-created',
    ]);
    expect(t.locks.released).toEqual(['bot']);
  });

  it('skips provisioning and replaces a running session when both exist', async () => {
    const t = setup();
    t.provisioner.envs.set(ENV, [MANIFEST]);
    t.sessions.sessions.set('bot', {
      window: 'old',
      command: 'sleep 100',
      generation: 'gen-0',
    });

    const res = await ensureSession(baseOptions, t.deps, t.hooks);

    expect(res.ok && res.value.environment).toBe('existing');
    expect(res.ok && res.value.killed).toBe(true);
    expect(t.log).toEqual([
      `env-exists:${ENV}`,
      'exists:bot',
      'kill:bot',
      'create:bot',
    ]);
    expect(t.sessions.sessions.size).toBe(1);
    expect(t.sessions.sessions.get('bot')).toEqual({
      window: 'main',
      command: 'venv/bin/python main.py',
      generation: 'gen-1',
    });
    expect(t.events.map((e) => e.type)).toEqual([
      'lock-acquired',
      'env-found',
      'session-found',
      'session-killed',
      'session-created',
    ]);
  });

  it('stops before touching any session when dependency install fails', async () => {
    const t = setup();
    t.provisioner.failInstallWith = 3;

    const res = await ensureSession(baseOptions, t.deps, t.hooks);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe('DependencyInstallFailed');
    expect(exitStatusOf(res.error)).toBe(3);
    expect(t.sessions.calls).toEqual([]);
    // The half-provisioned environment is left in place.
    expect(t.provisioner.envs.has(ENV)).toBe(true);
    expect(t.locks.released).toEqual(['bot']);
  });

  it('stops before installing or touching sessions when environment creation fails', async () => {
    const t = setup();
    t.provisioner.failCreate = true;

    const res = await ensureSession(baseOptions, t.deps);

    expect(!res.ok && res.error.kind).toBe('EnvironmentCreationFailed');
    expect(t.log).toEqual([`env-exists:${ENV}`, `env-create:${ENV}:bot`]);
  });

  it('fails at the existence check when tmux is unreachable, keeping the new environment', async () => {
    const t = setup();
    t.sessions.unavailable = true;

    const res = await ensureSession(baseOptions, t.deps);

    expect(!res.ok && res.error.kind).toBe('SessionManagerUnavailable');
    expect(t.sessions.calls).toEqual(['exists:bot']);
    expect(t.provisioner.envs.get(ENV)).toEqual([MANIFEST]);
  });

  it('never provisions when no environment path is given', async () => {
    const t = setup();
    const res = await ensureSession(
      { ...baseOptions, envPath: undefined, manifestPath: undefined },
      t.deps,
    );

    expect(res.ok && res.value.environment).toBe('absent');
    expect(t.provisioner.calls).toEqual([]);
    expect(t.sessions.calls).toEqual(['exists:bot', 'create:bot']);
  });

  it('creates an environment without installing when there is no manifest', async () => {
    const t = setup();
    const res = await ensureSession(
      { ...baseOptions, manifestPath: undefined },
      t.deps,
    );

    expect(res.ok && res.value.environment).toBe('created');
    expect(t.provisioner.calls).toEqual([
      `env-exists:${ENV}`,
      `env-create:${ENV}:bot`,
    ]);
  });

  it('does not consult the manifest stamp unless verification is on', async () => {
    const t = setup();
    t.provisioner.envs.set(ENV, [MANIFEST]);
    t.provisioner.current = false;

    await ensureSession(baseOptions, t.deps);

    expect(t.provisioner.calls).toEqual([`env-exists:${ENV}`]);
  });

  it('reinstalls once into an existing environment whose manifest changed', async () => {
    const t = setup();
    t.provisioner.envs.set(ENV, [MANIFEST]);
    t.provisioner.current = false;

    const res = await ensureSession(
      { ...baseOptions, verifyManifest: true },
      t.deps,
      t.hooks,
    );

    expect(res.ok && res.value.environment).toBe('refreshed');
    expect(t.provisioner.calls).toEqual([
      `env-exists:${ENV}`,
      `env-current:${ENV}:${MANIFEST}`,
      `env-install:${ENV}:${MANIFEST}`,
    ]);
    expect(t.events.map((e) => e.type).slice(0, 4)).toEqual([
      'lock-acquired',
      'env-found',
      'env-stale',
      'deps-installing',
    ]);
  });

  it('leaves a current environment alone when verifying', async () => {
    const t = setup();
    t.provisioner.envs.set(ENV, [MANIFEST]);

    const res = await ensureSession(
      { ...baseOptions, verifyManifest: true },
      t.deps,
    );

    expect(res.ok && res.value.environment).toBe('existing');
    expect(t.provisioner.calls).toEqual([
      `env-exists:${ENV}`,
      `env-current:${ENV}:${MANIFEST}`,
    ]);
  });

  it('fails the launch when the manifest stamp cannot be read', async () => {
    const t = setup();
    t.provisioner.envs.set(ENV, [MANIFEST]);
    vi.spyOn(t.provisioner, 'isCurrent').mockRejectedValue(
      new Error('EACCES: permission denied'),
    );

    const res = await ensureSession(
      { ...baseOptions, verifyManifest: true },
      t.deps,
    );

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe('DependencyInstallFailed');
    expect(res.error.message).toBe(
      `cannot verify ${ENV} against ${MANIFEST}: EACCES: permission denied`,
    );
    expect(t.sessions.calls).toEqual([]);
    expect(t.locks.released).toEqual(['bot']);
  });

  it('does not create when the old session cannot be killed', async () => {
    const t = setup();
    t.sessions.sessions.set('bot', {
      window: 'main',
      command: 'x',
      generation: 'gen-0',
    });
    t.sessions.failKill = true;

    const res = await ensureSession(baseOptions, t.deps);

    expect(!res.ok && res.error.kind).toBe('SessionKillFailed');
    expect(t.sessions.calls).toEqual(['exists:bot', 'kill:bot']);
  });

  it('leaves the session killed when recreation fails', async () => {
    const t = setup();
    t.provisioner.envs.set(ENV, []);
    t.sessions.sessions.set('bot', {
      window: 'main',
      command: 'x',
      generation: 'gen-0',
    });
    t.sessions.failCreate = true;

    const res = await ensureSession(baseOptions, t.deps);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe('SessionCreationFailed');
    expect(res.error.stderr).toBe('duplicate session');
    expect(exitStatusOf(res.error)).toBe(1);
    expect(t.sessions.sessions.has('bot')).toBe(false);
  });

  it('refuses to run while another launcher holds the session lock', async () => {
    const t = setup(new Set(['bot']));

    const res = await ensureSession(baseOptions, t.deps, t.hooks);

    expect(!res.ok && res.error.kind).toBe('SessionLocked');
    expect(t.log).toEqual([]);
    expect(t.events).toEqual([]);
  });

  it('ignores the lock table when locking is disabled', async () => {
    const t = setup(new Set(['bot']));

    const res = await ensureSession({ ...baseOptions, lock: false }, t.deps);

    expect(res.ok).toBe(true);
    expect(t.locks.released).toEqual([]);
  });

  it('converges on one session with a new generation on every run', async () => {
    const t = setup();

    const first = await ensureSession(baseOptions, t.deps);
    const second = await ensureSession(baseOptions, t.deps);

    expect(first.ok && first.value.generation).toBe('gen-1');
    expect(second.ok && second.value.generation).toBe('gen-2');
    expect(second.ok && second.value.killed).toBe(true);
    expect(second.ok && second.value.environment).toBe('existing');
    expect(t.sessions.sessions.size).toBe(1);
    expect(t.sessions.sessions.get('bot')?.generation).toBe('gen-2');
    expect(t.provisioner.envs.get(ENV)).toEqual([MANIFEST]);
  });

  it('assigns a random UUID generation by default', async () => {
    const t = setup();
    const res = await ensureSession(baseOptions, {
      ...t.deps,
      generation: undefined,
    });

    expect(res.ok && res.value.generation).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it('releases the lock when a step throws', async () => {
    const t = setup();
    vi.spyOn(t.sessions, 'exists').mockRejectedValue(new Error('boom'));

    await expect(ensureSession(baseOptions, t.deps)).rejects.toThrow('boom');
    expect(t.locks.released).toEqual(['bot']);
    expect(t.locks.held.size).toBe(0);
  });
});
