// src/cli/launch/deps.ts
import { VenvProvisioner } from '@/runner/environment/venv';
import type { LaunchDeps, SessionManager } from '@/runner/launch';
import { createLockAcquirer } from '@/runner/lock/session-lock';
import { TmuxSessionManager } from '@/runner/session/tmux';

import type { EffectiveLaunch } from './resolve';

export const createSessionManager = (tmux: string): SessionManager =>
  new TmuxSessionManager({ bin: tmux });

/** Wire the real tools (tmux, python venv/pip, lock files) for a launch. */
export const createLaunchDeps = (eff: EffectiveLaunch): LaunchDeps => ({
  sessions: createSessionManager(eff.tmux),
  provisioner: new VenvProvisioner({
    interpreter: eff.interpreter,
    cwd: eff.options.cwd,
    stream: true,
  }),
  acquireLock: createLockAcquirer({ lockDir: eff.lockDir }),
});
