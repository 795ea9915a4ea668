/* src/runner/lock/session-lock.ts
 * Filesystem lock keyed by session name. Serializes launches that target the
 * same session; a lock left behind by a dead process is taken over.
 */
import { readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ensureDir, remove } from 'fs-extra';
import { z } from 'zod';

import { describeError } from '@/runner/exec/run-command';
import { LaunchError } from '@/runner/launch/errors';
import { failure, type Result, success } from '@/runner/launch/result';
import type { AcquireLock, SessionLock } from '@/runner/launch/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_LOCK } from '@/runner/util/debug-scopes';

const lockRecordSchema = z.object({
  pid: z.number().int().positive(),
  name: z.string(),
  acquiredAt: z.string(),
});
export type LockRecord = z.infer<typeof lockRecordSchema>;

export const lockFileName = (name: string): string =>
  `relaunch-${name.replace(/[^A-Za-z0-9_.-]/g, '_')}.lock`;

const hasCode = (e: unknown, code: string): boolean =>
  e instanceof Error && 'code' in e && e.code === code;

/** Signal 0 probes for existence; EPERM still means the process exists. */
export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return hasCode(e, 'EPERM');
  }
};

/** Parse the owner record; null when the file is gone or not a lock record. */
export const readLockOwner = async (
  file: string,
): Promise<LockRecord | null> => {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (e) {
    if (hasCode(e, 'ENOENT')) return null;
    throw e;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  const res = lockRecordSchema.safeParse(parsed);
  return res.success ? res.data : null;
};

const heldLock = (file: string): SessionLock => {
  let released = false;
  return {
    path: file,
    release: async () => {
      if (released) return;
      released = true;
      await remove(file);
      debugLog(DBG_SCOPE_LOCK, `released ${file}`);
    },
  };
};

export type LockOptions = {
  /** Directory for lock files (default: the OS temp directory). */
  lockDir?: string;
  isAlive?: (pid: number) => boolean;
};

export const createLockAcquirer = (opts: LockOptions = {}): AcquireLock => {
  const lockDir = opts.lockDir ?? os.tmpdir();
  const isAlive = opts.isAlive ?? isProcessAlive;

  const acquire = async (
    name: string,
    file: string,
  ): Promise<Result<SessionLock, LaunchError>> => {
    await ensureDir(lockDir);
    const record: LockRecord = {
      pid: process.pid,
      name,
      acquiredAt: new Date().toISOString(),
    };

    // Second pass only after removing a stale lock.
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        await writeFile(file, JSON.stringify(record), {
          encoding: 'utf8',
          flag: 'wx',
        });
        debugLog(DBG_SCOPE_LOCK, `acquired ${file}`);
        return success(heldLock(file));
      } catch (e) {
        if (!hasCode(e, 'EEXIST')) throw e;
      }
      const owner = await readLockOwner(file);
      if (owner && isAlive(owner.pid)) {
        return failure(
          new LaunchError(
            'SessionLocked',
            `session "${name}" is being launched by process ${owner.pid} (lock ${file})`,
          ),
        );
      }
      debugLog(DBG_SCOPE_LOCK, `removing stale lock ${file}`);
      await remove(file);
    }
    return failure(
      new LaunchError('SessionLocked', `could not acquire lock ${file}`),
    );
  };

  return async (name) => {
    const file = path.join(lockDir, lockFileName(name));
    try {
      return await acquire(name, file);
    } catch (e) {
      return failure(
        new LaunchError(
          'SessionLocked',
          `cannot create lock ${file}: ${describeError(e)}`,
          { cause: e },
        ),
      );
    }
  };
};
