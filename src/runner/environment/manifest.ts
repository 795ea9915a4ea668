/* src/runner/environment/manifest.ts
 * Manifest stamp: records which manifest contents an environment was
 * provisioned from, so drift can be detected on later launches.
 */
import { createHash } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { pathExists } from 'fs-extra';

import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_MANIFEST } from '@/runner/util/debug-scopes';

export const MANIFEST_STAMP_FILE = '.relaunch-manifest.sha256';

export const manifestStampPath = (envPath: string): string =>
  path.join(envPath, MANIFEST_STAMP_FILE);

/** SHA-256 (hex) of the manifest's bytes. */
export const manifestDigest = async (manifestPath: string): Promise<string> =>
  createHash('sha256')
    .update(await readFile(manifestPath))
    .digest('hex');

/** Record the manifest's current digest inside the environment. */
export const writeManifestStamp = async (
  envPath: string,
  manifestPath: string,
): Promise<string> => {
  const digest = await manifestDigest(manifestPath);
  await writeFile(manifestStampPath(envPath), `${digest}\n`, 'utf8');
  return digest;
};

/**
 * True when the environment carries a stamp equal to the manifest's digest.
 * A missing manifest or a missing stamp is never current.
 */
export const isManifestCurrent = async (
  envPath: string,
  manifestPath: string,
): Promise<boolean> => {
  const stamp = manifestStampPath(envPath);
  if (!(await pathExists(manifestPath)) || !(await pathExists(stamp))) {
    debugLog(DBG_SCOPE_MANIFEST, `no stamp or manifest for ${envPath}`);
    return false;
  }
  const [recorded, current] = await Promise.all([
    readFile(stamp, 'utf8'),
    manifestDigest(manifestPath),
  ]);
  const same = recorded.trim() === current;
  debugLog(
    DBG_SCOPE_MANIFEST,
    `${manifestPath} ${same ? 'matches' : 'differs from'} ${stamp}`,
  );
  return same;
};
