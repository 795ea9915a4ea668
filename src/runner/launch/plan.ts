// src/runner/launch/plan.ts
import { bold } from '@/runner/util/color';

import type { LaunchOptions } from './types';

/**
 * Render a readable, multi-line summary of what a launch would do (pure).
 * Printed by `relaunch --dry-run` instead of running anything.
 */
export const renderLaunchPlan = (options: LaunchOptions): string => {
  const header = bold('relaunch plan');
  const env = options.envPath
    ? [
        `environment: ${options.envPath}`,
        `manifest: ${options.manifestPath ?? 'none'}`,
        `verify manifest: ${options.verifyManifest === true ? 'yes' : 'no'}`,
      ]
    : ['environment: none'];

  const lines = [
    header,
    `session: ${options.name}`,
    `window: ${options.window}`,
    `command: ${options.command}`,
    `cwd: ${options.cwd}`,
    ...env,
    `lock: ${options.lock === false ? 'no' : 'yes'}`,
    'steps: environment -> probe -> kill (if found) -> create',
  ];
  return `relaunch:\n  ${lines.join('\n  ')}`;
};
