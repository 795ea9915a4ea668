/* src/runner/launch/events.ts
 * Operator-facing status lines for launch events (plain text; callers style).
 */
import type { LaunchEvent } from './types';

export const describeEvent = (e: LaunchEvent): string => {
  switch (e.type) {
    case 'lock-acquired':
      return `lock ${e.path}`;
    case 'env-found':
      return `environment ${e.path} found`;
    case 'env-missing':
      return `environment ${e.path} not found; creating`;
    case 'env-stale':
      return `environment ${e.path} is out of date with ${e.manifest}; reinstalling`;
    case 'env-created':
      return `environment ${e.path} created`;
    case 'deps-installing':
      return `installing dependencies from ${e.manifest}`;
    case 'session-found':
      return `session "${e.name}" found; killing`;
    case 'session-missing':
      return `session "${e.name}" not found`;
    case 'session-killed':
      return `session "${e.name}" killed`;
    case 'session-created':
      return `session "${e.name}" created (window "${e.window}", generation ${e.generation})`;
  }
};
