/* src/runner/util/debug.ts
 * Opt-in debug tracing. Emits only when RELAUNCH_DEBUG=1.
 */

export const debugEnabled = (): boolean => process.env.RELAUNCH_DEBUG === '1';

/** Trace a message under a scope label (see debug-scopes.ts); stderr only. */
export const debugLog = (scope: string, message: string): void => {
  if (!debugEnabled()) return;
  console.error(`relaunch: debug: ${scope}: ${message}`);
};
