/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog.
 * Tests reference these exact tokens in expectations.
 */

/** spawned command lines */
export const DBG_SCOPE_EXEC = 'exec';

/** launch pipeline step boundaries */
export const DBG_SCOPE_LAUNCH_STEP = 'launch:step';

/** session lock acquisition and stale-lock takeover */
export const DBG_SCOPE_LOCK = 'lock';

/** config discovery */
export const DBG_SCOPE_CONFIG_LOAD = 'config:load';

/** manifest stamp comparison */
export const DBG_SCOPE_MANIFEST = 'environment:manifest';
