// src/cli/launch/print.ts
import {
  describeEvent,
  type LaunchError,
  type LaunchEvent,
  type LaunchReport,
} from '@/runner/launch';
import { alert, dim, error, go, ok, warn } from '@/runner/util/color';

const styleFor = (e: LaunchEvent): ((s: string) => string) => {
  switch (e.type) {
    case 'lock-acquired':
      return dim;
    case 'env-created':
    case 'session-created':
      return ok;
    case 'env-stale':
    case 'session-found':
    case 'session-killed':
      return warn;
    case 'env-missing':
    case 'deps-installing':
      return go;
    default:
      return alert;
  }
};

export const printEvent = (e: LaunchEvent): void => {
  console.log(`relaunch: ${styleFor(e)(describeEvent(e))}`);
};

/** Failure line plus the tool's own stderr, when it produced any. */
export const printFailure = (e: LaunchError): void => {
  console.error(`relaunch: ${error(e.kind)}: ${e.message}`);
  const tail = e.stderr?.trim();
  if (tail) console.error(dim(tail));
};

export const printReport = (r: LaunchReport): void => {
  console.log(
    `relaunch: ${ok('ready')} session "${r.session}" window "${r.window}": ${r.command}`,
  );
};
