/* src/runner/launch/errors.ts
 * Launch failure taxonomy. Every failure is fatal to the launch attempt.
 */

export type LaunchErrorKind =
  | 'EnvironmentCreationFailed'
  | 'DependencyInstallFailed'
  | 'SessionManagerUnavailable'
  | 'SessionKillFailed'
  | 'SessionCreationFailed'
  | 'SessionLocked';

export class LaunchError extends Error {
  readonly kind: LaunchErrorKind;
  /** Exit status of the failing external tool, when it ran. */
  readonly exitCode?: number;
  /** Captured stderr of the failing external tool. */
  readonly stderr?: string;

  constructor(
    kind: LaunchErrorKind,
    message: string,
    details?: { exitCode?: number; stderr?: string; cause?: unknown },
  ) {
    super(message, { cause: details?.cause });
    this.name = 'LaunchError';
    this.kind = kind;
    this.exitCode = details?.exitCode;
    this.stderr = details?.stderr;
  }
}

/** Process exit status to report for a failed launch (never 0). */
export const exitStatusOf = (e: LaunchError): number =>
  typeof e.exitCode === 'number' && e.exitCode !== 0 ? e.exitCode : 1;
