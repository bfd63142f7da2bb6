/**
 * Error taxonomy returned by the connection probe.
 */

export const MAX_ERROR_OUTPUT_LENGTH = 240;

export abstract class ForwardError extends Error {
  abstract readonly kind: 'InvalidTarget' | 'LaunchFailed' | 'NonZeroExit';
}

export class InvalidTargetError extends ForwardError {
  readonly kind = 'InvalidTarget' as const;

  constructor() {
    super('Missing or invalid SSH target');
    this.name = 'InvalidTargetError';
  }
}

export class LaunchFailedError extends ForwardError {
  readonly kind = 'LaunchFailed' as const;

  constructor(readonly reason: string) {
    super(`ssh failed to start: ${reason}`);
    this.name = 'LaunchFailedError';
  }
}

export class NonZeroExitError extends ForwardError {
  readonly kind = 'NonZeroExit' as const;
  readonly output: string;

  constructor(readonly code: number, output: string) {
    const clipped = output.slice(0, MAX_ERROR_OUTPUT_LENGTH);
    super(
      clipped.length === 0
        ? `ssh exited with code ${code}`
        : `ssh exited with code ${code}: ${clipped}`
    );
    this.name = 'NonZeroExitError';
    this.output = clipped;
  }
}

export type ForwardFailure =
  | InvalidTargetError
  | LaunchFailedError
  | NonZeroExitError;

/**
 * Thrown by the process runner when the executable could not be started at
 * all (missing binary, permission denied, process table exhausted).
 */
export class ProcessLaunchError extends Error {
  readonly code?: string;

  constructor(readonly executable: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause));
    this.name = 'ProcessLaunchError';
    if (cause instanceof Error && 'code' in cause) {
      this.code = String(cause.code);
    }
  }
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
