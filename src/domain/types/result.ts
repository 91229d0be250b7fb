/**
 * Result type shared by the infrastructure clients and pipeline stages.
 *
 * Expected failures (a build that exits non-zero, a registry that rejects a
 * push) travel as `Failure` values; only programming errors throw.
 */

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/** Create a failure result */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

/** Type guard to check if result is a failure */
export const isFail = <T>(result: Result<T>): result is { ok: false; error: string } => !result.ok;

/**
 * Message of an unknown thrown value, for `Failure(...)` and log fields
 */
export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  // Errors from Node's own modules are not instances of a sandbox's Error
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' && error.length > 0 ? error : fallback;
}
