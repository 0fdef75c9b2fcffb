/**
 * Elevations Service Error Types
 *
 * Caller errors are plain values with a discriminated `kind`; they are returned,
 * never thrown, and map 1:1 onto 400 responses at the HTTP boundary.
 *
 * Dependency failures (store lookup, population trigger) are exceptions, since
 * the engine cannot continue without knowing availability.
 */

export type RequestErrorKind =
  | 'MalformedRequest'
  | 'ResolutionOutOfRange'
  | 'CellLimitExceeded'
  | 'InvalidCellIdentifier'
  | 'EmptyCoverage';

export interface RequestError {
  readonly kind: RequestErrorKind;
  readonly message: string;
  readonly details?: unknown;
}

export type Result<T, E = RequestError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = RequestError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function requestError(
  kind: RequestErrorKind,
  message: string,
  details?: unknown
): RequestError {
  return details === undefined ? { kind, message } : { kind, message, details };
}

/**
 * A collaborator the engine depends on raised or timed out
 */
export class DependencyFailureError extends Error {
  readonly dependency: string;

  constructor(dependency: string, cause: Error) {
    super(`Dependency '${dependency}' failed: ${cause.message}`, { cause });
    this.name = 'DependencyFailureError';
    this.dependency = dependency;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DependencyFailureError);
    }
  }
}

/**
 * Thrown by withTimeout when the wrapped operation does not settle in time
 */
export class OperationTimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
