/**
 * packages/core/src/errors.ts — Engine error class and result helpers.
 *
 * Why: Engine-level violations (bad configuration, lifecycle misuse, platform
 * failures, shutdown overruns) surface as one error class with a closed
 * `code`, so callers can branch without string matching.
 */

/**
 * Deterministic error codes for engine-level failures.
 */
export type TermlineErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_STATE"
  | "PLATFORM_ERROR"
  | "SHUTDOWN_TIMEOUT"
  | "SERIALIZE_ERROR"
  | "TASK_FAULT";

export class TermlineError extends Error {
  override readonly name = "TermlineError";
  readonly code: TermlineErrorCode;

  constructor(code: TermlineErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TermlineError);
    }
  }
}

/** Discriminated result used by parse-style operations instead of throwing. */
export type Result<T, E> = Readonly<{ ok: true; value: T }> | Readonly<{ ok: false; error: E }>;

export function ok<T>(value: T): Readonly<{ ok: true; value: T }> {
  return Object.freeze({ ok: true as const, value });
}

export function err<E>(error: E): Readonly<{ ok: false; error: E }> {
  return Object.freeze({ ok: false as const, error });
}

/** Render an unknown thrown value as "Name: message". */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
