// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Tagged Success/Failure Values
// ═══════════════════════════════════════════════════════════════════════════════
//
// Collectors and classifier calls return a Result instead of throwing for
// ordinary failures (rate limits, timeouts, empty replies). Exceptions are
// reserved for the fatal outcomes of a classification run.
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a value (Ok) or a typed failure (Err).
 *
 * @example
 * ```typescript
 * const outcome = await collector.fetch('edge computing');
 * if (outcome.ok) {
 *   console.log(outcome.value.known.mentions_30d);
 * } else {
 *   console.warn(outcome.error.reason);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSFORMATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map the error of an Err Result, leaving Ok untouched.
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  if (result.ok) {
    return result;
  }
  return err(fn(result.error));
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR MESSAGES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Human-readable message for an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
