/**
 * Result Pattern
 * Discriminated union returned by clients and the prober instead of throwing
 */

/**
 * The error side defaults to a message string.
 */
export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

export const Success = <T, E = string>(value: T): Result<T, E> => ({ ok: true, value });

export const Failure = <T, E = string>(error: E): Result<T, E> => ({ ok: false, error });
