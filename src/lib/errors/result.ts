/**
 * Result values for operations whose failures are part of the contract.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

/**
 * Type guard for successful results.
 */
export const isOk = <T, E>(result: Result<T, E>): result is { ok: true; value: T } => result.ok;
