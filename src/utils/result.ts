/**
 * Typed result for operations that can fail in an expected way.
 *
 * Services return `err(...)` for domain failures (stale button, no stock, bad input)
 * and reserve `throw` for faults such as an unreachable store.
 *
 * ```typescript
 * const res = await claimEngine.approve(listingId, claimId);
 * if (!res.ok) return res;
 * const { listing, claim } = res.value;
 * ```
 */
export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });
