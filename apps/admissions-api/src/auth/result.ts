/**
 * Explicit success/failure value returned by the auth components in place
 * of thrown exceptions. The HTTP layer decides how each reason is surfaced.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function fail<E>(reason: E): { readonly ok: false; readonly reason: E } {
  return { ok: false, reason };
}
