/**
 * Explicit success-or-error value used instead of exceptions for expected branching.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export const ok = <T>(value: T): { readonly ok: true; readonly value: T } => {
  return { ok: true, value }
}

export const err = <E>(error: E): { readonly ok: false; readonly error: E } => {
  return { ok: false, error }
}
