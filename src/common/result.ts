/**
 * Outcome of a decode call.
 * Decoders return failures as values so callers can branch on the error code
 * without try/catch around every parse.
 */
export type DecodeResult<T, E extends Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(
  error: E,
): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
