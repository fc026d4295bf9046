/** Expected failures travel as values; unexpected ones are thrown. */
export type Outcome<T, E extends Error = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const Outcome = {
  ok: <T>(value: T): { readonly ok: true; readonly value: T } => ({ ok: true, value }),
  fail: <E extends Error>(error: E): { readonly ok: false; readonly error: E } => ({
    ok: false,
    error,
  }),
};
