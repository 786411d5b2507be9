/**
 * Outcome of decoding one persisted line
 *
 * `notes` lists recoveries applied to an otherwise usable record (a defaulted
 * balance, an ignored field); the store logs them.
 */
export type DecodeResult<T> =
  | { ok: true; value: T; notes: string[] }
  | { ok: false; reason: string };

export const decoded = <T>(value: T, notes: string[] = []): DecodeResult<T> => ({
  ok: true,
  value,
  notes,
});

export const malformed = <T>(reason: string): DecodeResult<T> => ({ ok: false, reason });
