import { secondsToNanos } from '../clock';
import { PasteError } from '../errors';
import type { Nanos, PasteRecord } from '../types';

const INT64_MAX = 2n ** 63n - 1n;
const INT64_MIN = -(2n ** 63n);

type Timed = Pick<PasteRecord, 'createdAt' | 'expiresAfter'>;

export function isExpired(rec: Timed, now: Nanos): boolean {
  return rec.expiresAfter !== 0n && now > rec.createdAt + rec.expiresAfter;
}

/**
 * True once a record has been expired for longer than `grace`,
 * i.e. the reaper may physically remove it.
 */
export function isReapable(rec: Timed, now: Nanos, grace: Nanos): boolean {
  return rec.expiresAfter !== 0n && now > rec.createdAt + rec.expiresAfter + grace;
}

/** An empty access password leaves the paste readable by anyone. */
export function allowsAccess(rec: Pick<PasteRecord, 'accessPassword'>, password = ''): boolean {
  return rec.accessPassword === '' || password === rec.accessPassword;
}

/** An empty edit password makes the paste immutable, even for an empty guess. */
export function allowsEdit(rec: Pick<PasteRecord, 'editPassword'>, password = ''): boolean {
  return rec.editPassword !== '' && password === rec.editPassword;
}

/** Parses an expiry given in whole seconds. Empty means "never expires". */
export function parseExpirySeconds(raw: string): Nanos {
  if (raw === '') return 0n;
  if (!/^[+-]?\d+$/.test(raw)) throw new PasteError('invalid_expiry');
  const seconds = BigInt(raw);
  if (seconds > INT64_MAX || seconds < INT64_MIN) throw new PasteError('invalid_expiry');
  if (seconds < 0n) throw new PasteError('negative_expiry');
  return secondsToNanos(seconds);
}
