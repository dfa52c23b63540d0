import { z } from 'zod';
import { RecordDecodeError } from '../errors';
import type { PasteId, PasteRecord } from '../types';

// 64-bit nanosecond values travel as decimal strings; JSON numbers lose precision past 2^53
const nanos = z
  .string()
  .regex(/^-?\d+$/, 'expected a decimal integer')
  .transform((v) => BigInt(v));

const storedSchema = z.object({
  name: z.string(),
  data: z.string(),
  access_password: z.string(),
  edit_password: z.string(),
  created_at: nanos,
  expires_after: nanos,
  edited_at: nanos,
});

/** Persisted shape of a record. The id is the storage key, not part of the value. */
export type StoredRecord = z.input<typeof storedSchema>;

export function serializeRecord(rec: PasteRecord): string {
  const stored: StoredRecord = {
    name: rec.name,
    data: rec.data,
    access_password: rec.accessPassword,
    edit_password: rec.editPassword,
    created_at: rec.createdAt.toString(),
    expires_after: rec.expiresAfter.toString(),
    edited_at: rec.editedAt.toString(),
  };
  return JSON.stringify(stored);
}

export function deserializeRecord(id: PasteId, raw: string): PasteRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new RecordDecodeError(`record ${id}: value is not JSON`, { cause: err });
  }

  const parsed = storedSchema.safeParse(json);
  if (!parsed.success) {
    throw new RecordDecodeError(`record ${id}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, {
      cause: parsed.error,
    });
  }

  const s = parsed.data;
  return {
    id,
    name: s.name,
    data: s.data,
    accessPassword: s.access_password,
    editPassword: s.edit_password,
    createdAt: s.created_at,
    expiresAfter: s.expires_after,
    editedAt: s.edited_at,
  };
}
