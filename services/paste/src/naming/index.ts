import { RecordDecodeError, StorageError } from '../errors';
import { deserializeRecord } from '../records/codec';
import type { PasteStore, ReadTx } from '../contracts/pasteStore';
import type { PasteRecord } from '../types';

/** Record fields a uniqueness check can compare against. */
export type RecordField = 'name' | 'data' | 'accessPassword' | 'editPassword';

export function selectField(rec: PasteRecord, field: RecordField): string {
  switch (field) {
    case 'name':
      return rec.name;
    case 'data':
      return rec.data;
    case 'accessPassword':
      return rec.accessPassword;
    case 'editPassword':
      return rec.editPassword;
  }
}

/**
 * Name lookups by full scan of the store. Linear in the number of stored
 * records; there is no secondary index.
 */
export class NamingIndex {
  constructor(private readonly store: PasteStore) {}

  /**
   * Walks ids from the newest down, so the most recent record wins if a
   * name ever appears twice. A corrupt entry aborts the lookup.
   */
  async findByName(name: string): Promise<PasteRecord | null> {
    return this.store.view(async (tx) => {
      for (let id = await tx.sequence(); id > 0; id -= 1) {
        const raw = await tx.get(id);
        if (!raw) continue;
        let rec: PasteRecord;
        try {
          rec = deserializeRecord(id, raw);
        } catch (err) {
          throw new StorageError(`lookup of "${name}" hit an unreadable record`, { cause: err });
        }
        if (rec.name === name) return rec;
      }
      return null;
    });
  }

  /** Corrupt entries are skipped here rather than failing the check. */
  async isUnique(field: RecordField, value: string): Promise<boolean> {
    return this.store.view((tx) => isUniqueIn(tx, field, value));
  }
}

/** Uniqueness scan against an open transaction, so a writer can re-check before it inserts. */
export async function isUniqueIn(tx: ReadTx, field: RecordField, value: string): Promise<boolean> {
  let unique = true;
  await tx.forEach((id, raw) => {
    let rec: PasteRecord;
    try {
      rec = deserializeRecord(id, raw);
    } catch (err) {
      if (err instanceof RecordDecodeError) return true;
      throw err;
    }
    if (selectField(rec, field) === value) {
      unique = false;
      return false;
    }
    return true;
  });
  return unique;
}
