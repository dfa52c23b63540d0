import type { PasteId } from '../types';

/**
 * Visitor for `forEach`. Returning `false` stops the iteration early.
 */
export type EntryVisitor = (id: PasteId, value: string) => boolean | void;

/** Reads that see one consistent state of the store. */
export interface ReadTx {
  readonly writable: boolean;
  get(id: PasteId): Promise<string | null>;
  /** Visits entries in ascending byte order of their decimal key. */
  forEach(visit: EntryVisitor): Promise<void>;
  /** Highest id handed out so far (0 if none). */
  sequence(): Promise<number>;
}

/** Buffered writes; nothing is visible to other transactions until the commit. */
export interface WriteTx extends ReadTx {
  /** Fresh id, strictly greater than every id issued before by this store. */
  nextSequence(): Promise<PasteId>;
  put(id: PasteId, value: string): void;
  delete(id: PasteId): void;
}

/**
 * Durable keyed persistence for serialized records.
 *
 * `view` runs `fn` against a read-only snapshot. `update` runs `fn` in a
 * writable transaction that is committed atomically when `fn` resolves and
 * discarded when it throws. Writers are serialized; readers never wait on
 * them. Commit or I/O failures reject with `StorageError`.
 */
export interface PasteStore {
  view<T>(fn: (tx: ReadTx) => Promise<T>): Promise<T>;
  update<T>(fn: (tx: WriteTx) => Promise<T>): Promise<T>;
  /** Liveness probe for health checks. */
  ping(): Promise<void>;
}
