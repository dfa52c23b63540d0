import type Redis from 'ioredis';
import { StorageError, errorMessage } from '../errors';
import type { EntryVisitor, PasteStore, ReadTx, WriteTx } from '../contracts/pasteStore';
import type { PasteId } from '../types';

const filesKey = (prefix: string) => `${prefix}files`;
const sequenceKey = (prefix: string) => `${prefix}files:seq`;

const keyOf = (id: PasteId) => String(id);
const ID_KEY = /^\d+$/;

interface Snapshot {
  entries: Map<string, string>;
  sequence: number;
}

type ExecResult = [error: Error | null, result: unknown][] | null;

export interface RedisPasteStoreOptions {
  keyPrefix?: string;
}

/**
 * `PasteStore` on top of a single Redis hash plus an INCR counter.
 * Reads pin a MULTI snapshot; writes are buffered and flushed in one MULTI/EXEC.
 */
export class RedisPasteStore implements PasteStore {
  private readonly filesKey: string;
  private readonly sequenceKey: string;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly redis: Redis,
    opts: RedisPasteStoreOptions = {},
  ) {
    const prefix = opts.keyPrefix ?? 'paste:';
    this.filesKey = filesKey(prefix);
    this.sequenceKey = sequenceKey(prefix);
  }

  async view<T>(fn: (tx: ReadTx) => Promise<T>): Promise<T> {
    const snapshot = await this.snapshot();
    return fn(new SnapshotTx(snapshot));
  }

  update<T>(fn: (tx: WriteTx) => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(() => this.runUpdate(fn));
    // the queue only orders writers; the caller sees the failure through `run`
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  async ping(): Promise<void> {
    await guard('ping', () => this.redis.ping());
  }

  private async runUpdate<T>(fn: (tx: WriteTx) => Promise<T>): Promise<T> {
    const tx = new BufferedWriteTx(
      () => this.snapshot(),
      () => guard('next sequence', () => this.redis.incr(this.sequenceKey)),
    );
    const result = await fn(tx);
    await this.commit(tx.pending());
    return result;
  }

  private async commit(ops: ReadonlyMap<string, string | null>): Promise<void> {
    if (ops.size === 0) return;
    const res = await guard('commit', () => {
      const multi = this.redis.multi();
      for (const [key, value] of ops) {
        if (value === null) multi.hdel(this.filesKey, key);
        else multi.hset(this.filesKey, key, value);
      }
      return multi.exec();
    });
    unwrapExec('commit', res);
  }

  private async snapshot(): Promise<Snapshot> {
    const res = await guard('snapshot', () => this.redis.multi().hgetall(this.filesKey).get(this.sequenceKey).exec());
    const [hash, seq] = unwrapExec('snapshot', res);
    return { entries: toEntries(hash), sequence: toSequence(seq) };
  }
}

class SnapshotTx implements ReadTx {
  readonly writable = false;

  constructor(private readonly snap: Snapshot) {}

  async get(id: PasteId) {
    return this.snap.entries.get(keyOf(id)) ?? null;
  }

  async forEach(visit: EntryVisitor) {
    visitSorted(this.snap.entries, visit);
  }

  async sequence() {
    return this.snap.sequence;
  }
}

class BufferedWriteTx implements WriteTx {
  readonly writable = true;
  // key -> new value, or null for a delete
  private readonly ops = new Map<string, string | null>();
  private base: Snapshot | null = null;
  private issued = 0;

  constructor(
    private readonly loadSnapshot: () => Promise<Snapshot>,
    private readonly incr: () => Promise<number>,
  ) {}

  async get(id: PasteId) {
    const key = keyOf(id);
    if (this.ops.has(key)) return this.ops.get(key) ?? null;
    return (await this.committed()).entries.get(key) ?? null;
  }

  async forEach(visit: EntryVisitor) {
    const merged = new Map((await this.committed()).entries);
    for (const [key, value] of this.ops) {
      if (value === null) merged.delete(key);
      else merged.set(key, value);
    }
    visitSorted(merged, visit);
  }

  async sequence() {
    return Math.max((await this.committed()).sequence, this.issued);
  }

  async nextSequence() {
    this.issued = await this.incr();
    return this.issued;
  }

  put(id: PasteId, value: string) {
    assertId(id);
    this.ops.set(keyOf(id), value);
  }

  delete(id: PasteId) {
    assertId(id);
    this.ops.set(keyOf(id), null);
  }

  pending(): ReadonlyMap<string, string | null> {
    return this.ops;
  }

  private async committed() {
    if (!this.base) this.base = await this.loadSnapshot();
    return this.base;
  }
}

function visitSorted(entries: Map<string, string>, visit: EntryVisitor) {
  const keys = [...entries.keys()].filter((k) => ID_KEY.test(k)).sort();
  for (const key of keys) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (visit(Number(key), value) === false) return;
  }
}

function assertId(id: PasteId) {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new StorageError(`invalid record id: ${id}`);
  }
}

async function guard<T>(what: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(`${what} failed: ${errorMessage(err)}`, { cause: err });
  }
}

function unwrapExec(what: string, res: ExecResult): unknown[] {
  if (!res) throw new StorageError(`${what} failed: transaction aborted`);
  return res.map(([err, value]) => {
    if (err) throw new StorageError(`${what} failed: ${err.message}`, { cause: err });
    return value;
  });
}

function toEntries(value: unknown): Map<string, string> {
  const entries = new Map<string, string>();
  if (typeof value !== 'object' || value === null) return entries;
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string') entries.set(key, raw);
  }
  return entries;
}

function toSequence(value: unknown): number {
  if (value === null || value === undefined) return 0;
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new StorageError(`corrupt sequence counter: ${String(value)}`);
  }
  return n;
}
