import { systemClock } from '../clock';
import { PasteError, StorageError } from '../errors';
import { NamingIndex, isUniqueIn } from '../naming';
import { randomName, type RandomSource } from '../naming/random';
import { allowsAccess, allowsEdit, isExpired, parseExpirySeconds } from '../policy/lifecycle';
import { serializeRecord } from '../records/codec';
import type { PasteStore } from '../contracts/pasteStore';
import type { Clock, PasteRecord, UploadArgs } from '../types';

export interface PasteServiceOptions {
  store: PasteStore;
  clock?: Clock;
  random?: RandomSource;
  nameLength?: number;
  maxNameAttempts?: number;
  /** Names that can never be claimed, e.g. because a route already lives there. */
  reservedNames?: Iterable<string>;
}

/**
 * Upload, read, edit and delete pastes by name.
 *
 * Every call re-reads the record from the store. Edits are fetch, check,
 * write with no lock held in between, so two concurrent edits of one
 * paste race and the last commit wins.
 */
export class PasteService {
  readonly names: NamingIndex;
  private readonly store: PasteStore;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly nameLength: number;
  private readonly maxNameAttempts: number;
  private readonly reserved: ReadonlySet<string>;

  constructor(opts: PasteServiceOptions) {
    this.store = opts.store;
    this.names = new NamingIndex(opts.store);
    this.clock = opts.clock ?? systemClock;
    this.random = opts.random ?? Math.random;
    this.nameLength = opts.nameLength ?? 3;
    this.maxNameAttempts = opts.maxNameAttempts ?? 1000;
    this.reserved = new Set(opts.reservedNames ?? []);
  }

  /**
   * Stores a new paste and returns the name it can be fetched by.
   * The name is claimed before `expiresIn` is parsed, so a taken name wins
   * over a malformed expiry.
   */
  async upload(args: UploadArgs): Promise<string> {
    const createdAt = this.clock();
    const chosen = args.name || undefined;
    let name = chosen !== undefined ? await this.claimName(chosen) : await this.generateName();

    const expiresAfter = args.expiresIn !== undefined ? parseExpirySeconds(args.expiresIn) : args.expiresAfter ?? 0n;
    if (expiresAfter < 0n) {
      throw new PasteError('negative_expiry', 'expiration must not be negative');
    }

    const rec: PasteRecord = {
      id: 0,
      name,
      data: args.data,
      accessPassword: args.accessPassword ?? '',
      editPassword: args.editPassword ?? '',
      createdAt,
      expiresAfter,
      editedAt: 0n,
    };
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.insert({ ...rec, name });
        return name;
      } catch (err) {
        // a generated name lost a race with another upload: draw again
        if (chosen !== undefined || !(err instanceof PasteError) || err.code !== 'name_taken') throw err;
        if (attempt >= this.maxNameAttempts) throw this.exhausted();
        name = await this.generateName();
      }
    }
  }

  async retrieve(name: string, accessPassword?: string): Promise<string> {
    const rec = await this.open(name);
    if (isExpired(rec, this.clock())) throw new PasteError('gone');
    if (!allowsAccess(rec, accessPassword)) throw new PasteError('unauthorized');
    return rec.data;
  }

  async edit(name: string, data: string, editPassword?: string): Promise<void> {
    const rec = await this.open(name);
    const now = this.clock();
    if (isExpired(rec, now)) throw new PasteError('gone');
    if (!allowsEdit(rec, editPassword)) throw new PasteError('unauthorized');

    await this.save({ ...rec, data, editedAt: now });
  }

  async remove(name: string, editPassword?: string): Promise<void> {
    const rec = await this.open(name);
    if (!allowsEdit(rec, editPassword)) throw new PasteError('unauthorized');

    await this.store.update(async (tx) => {
      tx.delete(rec.id);
    });
  }

  /** Persists `rec`, assigning an id first if it has none. Returns the stored record. */
  async save(rec: PasteRecord): Promise<PasteRecord> {
    const value = serializeRecord(rec);
    return this.store.update(async (tx) => {
      const id = rec.id === 0 ? await tx.nextSequence() : rec.id;
      tx.put(id, value);
      return { ...rec, id };
    });
  }

  private async open(name: string): Promise<PasteRecord> {
    const rec = await this.names.findByName(name);
    if (!rec) throw new PasteError('not_found');
    return rec;
  }

  /** Assigns an id and writes `rec`, re-checking its name inside the same write. */
  private async insert(rec: PasteRecord): Promise<PasteRecord> {
    const value = serializeRecord(rec);
    return this.store.update(async (tx) => {
      if (!(await isUniqueIn(tx, 'name', rec.name))) throw this.taken(rec.name);
      const id = await tx.nextSequence();
      tx.put(id, value);
      return { ...rec, id };
    });
  }

  private async claimName(name: string): Promise<string> {
    if (this.reserved.has(name) || !(await this.names.isUnique('name', name))) {
      throw this.taken(name);
    }
    return name;
  }

  private async generateName(): Promise<string> {
    for (let attempt = 0; attempt < this.maxNameAttempts; attempt += 1) {
      const candidate = randomName(this.nameLength, this.random);
      if (this.reserved.has(candidate)) continue;
      if (await this.names.isUnique('name', candidate)) return candidate;
    }
    throw this.exhausted();
  }

  private taken(name: string) {
    return new PasteError('name_taken', `name "${name}" is already taken`);
  }

  private exhausted() {
    return new StorageError(`no free ${this.nameLength}-character name after ${this.maxNameAttempts} attempts`);
  }
}
