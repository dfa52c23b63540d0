/** Store-assigned sequence number. 0 means "not persisted yet". */
export type PasteId = number;

/** UTC Unix time or a duration, in nanoseconds. */
export type Nanos = bigint;

export interface PasteRecord {
  id: PasteId;
  name: string;
  data: string;
  accessPassword: string; // '' = anyone may read
  editPassword: string;   // '' = nobody may edit or delete
  createdAt: Nanos;
  expiresAfter: Nanos;    // 0n = never expires
  editedAt: Nanos;        // 0n = never edited
}

// Input for a new paste; id and timestamps are assigned on upload
export interface UploadArgs {
  data: string;
  name?: string;
  expiresAfter?: Nanos;
  /** Expiry in seconds as submitted; parsed after the name is claimed. Wins over `expiresAfter`. */
  expiresIn?: string;
  accessPassword?: string;
  editPassword?: string;
}

export type Clock = () => Nanos;

export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MILLISECOND = 1_000_000n;
