/** Failure codes the paste operations report to callers. */
export type PasteErrorCode =
  | 'not_found'
  | 'gone'
  | 'unauthorized'
  | 'name_taken'
  | 'invalid_expiry'
  | 'negative_expiry';

/** A client-facing failure: bad input, refused credentials, or a missing/expired paste. */
export class PasteError extends Error {
  readonly code: PasteErrorCode;

  constructor(code: PasteErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'PasteError';
    this.code = code;
  }
}

/** Anything that went wrong talking to the store. Never shown to clients in detail. */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/** A stored value that is not a valid serialized record. */
export class RecordDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordDecodeError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
