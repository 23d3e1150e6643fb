/**
 * Error types raised by the storage layer.
 * They never leave TaskStore: the store logs them and degrades to a no-op.
 */

export type StorageErrorKind = "unavailable" | "write_failed" | "duplicate_id";

export class StorageError extends Error {
  readonly kind: StorageErrorKind;

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.kind = kind;
  }
}

/**
 * Wrap any thrown value in a StorageError, keeping StorageErrors as they are.
 */
export function toStorageError(err: unknown, kind: StorageErrorKind = "write_failed"): StorageError {
  if (err instanceof StorageError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(kind, message, { cause: err });
}
