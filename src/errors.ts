// src/errors.ts
export class ImgLedgerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ImgLedgerError";
  }
}

export class IoError extends ImgLedgerError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`I/O error on '${path}': ${describeError(cause)}`, "IO_ERROR", {
      cause,
    });
    this.name = "IoError";
  }
}

export class HashUnavailableError extends ImgLedgerError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      `Could not compute hash for '${path}': ${describeError(cause)}`,
      "HASH_UNAVAILABLE",
      { cause },
    );
    this.name = "HashUnavailableError";
  }
}

export class MetadataUnavailableError extends ImgLedgerError {
  constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(
      cause === undefined
        ? `Could not extract metadata for '${path}'`
        : `Could not extract metadata for '${path}': ${describeError(cause)}`,
      "METADATA_UNAVAILABLE",
      { cause },
    );
    this.name = "MetadataUnavailableError";
  }
}

export class StorageError extends ImgLedgerError {
  constructor(message: string, cause?: unknown) {
    super(
      cause === undefined ? message : `${message}: ${describeError(cause)}`,
      "STORAGE_ERROR",
      { cause },
    );
    this.name = "StorageError";
  }
}

export class CancelledError extends ImgLedgerError {
  constructor(message = "Operation cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

export class ConfigError extends ImgLedgerError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

export class CatalogMismatchError extends ImgLedgerError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(
      `Catalog was built with hash '${expected}' but '${actual}' was requested`,
      "CATALOG_MISMATCH",
    );
    this.name = "CatalogMismatchError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/** True for our own CancelledError and for Node's AbortError. */
export function isCancellation(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  return (
    err instanceof Error &&
    (err.name === "AbortError" ||
      ("code" in err && err.code === "ABORT_ERR"))
  );
}
