/**
 * Base error for everything the cache throws.
 */
export class CacheError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CacheError";
  }
}

export class KeyNotFoundError extends CacheError {
  constructor(readonly key: string) {
    super(`No entry for key "${key}"`);
    this.name = "KeyNotFoundError";
  }
}

/**
 * The key is live, or (structured keys) its path nests inside or around the
 * path of `conflictsWith`, which is live.
 */
export class KeyCollisionError extends CacheError {
  constructor(
    readonly key: string,
    readonly conflictsWith?: string,
  ) {
    super(
      conflictsWith === undefined
        ? `Key "${key}" is already live in the cache`
        : `Key "${key}" overlaps the path of live key "${conflictsWith}"`,
    );
    this.name = "KeyCollisionError";
  }
}

/** Thrown when a key is not acceptable for the configured key strategy. */
export class InvalidKeyError extends CacheError {
  constructor(
    readonly key: string | undefined,
    readonly reason: string,
  ) {
    super(key === undefined ? `Invalid key: ${reason}` : `Invalid key "${key}": ${reason}`);
    this.name = "InvalidKeyError";
  }
}

/** Thrown when a value can never fit, even in an empty cache. */
export class ValueTooLargeError extends CacheError {
  constructor(
    readonly size: number,
    readonly limit: number,
  ) {
    super(`Value of ${size} bytes exceeds the cache capacity of ${limit} bytes`);
    this.name = "ValueTooLargeError";
  }
}

export type StorageOperation = "write" | "read" | "delete";

/**
 * An I/O failure from the storage backend, tagged with the key and operation.
 * The original error is kept as `cause`.
 */
export class StorageFailureError extends CacheError {
  constructor(
    readonly key: string,
    readonly operation: StorageOperation,
    cause: unknown,
  ) {
    super(`Storage ${operation} failed for key "${key}": ${describeCause(cause)}`, { cause });
    this.name = "StorageFailureError";
  }
}

export type SerializationDirection = "encode" | "decode";

/** A value codec failed. Nothing is written when encoding fails. */
export class SerializationError extends CacheError {
  constructor(
    readonly key: string | undefined,
    readonly direction: SerializationDirection,
    cause: unknown,
  ) {
    super(
      `Could not ${direction} value${key === undefined ? "" : ` for key "${key}"`}: ${describeCause(cause)}`,
      { cause },
    );
    this.name = "SerializationError";
  }
}

/**
 * Aggregate raised by clear() when some entries could not be removed.
 * `survivors` are the keys still live afterwards.
 */
export class PartialFailureError extends CacheError {
  readonly survivors: string[];

  constructor(readonly failures: StorageFailureError[]) {
    super(
      `Failed to remove ${failures.length} ${failures.length === 1 ? "entry" : "entries"}: ${failures
        .map((f) => f.key)
        .join(", ")}`,
    );
    this.name = "PartialFailureError";
    this.survivors = failures.map((f) => f.key);
  }
}

/** Internal bookkeeping went out of sync. Always a bug. */
export class InvariantViolationError extends CacheError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

/** Thrown when constructor options fail validation. */
export class OptionValidationError extends CacheError {
  constructor(readonly issues: string[]) {
    super(`Invalid cache options: ${issues.join("; ")}`);
    this.name = "OptionValidationError";
  }
}

export class CacheInitError extends CacheError {
  constructor(
    readonly dir: string,
    cause?: unknown,
  ) {
    super(`Cannot use "${dir}" as a cache directory`, { cause });
    this.name = "CacheInitError";
  }
}

export class CacheClosedError extends CacheError {
  constructor() {
    super("Cache is closed");
    this.name = "CacheClosedError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
