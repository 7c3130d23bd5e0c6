import { createHash, randomUUID } from "crypto";
import { join } from "path";
import { InvalidKeyError } from "./errors.js";

/**
 * How keys are produced:
 * - "random": the cache mints a UUID per put(); callers never choose keys.
 * - "structured": the caller's key is used as a relative path under the cache dir.
 */
export type KeyStrategy = "random" | "structured";

export const MAX_KEY_LENGTH = 1024;
export const MAX_SEGMENT_BYTES = 255;

// Windows-reserved characters plus ASCII control characters
const RESERVED_CHARS = /[<>:"|?*\\\u0000-\u001f\u007f]/;

/**
 * Check that a structured key is safe to use as a relative path.
 * @throws InvalidKeyError
 */
export function validateStructuredKey(key: string): void {
  if (key.length === 0) {
    throw new InvalidKeyError(key, "key is empty");
  }
  if (key.length > MAX_KEY_LENGTH) {
    throw new InvalidKeyError(key, `key is longer than ${MAX_KEY_LENGTH} characters`);
  }
  if (RESERVED_CHARS.test(key)) {
    throw new InvalidKeyError(key, "key contains a reserved character");
  }

  for (const segment of key.split("/")) {
    if (segment === "") {
      throw new InvalidKeyError(key, "key has an empty path segment");
    }
    if (segment === "." || segment === "..") {
      throw new InvalidKeyError(key, `"${segment}" segments are not allowed`);
    }
    if (Buffer.byteLength(segment, "utf8") > MAX_SEGMENT_BYTES) {
      throw new InvalidKeyError(key, `path segment exceeds ${MAX_SEGMENT_BYTES} bytes`);
    }
  }
}

/**
 * Keys whose files would be directories on the way to `key`'s file:
 * `"a/b/c"` gives `["a", "a/b"]`.
 */
export function ancestorKeys(key: string): string[] {
  const segments = key.split("/");
  return segments.slice(1).map((_, i) => segments.slice(0, i + 1).join("/"));
}

// First four digest bytes, folded into `shards` buckets, as a 2-digit hex dir
function shardOf(key: string, shards: number): string {
  const bucket = createHash("sha256").update(key).digest().readUInt32BE(0) % shards;
  return bucket.toString(16).padStart(2, "0");
}

/**
 * Mint a fresh random key, re-rolling while `isTaken` reports a clash.
 */
export function generateKey(isTaken: (key: string) => boolean): string {
  let key = randomUUID();
  while (isTaken(key)) {
    key = randomUUID();
  }
  return key;
}

/**
 * Resolves keys for one cache instance and maps them to file paths.
 */
export class KeyGenerator {
  constructor(
    readonly strategy: KeyStrategy,
    private readonly dir: string,
    private readonly shards: number,
  ) {}

  /**
   * Turn the key passed to put() into the key to store under.
   * @throws InvalidKeyError when the key doesn't suit the strategy
   */
  resolve(requested: string | undefined, isTaken: (key: string) => boolean): string {
    if (this.strategy === "random") {
      if (requested !== undefined) {
        throw new InvalidKeyError(requested, "keys are generated by the cache in random mode");
      }
      return generateKey(isTaken);
    }

    if (requested === undefined) {
      throw new InvalidKeyError(undefined, "a key is required in structured mode");
    }
    validateStructuredKey(requested);
    return requested;
  }

  /**
   * Deterministic location of a key's file under the cache directory.
   */
  pathFor(key: string): string {
    if (this.strategy === "structured") {
      return join(this.dir, ...key.split("/"));
    }
    return join(this.dir, shardOf(key, this.shards), key);
  }
}
