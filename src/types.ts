import { z } from "zod";
import type { Logger } from "pino";
import type { StorageBackend } from "./file-store.js";
import type { KeyStrategy } from "./keys.js";
import type { EvictionPolicy } from "./lfu-policy.js";
import { OptionValidationError } from "./errors.js";

/**
 * How capacity is counted: number of entries, or total bytes of stored values.
 */
export type CapacityMode = "entries" | "bytes";

export interface CapacityLimit {
  mode: CapacityMode;
  limit: number;
}

/**
 * Configuration options for DiskLfuCache
 *
 * @remarks
 * The cache owns `dir` exclusively for its lifetime. Files left there by an
 * earlier run are not indexed and are never touched.
 */
export interface CacheOptions {
  /** Existing directory the cache stores its files in */
  dir: string;
  /** Maximum entries (plain number), or an explicit `{ mode, limit }` */
  capacity: number | CapacityLimit;
  /** Key strategy (default: "random") */
  keyStrategy?: KeyStrategy;
  /** Number of shard directories for random keys (default: 16, max: 256) */
  shards?: number;
  /** Storage backend (default: FileStore) */
  storage?: StorageBackend;
  /** Eviction policy (default: LfuPolicy). Must start empty. */
  policy?: EvictionPolicy;
  /** pino logger (default: silent unless LFU_DISK_CACHE_LOG_LEVEL is set) */
  logger?: Logger;
}

export interface CacheEntry {
  /** The cache key */
  key: string;
  /** Absolute path of the backing file */
  path: string;
  /** Size of the stored value in bytes */
  size: number;
}

export interface CacheStats {
  /** Total get() hits */
  hits: number;
  /** Total get() misses, including reads that failed */
  misses: number;
  /** Hit rate (0-1) */
  hitRate: number;
  /** Entries evicted to make room */
  evictions: number;
  /** Committed entries */
  items: number;
  /** Bytes held by committed entries */
  bytes: number;
  capacity: CapacityLimit;
  /** Puts admitted but not yet committed */
  pendingWrites: number;
}

export const DEFAULT_OPTIONS: { keyStrategy: KeyStrategy; shards: number } = {
  keyStrategy: "random",
  shards: 16,
};

function isStorageBackend(value: unknown): value is StorageBackend {
  return (
    typeof value === "object" &&
    value !== null &&
    "write" in value &&
    typeof value.write === "function" &&
    "read" in value &&
    typeof value.read === "function" &&
    "delete" in value &&
    typeof value.delete === "function"
  );
}

function isEvictionPolicy(value: unknown): value is EvictionPolicy {
  return (
    typeof value === "object" &&
    value !== null &&
    "recordAccess" in value &&
    typeof value.recordAccess === "function" &&
    "evictCandidate" in value &&
    typeof value.evictCandidate === "function" &&
    "remove" in value &&
    typeof value.remove === "function" &&
    "frequency" in value &&
    typeof value.frequency === "function" &&
    "has" in value &&
    typeof value.has === "function" &&
    "clear" in value &&
    typeof value.clear === "function" &&
    "size" in value &&
    value.size === 0
  );
}

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "child" in value &&
    typeof value.child === "function" &&
    "warn" in value &&
    typeof value.warn === "function"
  );
}

const capacitySchema = z
  .union([
    z.number().int().positive(),
    z
      .object({
        mode: z.enum(["entries", "bytes"]),
        limit: z.number().int().positive(),
      })
      .strict(),
  ])
  .transform((capacity): CapacityLimit =>
    typeof capacity === "number" ? { mode: "entries", limit: capacity } : capacity,
  );

export const cacheOptionsSchema = z.object({
  dir: z.string().min(1),
  capacity: capacitySchema,
  keyStrategy: z.enum(["random", "structured"]).default(DEFAULT_OPTIONS.keyStrategy),
  shards: z.number().int().min(1).max(256).default(DEFAULT_OPTIONS.shards),
  storage: z
    .custom<StorageBackend>(isStorageBackend, { message: "must implement write, read and delete" })
    .optional(),
  policy: z
    .custom<EvictionPolicy>(isEvictionPolicy, { message: "must be an empty eviction policy" })
    .optional(),
  logger: z.custom<Logger>(isLogger, { message: "must be a pino logger" }).optional(),
});

export type ResolvedOptions = z.output<typeof cacheOptionsSchema>;

/**
 * Validate and fill in defaults.
 * @throws OptionValidationError listing every problem found
 */
export function parseOptions(options: CacheOptions): ResolvedOptions {
  const result = cacheOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new OptionValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`),
    );
  }
  return result.data;
}
