export { DiskLfuCache, type PutOptions } from "./cache.js";
export { TypedCache } from "./typed-cache.js";
export { jsonCodec, type ValueCodec } from "./codec.js";
export { FileStore, type StorageBackend } from "./file-store.js";
export { LfuPolicy, type EvictionPolicy } from "./lfu-policy.js";
export { KeyGenerator, generateKey, validateStructuredKey, type KeyStrategy } from "./keys.js";
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";
export {
  DEFAULT_OPTIONS,
  cacheOptionsSchema,
  type CacheEntry,
  type CacheOptions,
  type CacheStats,
  type CapacityLimit,
  type CapacityMode,
} from "./types.js";
export type { CacheValue } from "./utils.js";
export * from "./errors.js";
