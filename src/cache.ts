import { promises as fs } from "fs";
import type { Logger } from "pino";
import {
  CacheClosedError,
  CacheInitError,
  InvariantViolationError,
  KeyCollisionError,
  KeyNotFoundError,
  PartialFailureError,
  StorageFailureError,
  ValueTooLargeError,
} from "./errors.js";
import { FileStore, type StorageBackend } from "./file-store.js";
import type { ValueCodec } from "./codec.js";
import { KeyGenerator, ancestorKeys } from "./keys.js";
import { LfuPolicy, type EvictionPolicy } from "./lfu-policy.js";
import { KeyedMutex, Mutex } from "./lock.js";
import { createLogger } from "./logger.js";
import {
  parseOptions,
  type CacheEntry,
  type CacheOptions,
  type CacheStats,
  type CapacityLimit,
} from "./types.js";
import { TypedCache } from "./typed-cache.js";
import { globToRegExp, isNotFound, toBuffer, type CacheValue } from "./utils.js";

export interface PutOptions {
  /** Caller-chosen key (structured strategy only) */
  key?: string;
  /** Abort the put. A value already written is removed again. */
  signal?: AbortSignal;
}

/**
 * A put that passed admission and holds capacity while its file is written.
 */
interface Reservation {
  size: number;
  /** Resolves once the put has committed or given up its slot */
  settled: Promise<void>;
  settle: () => void;
}

/**
 * DiskLfuCache - a bounded cache that keeps values as files and evicts the
 * least-frequently-used entry when full.
 *
 * Features:
 * - Entry-count or total-byte capacity
 * - LFU eviction before admission, so size() never exceeds capacity
 * - Random (UUID) or caller-supplied path-like keys
 * - Index and files stay consistent across concurrent calls and I/O failures
 *
 * Puts are admitted one at a time: collision check, eviction and slot
 * reservation happen under a single mutex. File I/O then runs under a
 * per-key lock, so work on unrelated keys overlaps.
 */
export class DiskLfuCache {
  private readonly dir: string;
  private readonly limit: CapacityLimit;
  private readonly keyGen: KeyGenerator;
  private readonly storage: StorageBackend;
  private readonly policy: EvictionPolicy;
  private readonly log: Logger;

  private index = new Map<string, CacheEntry>();
  private usedBytes = 0;

  private reservations = new Map<string, Reservation>();
  private reservedBytes = 0;

  /** Live keys (committed or reserved) counted under each of their ancestor keys */
  private descendants = new Map<string, number>();

  private readonly admission = new Mutex();
  private readonly keyLocks = new KeyedMutex();

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private closed = false;
  private initPromise?: Promise<void>;

  constructor(options: CacheOptions) {
    const opts = parseOptions(options);
    this.dir = opts.dir;
    this.limit = opts.capacity;
    this.keyGen = new KeyGenerator(opts.keyStrategy, opts.dir, opts.shards);
    this.storage = opts.storage ?? new FileStore();
    this.policy = opts.policy ?? new LfuPolicy();
    this.log = (opts.logger ?? createLogger()).child({ dir: opts.dir });
  }

  /**
   * Check that the cache directory exists.
   * Called lazily by every operation; await it to fail early.
   */
  async init(): Promise<void> {
    this.initPromise ??= this.checkDir().catch((err: unknown) => {
      this.initPromise = undefined;
      throw err;
    });
    return this.initPromise;
  }

  private async checkDir(): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(this.dir)).isDirectory();
    } catch (err) {
      throw new CacheInitError(this.dir, err);
    }
    if (!isDirectory) {
      throw new CacheInitError(this.dir);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new CacheClosedError();
    }
  }

  /** Committed or currently being written. */
  private isLive(key: string): boolean {
    return this.index.has(key) || this.reservations.has(key);
  }

  /**
   * A live key whose file would sit on `key`'s directory path, or whose
   * directory path `key`'s file would block.
   */
  private layoutConflict(key: string): string | undefined {
    const ancestor = ancestorKeys(key).find((candidate) => this.isLive(candidate));
    if (ancestor !== undefined) return ancestor;
    if (!this.descendants.has(key)) return undefined;
    const prefix = `${key}/`;
    return [...this.index.keys(), ...this.reservations.keys()].find((live) => live.startsWith(prefix));
  }

  private trackLayout(key: string, delta: 1 | -1): void {
    for (const ancestor of ancestorKeys(key)) {
      const count = (this.descendants.get(ancestor) ?? 0) + delta;
      if (count > 0) {
        this.descendants.set(ancestor, count);
      } else {
        this.descendants.delete(ancestor);
      }
    }
  }

  private fits(size: number): boolean {
    if (this.limit.mode === "entries") {
      return this.index.size + this.reservations.size < this.limit.limit;
    }
    return this.usedBytes + this.reservedBytes + size <= this.limit.limit;
  }

  private reserve(key: string, size: number): void {
    let settle = () => {};
    const settled = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this.reservations.set(key, { size, settled, settle });
    this.reservedBytes += size;
    this.trackLayout(key, 1);
  }

  private release(key: string): void {
    const reservation = this.reservations.get(key);
    if (!reservation) return;
    this.reservations.delete(key);
    this.reservedBytes -= reservation.size;
    // A committed key stays live and keeps its layout claim
    if (!this.index.has(key)) this.trackLayout(key, -1);
    reservation.settle();
  }

  private commit(entry: CacheEntry): void {
    this.index.set(entry.key, entry);
    this.usedBytes += entry.size;
    this.policy.recordAccess(entry.key);
  }

  /**
   * Remove an entry from the index and the policy together.
   */
  private drop(entry: CacheEntry): void {
    this.index.delete(entry.key);
    this.usedBytes -= entry.size;
    this.policy.remove(entry.key);
    this.trackLayout(entry.key, -1);
  }

  /**
   * Admission critical section. Runs under the admission mutex.
   * Resolves to the key that now holds a reservation.
   */
  private async admit(requested: string | undefined, size: number, signal?: AbortSignal): Promise<string> {
    this.assertOpen();
    signal?.throwIfAborted();

    const key = this.keyGen.resolve(requested, (candidate) => this.isLive(candidate));
    if (this.isLive(key)) {
      throw new KeyCollisionError(key);
    }
    const conflict = this.layoutConflict(key);
    if (conflict !== undefined) {
      throw new KeyCollisionError(key, conflict);
    }
    if (this.limit.mode === "bytes" && size > this.limit.limit) {
      throw new ValueTooLargeError(size, this.limit.limit);
    }

    while (!this.fits(size)) {
      const victim = this.policy.evictCandidate();
      if (victim !== undefined) {
        await this.evict(victim);
        continue;
      }

      if (this.index.size > 0 || this.reservations.size === 0) {
        const err = new InvariantViolationError(
          `Eviction policy is empty but ${this.index.size} entries are indexed and ${this.reservations.size} writes are pending`,
        );
        this.log.fatal({ err }, "eviction bookkeeping out of sync");
        throw err;
      }

      // Every slot belongs to a put that hasn't committed yet
      this.log.debug({ key, pending: this.reservations.size }, "admission waiting on in-flight writes");
      await Promise.race([...this.reservations.values()].map((r) => r.settled));
      this.assertOpen();
    }

    this.reserve(key, size);
    return key;
  }

  /**
   * Delete a victim's file, then forget it. Leaves everything in place if the
   * delete fails.
   */
  private async evict(key: string): Promise<void> {
    await this.keyLocks.run(key, async () => {
      const entry = this.index.get(key);
      // Removed while we waited for the lock
      if (!entry) return;

      const frequency = this.policy.frequency(key);
      try {
        await this.storage.delete(entry.path);
      } catch (err) {
        if (!isNotFound(err)) {
          this.log.error({ key, err }, "eviction failed");
          throw new StorageFailureError(key, "delete", err);
        }
      }

      this.drop(entry);
      this.evictions++;
      this.log.debug({ key, frequency, size: entry.size }, "evicted");
    });
  }

  /**
   * Store a value and return its key.
   * With the random strategy the key is generated; with the structured
   * strategy pass it as `options.key`.
   * @throws KeyCollisionError if the key is already live
   * @throws StorageFailureError if the write (or an eviction) fails
   */
  async put(value: CacheValue, options: PutOptions = {}): Promise<string> {
    this.assertOpen();
    const { signal } = options;
    signal?.throwIfAborted();
    await this.init();

    const data = toBuffer(value);
    const key = await this.admission.run(() => this.admit(options.key, data.length, signal));
    const path = this.keyGen.pathFor(key);

    return this.keyLocks.run(key, async () => {
      if (signal?.aborted) {
        this.release(key);
        throw signal.reason;
      }

      try {
        await this.storage.write(path, data);
      } catch (err) {
        this.release(key);
        this.log.error({ key, err }, "write failed");
        throw new StorageFailureError(key, "write", err);
      }

      if (signal?.aborted) {
        await this.storage.delete(path).catch((err: unknown) => {
          this.log.warn({ key, err }, "could not remove file of aborted put");
        });
        this.release(key);
        throw signal.reason;
      }

      this.commit({ key, path, size: data.length });
      this.release(key);
      return key;
    });
  }

  /**
   * Get a value, counting the access toward its frequency.
   * A read failure drops the entry from the index before rejecting.
   * @throws KeyNotFoundError
   * @throws StorageFailureError
   */
  async get(key: string): Promise<Buffer> {
    return this.read(key, true);
  }

  /**
   * Get entry data without updating frequency or hit/miss counters
   */
  async peek(key: string): Promise<Buffer> {
    return this.read(key, false);
  }

  private async read(key: string, countAccess: boolean): Promise<Buffer> {
    this.assertOpen();
    await this.init();

    const miss = (): KeyNotFoundError => {
      if (countAccess) this.misses++;
      return new KeyNotFoundError(key);
    };

    if (!this.index.has(key)) throw miss();

    return this.keyLocks.run(key, async () => {
      const entry = this.index.get(key);
      if (!entry) throw miss();

      let data: Buffer;
      try {
        data = await this.storage.read(entry.path);
      } catch (err) {
        // Dangling entry: forget it so the index matches the disk again.
        // A file that is still there but unreadable goes too.
        if (!isNotFound(err)) {
          await this.storage.delete(entry.path).catch((cleanupErr: unknown) => {
            if (!isNotFound(cleanupErr)) {
              this.log.warn({ key, err: cleanupErr }, "could not remove unreadable file");
            }
          });
        }
        this.drop(entry);
        if (countAccess) this.misses++;
        this.log.warn({ key, err }, "dropped entry whose file could not be read");
        throw new StorageFailureError(key, "read", err);
      }

      if (countAccess) {
        this.hits++;
        this.policy.recordAccess(key);
      }
      return data;
    });
  }

  /**
   * Delete a key. If the file can't be deleted the entry stays live.
   * @throws KeyNotFoundError
   * @throws StorageFailureError
   */
  async remove(key: string): Promise<void> {
    this.assertOpen();
    await this.init();

    if (!this.index.has(key)) throw new KeyNotFoundError(key);

    await this.keyLocks.run(key, async () => {
      const entry = this.index.get(key);
      if (!entry) throw new KeyNotFoundError(key);

      try {
        await this.storage.delete(entry.path);
      } catch (err) {
        if (!isNotFound(err)) {
          this.log.error({ key, err }, "remove failed");
          throw new StorageFailureError(key, "delete", err);
        }
      }
      this.drop(entry);
    });
  }

  /**
   * Remove every committed entry, carrying on past failures.
   * @throws PartialFailureError naming the keys that are still live
   */
  async clear(): Promise<void> {
    this.assertOpen();
    await this.init();

    const results = await Promise.allSettled([...this.index.keys()].map((key) => this.remove(key)));

    const failures: StorageFailureError[] = [];
    for (const result of results) {
      if (result.status === "fulfilled") continue;
      const err: unknown = result.reason;
      // Already gone through a concurrent remove/eviction
      if (err instanceof KeyNotFoundError) continue;
      if (err instanceof StorageFailureError) {
        failures.push(err);
        continue;
      }
      throw err;
    }

    if (failures.length > 0) {
      throw new PartialFailureError(failures);
    }
  }

  /**
   * Check if a key is committed (no I/O)
   */
  has(key: string): boolean {
    return this.index.has(key);
  }

  /**
   * Get all committed keys matching a pattern.
   * @param pattern Glob-like pattern (supports * wildcard)
   */
  keys(pattern = "*"): string[] {
    const matcher = globToRegExp(pattern);
    const keys = [...this.index.keys()];
    return matcher === null ? keys : keys.filter((key) => matcher.test(key));
  }

  /** Number of committed entries. */
  size(): number {
    return this.index.size;
  }

  capacity(): CapacityLimit {
    return { ...this.limit };
  }

  /**
   * Get cache statistics. In-flight puts show up only in `pendingWrites`.
   */
  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      evictions: this.evictions,
      items: this.index.size,
      bytes: this.usedBytes,
      capacity: this.capacity(),
      pendingWrites: this.reservations.size,
    };
  }

  /**
   * Reset hit/miss/eviction counters.
   */
  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  /**
   * Close the cache.
   * New calls reject straight away; puts already admitted are allowed to finish.
   */
  async close(): Promise<void> {
    this.closed = true;
    while (this.reservations.size > 0) {
      await Promise.all([...this.reservations.values()].map((r) => r.settled));
    }
  }

  /**
   * Store and read `T` values through `codec`, sharing this cache's entries.
   */
  withCodec<T>(codec: ValueCodec<T>): TypedCache<T> {
    return new TypedCache(this, codec);
  }
}
