import type { DiskLfuCache, PutOptions } from "./cache.js";
import type { ValueCodec } from "./codec.js";
import { SerializationError } from "./errors.js";
import type { CacheValue } from "./utils.js";

/**
 * A view of a DiskLfuCache that stores `T` values through a codec.
 * Entries, capacity and eviction are shared with the underlying cache.
 */
export class TypedCache<T> {
  constructor(
    readonly cache: DiskLfuCache,
    private readonly codec: ValueCodec<T>,
  ) {}

  /**
   * Encode and store a value.
   * @throws SerializationError if encoding fails; nothing is written
   */
  async put(value: T, options: PutOptions = {}): Promise<string> {
    let data: CacheValue;
    try {
      data = this.codec.encode(value);
    } catch (err) {
      throw new SerializationError(options.key, "encode", err);
    }
    return this.cache.put(data, options);
  }

  /**
   * Read and decode a value. A value that fails to decode stays cached.
   * @throws SerializationError
   */
  async get(key: string): Promise<T> {
    return this.decode(key, await this.cache.get(key));
  }

  async peek(key: string): Promise<T> {
    return this.decode(key, await this.cache.peek(key));
  }

  async remove(key: string): Promise<void> {
    return this.cache.remove(key);
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  private decode(key: string, data: Buffer): T {
    try {
      return this.codec.decode(data);
    } catch (err) {
      throw new SerializationError(key, "decode", err);
    }
  }
}
