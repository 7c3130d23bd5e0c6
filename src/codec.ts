import type { z } from "zod";
import type { CacheValue } from "./utils.js";

/**
 * Converts between an application value and the bytes kept in its file.
 * Either method may throw; the cache reports that as a SerializationError.
 */
export interface ValueCodec<T> {
  encode(value: T): CacheValue;
  decode(data: Buffer): T;
}

/**
 * JSON text on disk, checked against `schema` when read back.
 */
export function jsonCodec<T>(schema: z.ZodType<T>): ValueCodec<T> {
  return {
    encode: (value) => JSON.stringify(value),
    decode: (data) => schema.parse(JSON.parse(data.toString("utf8"))),
  };
}
