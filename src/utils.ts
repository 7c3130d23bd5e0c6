/** Anything put() accepts as a value. Strings are stored as UTF-8. */
export type CacheValue = Buffer | Uint8Array | string;

export function toBuffer(value: CacheValue): Buffer {
  if (typeof value === "string") return Buffer.from(value, "utf8");
  if (Buffer.isBuffer(value)) return value;
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}

/**
 * Whole-key matcher for a `*` glob, or null when the glob accepts every key.
 * `*` also matches `/`, so `img/*` covers nested keys.
 */
export function globToRegExp(glob: string): RegExp | null {
  if (/^\*+$/.test(glob)) return null;
  const source = glob
    .split(/\*+/)
    .map((literal) => literal.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}$`);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
