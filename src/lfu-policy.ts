/**
 * Frequency bookkeeping consulted by the cache when it needs room.
 * Implementations are in-memory only and never throw.
 */
export interface EvictionPolicy {
  /** Insert the key with frequency 1, or bump its frequency. */
  recordAccess(key: string): void;
  /** The key to evict next, or undefined when nothing is tracked. */
  evictCandidate(): string | undefined;
  /** Forget the key. No-op for unknown keys. */
  remove(key: string): void;
  /** Current frequency, 0 for unknown keys. */
  frequency(key: string): number;
  has(key: string): boolean;
  clear(): void;
  readonly size: number;
}

interface FrequencyNode {
  frequency: number;
  /** Monotonic insertion sequence, used to break ties */
  seq: number;
}

/**
 * LFU policy backed by frequency buckets.
 *
 * Each bucket maps keys of one frequency to their node. The lowest populated
 * frequency is tracked so lookups don't scan every key. Among keys sharing the
 * lowest frequency, the one recorded first is chosen.
 */
export class LfuPolicy implements EvictionPolicy {
  private nodes = new Map<string, FrequencyNode>();
  private buckets = new Map<number, Map<string, FrequencyNode>>();
  private minFrequency = 0;
  private nextSeq = 0;

  get size(): number {
    return this.nodes.size;
  }

  recordAccess(key: string): void {
    const node = this.nodes.get(key);

    if (!node) {
      const fresh: FrequencyNode = { frequency: 1, seq: this.nextSeq++ };
      this.nodes.set(key, fresh);
      this.bucket(1).set(key, fresh);
      this.minFrequency = 1;
      return;
    }

    const from = node.frequency;
    this.detach(key, from);
    node.frequency = from + 1;
    this.bucket(node.frequency).set(key, node);

    if (this.minFrequency === from && !this.buckets.has(from)) {
      this.minFrequency = node.frequency;
    }
  }

  evictCandidate(): string | undefined {
    const bucket = this.buckets.get(this.minFrequency);
    if (!bucket) return undefined;

    let candidate: string | undefined;
    let oldest = Infinity;
    for (const [key, node] of bucket) {
      if (node.seq < oldest) {
        oldest = node.seq;
        candidate = key;
      }
    }
    return candidate;
  }

  remove(key: string): void {
    const node = this.nodes.get(key);
    if (!node) return;

    this.nodes.delete(key);
    this.detach(key, node.frequency);

    if (node.frequency === this.minFrequency && !this.buckets.has(node.frequency)) {
      this.minFrequency = this.lowestFrequency();
    }
  }

  frequency(key: string): number {
    return this.nodes.get(key)?.frequency ?? 0;
  }

  has(key: string): boolean {
    return this.nodes.has(key);
  }

  clear(): void {
    this.nodes.clear();
    this.buckets.clear();
    this.minFrequency = 0;
  }

  private bucket(frequency: number): Map<string, FrequencyNode> {
    let bucket = this.buckets.get(frequency);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(frequency, bucket);
    }
    return bucket;
  }

  /**
   * Remove a key from its bucket, dropping the bucket once empty.
   */
  private detach(key: string, frequency: number): void {
    const bucket = this.buckets.get(frequency);
    if (!bucket) return;
    bucket.delete(key);
    if (bucket.size === 0) {
      this.buckets.delete(frequency);
    }
  }

  private lowestFrequency(): number {
    let lowest = 0;
    for (const frequency of this.buckets.keys()) {
      if (lowest === 0 || frequency < lowest) lowest = frequency;
    }
    return lowest;
  }
}
