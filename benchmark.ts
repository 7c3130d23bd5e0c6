import { DiskLfuCache, KeyNotFoundError, type CacheOptions } from "./src/index.js";
import { mkdir, rm } from "fs/promises";
import { performance } from "perf_hooks";

const BENCH_DIR = ".bench-cache";

interface BenchResult {
  name: string;
  ops: number;
  totalMs: number;
  opsPerSec: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

async function cleanup() {
  await rm(BENCH_DIR, { recursive: true, force: true });
}

async function freshCache(options: Omit<CacheOptions, "dir">): Promise<DiskLfuCache> {
  await cleanup();
  await mkdir(BENCH_DIR, { recursive: true });
  return new DiskLfuCache({ dir: BENCH_DIR, ...options });
}

async function runBench(
  name: string,
  iterations: number,
  fn: () => Promise<void>
): Promise<BenchResult> {
  const times: number[] = [];

  // Warmup
  for (let i = 0; i < Math.min(10, iterations / 10); i++) {
    await fn();
  }

  for (let i = 0; i < iterations; i++) {
    const start = performance.now();
    await fn();
    times.push(performance.now() - start);
  }

  const totalMs = times.reduce((a, b) => a + b, 0);
  const avgMs = totalMs / iterations;

  return {
    name,
    ops: iterations,
    totalMs,
    opsPerSec: 1000 / avgMs,
    avgMs,
    minMs: Math.min(...times),
    maxMs: Math.max(...times),
  };
}

function formatResult(r: BenchResult): string {
  return `${r.name.padEnd(45)} ${r.opsPerSec.toFixed(0).padStart(10)} ops/s | avg: ${r.avgMs.toFixed(3).padStart(8)}ms | min: ${r.minMs.toFixed(3).padStart(8)}ms | max: ${r.maxMs.toFixed(3).padStart(8)}ms`;
}

async function benchmarkCoreOps() {
  console.log("\n=== Core Operations ===\n");

  const cache = await freshCache({ capacity: 100_000 });
  const small = "x".repeat(100);
  const medium = "x".repeat(1000);
  const large = "x".repeat(10000);

  const keys: string[] = [];
  const putSmall = await runBench("put() - small value (100B)", 1000, async () => {
    keys.push(await cache.put(small));
  });
  console.log(formatResult(putSmall));

  const putMedium = await runBench("put() - medium value (1KB)", 1000, async () => {
    await cache.put(medium);
  });
  console.log(formatResult(putMedium));

  const putLarge = await runBench("put() - large value (10KB)", 500, async () => {
    await cache.put(large);
  });
  console.log(formatResult(putLarge));

  let getIdx = 0;
  const get = await runBench("get() - disk read", 5000, async () => {
    await cache.get(keys[getIdx++ % keys.length]);
  });
  console.log(formatResult(get));

  let peekIdx = 0;
  const peek = await runBench("peek() - disk read, no frequency update", 5000, async () => {
    await cache.peek(keys[peekIdx++ % keys.length]);
  });
  console.log(formatResult(peek));

  await cache.close();
}

async function benchmarkEviction() {
  console.log("\n=== Eviction Performance ===\n");

  const counted = await freshCache({ capacity: 100 });
  const value = "x".repeat(100);

  const putCounted = await runBench("put() - with eviction (100 entry limit)", 1000, async () => {
    await counted.put(value);
  });
  console.log(formatResult(putCounted));
  console.log(`  Items: ${counted.size()}, evictions: ${counted.stats().evictions}`);
  await counted.close();

  const sized = await freshCache({ capacity: { mode: "bytes", limit: 50 * 1024 } });
  const putSized = await runBench("put() - with eviction (50KB limit)", 1000, async () => {
    await sized.put(value);
  });
  console.log(formatResult(putSized));
  const stats = sized.stats();
  console.log(`  Items: ${stats.items}, bytes: ${stats.bytes}, evictions: ${stats.evictions}`);
  await sized.close();
}

async function benchmarkConcurrency() {
  console.log("\n=== Concurrent puts ===\n");

  const cache = await freshCache({ capacity: 50 });
  const value = "x".repeat(1000);

  const concurrent = await runBench("put() - 20 concurrent at capacity", 100, async () => {
    await Promise.all(Array.from({ length: 20 }, () => cache.put(value)));
  });
  console.log(formatResult(concurrent));
  console.log(`  Items: ${cache.size()}/${cache.capacity().limit}`);

  await cache.close();
}

async function benchmarkMixedWorkload() {
  console.log("\n=== Mixed Workload (80% read, 20% write) ===\n");

  const cache = await freshCache({ capacity: 500 });
  const keys: string[] = [];
  for (let i = 0; i < 500; i++) {
    keys.push(await cache.put(`value-${i}-${"x".repeat(100)}`));
  }

  let readCount = 0;
  let writeCount = 0;
  let totalIdx = 0;

  const mixed = await runBench("mixed workload (80/20 read/write)", 5000, async () => {
    if (Math.random() < 0.2) {
      writeCount++;
      keys.push(await cache.put(`value-${totalIdx++}-${"x".repeat(100)}`));
    } else {
      readCount++;
      const key = keys[Math.floor(Math.random() * keys.length)];
      // Evicted keys miss
      await cache.get(key).catch((err: unknown) => {
        if (!(err instanceof KeyNotFoundError)) throw err;
      });
    }
  });
  console.log(formatResult(mixed));
  console.log(`  Reads: ${readCount}, Writes: ${writeCount}`);
  console.log(`  Hit rate: ${(cache.stats().hitRate * 100).toFixed(1)}%`);

  await cache.close();
}

async function main() {
  console.log("╔════════════════════════════════════════════════════════════════╗");
  console.log("║           lfu-disk-cache Benchmark Suite                       ║");
  console.log("╚════════════════════════════════════════════════════════════════╝");
  console.log(`\nNode.js ${process.version}`);
  console.log(`Platform: ${process.platform} ${process.arch}`);
  console.log(`Date: ${new Date().toISOString()}\n`);

  try {
    await benchmarkCoreOps();
    await benchmarkEviction();
    await benchmarkConcurrency();
    await benchmarkMixedWorkload();

    console.log("\n=== Benchmark Complete ===\n");
  } finally {
    await cleanup();
  }
}

main().catch(console.error);
