import { pino, stdSerializers, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  /** Minimum level to emit (default: $LFU_DISK_CACHE_LOG_LEVEL, else "silent") */
  level?: LevelWithSilent;
  /** Extra fields bound to every line */
  bindings?: Record<string, unknown>;
}

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function levelFromEnv(): LevelWithSilent | undefined {
  const raw = process.env.LFU_DISK_CACHE_LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === raw);
}

/**
 * Build the default pino logger for a cache. Silent unless a level is
 * passed or set through the environment.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "lfu-disk-cache",
    level: options.level ?? levelFromEnv() ?? "silent",
    serializers: { err: stdSerializers.err },
  }).child(options.bindings ?? {});
}
