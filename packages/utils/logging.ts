import pino, { type DestinationStream, type Level, type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export type LogLevel = Level;

const LOG_LEVEL_VALUES: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function hasTestGlobals(): boolean {
  const g = globalThis as unknown as Record<string, unknown>;
  return typeof g.describe === "function" && typeof g.it === "function";
}

export function isTestEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  // Common conventions across runners (Jest/Vitest).
  if (env.NODE_ENV === "test") return true;
  if (typeof env.VITEST === "string") return true;
  if (typeof env.JEST_WORKER_ID === "string") return true;

  return hasTestGlobals();
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVEL_VALUES.find((level) => level === normalized);
}

export function resolveLogLevel(override?: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (override) return override;
  if (isTestEnv(env)) return "error";
  return parseLogLevel(env.LOG_LEVEL) ?? "info";
}

export type CreateLoggerOptions = {
  /** Module label attached to every line (e.g. `kinesis:stream`). */
  module?: string;
  logLevel?: LogLevel;
  /** Alternate sink; defaults to stdout. */
  destination?: DestinationStream;
};

/** JSONL logger with a `module` binding. */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { module, logLevel, destination } = options;

  const pinoOptions: LoggerOptions = {
    level: resolveLogLevel(logLevel),
    base: module ? { module } : null,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}
