/**
 * Cirrus Logging Subsystem
 *
 * Structured JSON logging on pino. Every component logs through a child of
 * one root logger, tagged with the subsystem it belongs to.
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type CirrusLogger = Logger;

export type LoggingOptions = {
  level?: LogLevel;
  /** Where JSON lines are written. Defaults to stdout. */
  destination?: DestinationStream;
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level taken from CIRRUS_LOG_LEVEL, falling back to "info" when unset or
 * not a pino level name.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.CIRRUS_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

// =============================================================================
// Root logger
// =============================================================================

function buildRoot(options: LoggingOptions): Logger {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? levelFromEnv(),
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

let root: Logger | undefined;

function getRoot(): Logger {
  root ??= buildRoot({});
  return root;
}

/**
 * Replace the root logger. Loggers handed out earlier keep writing to the
 * previous root.
 */
export function configureLogging(options: LoggingOptions): void {
  root = buildRoot(options);
}

export function getLogger(subsystem: string, bindings: Record<string, unknown> = {}): CirrusLogger {
  return getRoot().child({ subsystem, ...bindings });
}

/**
 * Standalone logger, detached from the shared root.
 */
export function createLogger(subsystem: string, options: LoggingOptions = {}): CirrusLogger {
  return buildRoot(options).child({ subsystem });
}

// =============================================================================
// Capture (tests and embedding)
// =============================================================================

export type CapturedLogEntry = {
  level: string;
  subsystem?: string;
  msg?: string;
  [key: string]: unknown;
};

export type LogCapture = {
  logger: CirrusLogger;
  entries: CapturedLogEntry[];
  messages: (level?: string) => string[];
};

function toEntry(line: string): CapturedLogEntry | undefined {
  const parsed: unknown = JSON.parse(line);
  if (typeof parsed !== "object" || parsed === null || !("level" in parsed)) return undefined;
  const { level } = parsed;
  if (typeof level !== "string") return undefined;
  const entry: CapturedLogEntry = { ...parsed, level };
  return entry;
}

/**
 * Logger whose output is parsed back into entries held in memory.
 */
export function captureLogs(subsystem = "test", level: LogLevel = "trace"): LogCapture {
  const entries: CapturedLogEntry[] = [];
  const destination: DestinationStream = {
    write(chunk: string) {
      for (const line of chunk.split("\n")) {
        if (!line.trim()) continue;
        const entry = toEntry(line);
        if (entry) entries.push(entry);
      }
    },
  };
  return {
    logger: createLogger(subsystem, { level, destination }),
    entries,
    messages: (wanted?: string) =>
      entries
        .filter((entry) => wanted === undefined || entry.level === wanted)
        .map((entry) => (typeof entry.msg === "string" ? entry.msg : "")),
  };
}
