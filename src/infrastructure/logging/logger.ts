import type { LogLevel, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

export interface LoggerOptions {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
  readonly bindings?: Record<string, unknown> | undefined;
}

/** Render a thrown value so it survives JSON.stringify. */
const normalizeMeta = (meta: Record<string, unknown>): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? value.message : value;
  }
  return out;
};

/**
 * One JSON object per line, for log aggregators.
 */
const formatJsonEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string => {
  const entry: Record<string, unknown> = {
    level,
    msg,
    time: new Date().toISOString(),
    ...meta,
  };
  return `${JSON.stringify(entry)}\n`;
};

/**
 * Logger writing to stdout (debug, info) and stderr (warn and above).
 * - "pretty": ANSI-colored lines for development
 * - "json": structured JSON lines
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const minLevel = options.level ?? "info";
  const format = options.format ?? "pretty";
  const bindings = options.bindings ?? {};
  const minPriority = LEVEL_PRIORITY[minLevel];

  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (level: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const line = formatter(level, msg, normalizeMeta({ ...bindings, ...meta }));

    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger({ level: minLevel, format, bindings: { ...bindings, ...extra } }),
  };
};

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => silentLogger,
};
