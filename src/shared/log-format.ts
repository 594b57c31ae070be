import type { LogLevel } from "../core/ports/logger.js";

type Paint = (s: string) => string;

const sgr =
  (...codes: number[]): Paint =>
  (s) =>
    `\x1b[${codes.join(";")}m${s}\x1b[0m`;

const padded =
  (paint: Paint): Paint =>
  (s) =>
    paint(` ${s} `);

/** ANSI styles shared by the log and CLI formatters. */
export const style = {
  bold: sgr(1),
  dim: sgr(2),
  red: sgr(31),
  green: sgr(32),
  yellow: sgr(33),
  cyan: sgr(36),
  gray: sgr(90),
  white: sgr(97),
  alert: padded(sgr(41, 97)),
  notice: padded(sgr(45, 97)),
} as const;

const LEVEL_LABELS: Readonly<Record<LogLevel, string>> = {
  debug: style.gray("DBG"),
  info: style.green("INF"),
  warn: style.yellow("WRN"),
  error: style.red("ERR"),
  fatal: style.alert("FTL"),
};

const METHOD_LABELS: Readonly<Record<string, string>> = {
  GET: padded(sgr(42, 30))("GET"),
  POST: padded(sgr(46, 30))("POST"),
  PUT: padded(sgr(43, 30))("PUT"),
  PATCH: padded(sgr(43, 30))("PATCH"),
  DELETE: style.alert("DEL"),
};

/** Status classes, lowest bound first. */
const STATUS_PAINT: ReadonlyArray<readonly [number, Paint]> = [
  [500, style.red],
  [400, style.yellow],
  [300, style.cyan],
  [0, style.green],
];

const two = (n: number): string => String(n).padStart(2, "0");

const clock = (d: Date = new Date()): string =>
  `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}.${String(d.getMilliseconds()).padStart(3, "0")}`;

const paintStatus = (status: number): string => {
  const paint = STATUS_PAINT.find(([floor]) => status >= floor)?.[1] ?? style.white;
  return style.bold(paint(String(status)));
};

const paintDuration = (ms: number): string => {
  const text = `${ms}ms`;
  if (ms >= 200) return style.red(text);
  return ms >= 50 ? style.yellow(text) : style.green(text);
};

const show = (v: unknown): string => {
  if (typeof v === "string") return v;
  if (v instanceof Error) return v.message;
  return typeof v === "object" && v !== null ? JSON.stringify(v) : String(v);
};

const shortId = (id: unknown): string => show(id).slice(0, 8);

/**
 * Pretty log line. `layer` becomes a prefix and `requestId` is shortened.
 *
 *   WRN 12:34:56.789 [handler] Handler failed to decode request data rid=4f1c2a9b
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
): string => {
  const { layer, requestId, ...rest } = meta;
  const prefix = layer === undefined ? "" : `${style.cyan(`[${show(layer)}]`)} `;
  const fields = Object.entries(rest).map(
    ([k, v]) => `${style.dim(`${k}=`)}${style.white(show(v))}`,
  );
  if (requestId !== undefined) fields.push(style.dim(`rid=${shortId(requestId)}`));
  const tail = fields.length === 0 ? "" : ` ${fields.join(" ")}`;
  return `  ${LEVEL_LABELS[level]} ${style.dim(clock())} ${prefix}${style.white(msg)}${tail}\n`;
};

export interface AccessLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly ip: string;
  readonly requestId: string;
}

/**
 * Pretty access line for one handled request.
 *
 *   ← 12:34:56.789 GET 200 /orders/42 0.34ms  ip=127.0.0.1 rid=4f1c2a9b
 */
export const formatAccessLog = (entry: AccessLogEntry): string => {
  const method = METHOD_LABELS[entry.method] ?? style.white(entry.method);
  const where = `ip=${entry.ip} rid=${shortId(entry.requestId)}`;
  return `  ${style.dim("←")} ${style.dim(clock())} ${method} ${paintStatus(entry.status)} ${style.white(entry.path)} ${paintDuration(entry.durationMs)}  ${style.gray(where)}\n`;
};
