// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 * - debug() adds origin capture (file/method/line).
 *
 * Runtime Controls:
 * - setLogLevel("debug" | "info" | "warn" | "error" | "silent")  [default: info]
 * - setRootLogger(pinoLike) swaps the sink; the default sink is a prefixed,
 *   timestamped console writer.
 *
 * Notes:
 * - Bound loggers read the root and level at call time, so a logger created
 *   at module load follows later setRootLogger()/setLogLevel() calls.
 */

type Json = Record<string, unknown>;

/** Root sink contract. Bound loggers always call it as (meta, msg?, ...rest). */
export interface ILogger {
  debug(obj: Json, msg?: string, ...rest: unknown[]): void;
  info(obj: Json, msg?: string, ...rest: unknown[]): void;
  warn(obj: Json, msg?: string, ...rest: unknown[]): void;
  error(obj: Json, msg?: string, ...rest: unknown[]): void;
}

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  info(msg: string, ...rest: unknown[]): void;
  info(obj: Json, msg?: string, ...rest: unknown[]): void;

  debug(msg: string, ...rest: unknown[]): void;
  debug(obj: Json, msg?: string, ...rest: unknown[]): void;

  warn(msg: string, ...rest: unknown[]): void;
  warn(obj: Json, msg?: string, ...rest: unknown[]): void;

  error(msg: string, ...rest: unknown[]): void;
  error(obj: Json, msg?: string, ...rest: unknown[]): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
type CoreLevel = Exclude<LogLevel, "silent">;

const LEVEL_ORDER: Record<CoreLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

let ROOT: ILogger | null = null;
let LEVEL: LogLevel = "info";

export function isLogLevel(raw: string): raw is LogLevel {
  return LOG_LEVELS.some((l) => l === raw);
}

export function setLogLevel(level: LogLevel): void {
  LEVEL = level;
}

export function setRootLogger(logger: ILogger): void {
  ROOT = logger;
}

/** Restore the console sink (primarily for tests). */
export function resetRootLogger(): void {
  ROOT = null;
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

function levelAllows(target: CoreLevel): boolean {
  if (LEVEL === "silent") return false;
  return LEVEL_ORDER[target] >= LEVEL_ORDER[LEVEL];
}

// ────────────────────────────────────────────────────────────────────────────
// Console sink
// ────────────────────────────────────────────────────────────────────────────

/** Local-time timestamp "YYYY-MM-DD HH:mm:ss". */
function tsLocal(): string {
  const d = new Date();
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())} ${p(
    d.getHours()
  )}:${p(d.getMinutes())}:${p(d.getSeconds())}`;
}

function writer(tag: "INFO" | "DEBUG" | "WARN" | "ERROR") {
  const c =
    tag === "ERROR"
      ? console.error
      : tag === "WARN"
      ? console.warn
      : tag === "DEBUG"
      ? console.debug
      : console.log;

  const displayTag =
    tag === "ERROR" ? "***ERROR***" : tag === "WARN" ? "**WARN" : tag;

  return (obj: Json, msg?: string, ...rest: unknown[]): void => {
    const prefix = `${displayTag} ${tsLocal()}`;
    if (msg !== undefined) c(prefix, msg, obj, ...rest);
    else c(prefix, obj, ...rest);
  };
}

const CONSOLE_ROOT: ILogger = {
  debug: writer("DEBUG"),
  info: writer("INFO"),
  warn: writer("WARN"),
  error: writer("ERROR"),
};

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  constructor(private readonly ctx: Json = {}) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  private root(): ILogger {
    return ROOT ?? CONSOLE_ROOT;
  }

  public info = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!levelAllows("info")) return;
    const [obj, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().info(obj, msg, ...tail);
  };

  // always includes origin
  public debug = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!levelAllows("debug")) return;
    const [obj0, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    const obj = { ...obj0, origin: captureOrigin(2) };
    this.root().debug(obj, msg, ...tail);
  };

  public warn = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!levelAllows("warn")) return;
    const [obj, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().warn(obj, msg, ...tail);
  };

  public error = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!levelAllows("error")) return;
    const [obj, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().error(obj, msg, ...tail);
  };

  public serializeError(err: unknown) {
    if (err instanceof Error)
      return { name: err.name, message: err.message, stack: err.stack };
    return { message: String(err) };
  }
}

function isJson(x: unknown): x is Json {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/** Normalize args for BoundLogger while merging in bound context. */
function normalizeForBound(
  boundCtx: Json,
  arg1: unknown,
  arg2?: unknown,
  rest: unknown[] = []
): [Json, string | undefined, unknown[]] {
  const meta: Json = {};
  const tail: unknown[] = [];
  let msg: string | undefined;

  const absorb = (xs: unknown[]) => {
    for (const x of xs) {
      if (isJson(x)) Object.assign(meta, x);
      else if (x !== undefined) tail.push(x);
    }
  };

  if (typeof arg1 === "string") {
    msg = arg1;
    absorb([arg2, ...rest]);
  } else if (isJson(arg1)) {
    Object.assign(meta, arg1);
    if (typeof arg2 === "string") {
      msg = arg2;
      absorb(rest);
    } else {
      absorb([arg2, ...rest]);
    }
  } else {
    return [{ ...boundCtx, arg0: arg1, arg1: arg2 }, undefined, rest];
  }

  return [{ ...boundCtx, ...meta }, msg, tail];
}

/** Capture file/method/line from the current stack frame. */
function captureOrigin(depth = 2): Record<string, string | number | undefined> {
  const e = new Error();
  const lines = (e.stack || "").split("\n");
  const line = lines[depth + 1] || "";
  const m =
    /at\s+(?<method>[^(\s]+)?\s*\(?((?<file>[^:()]+):(?<line>\d+):(?<col>\d+))\)?/i.exec(
      line
    );
  if (!m || !m.groups) return {};
  const file = shortenPath(m.groups.file || "");
  return { file, method: m.groups.method, line: Number(m.groups.line) };
}

/** Shorten absolute paths to repo-relative where possible (heuristic). */
function shortenPath(abs: string): string {
  const anchors = ["/backend/", "/src/"];
  for (const a of anchors) {
    const i = abs.indexOf(a);
    if (i >= 0) return abs.slice(i + 1);
  }
  return abs;
}
