export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, ctx?: LogContext) => void;
  info: (msg: string, ctx?: LogContext) => void;
  warn: (msg: string, ctx?: LogContext) => void;
  error: (msg: string, ctx?: LogContext) => void;
  child: (bindings: LogContext) => Logger;
};

export type LoggerOptions = {
  /** Receives each formatted line, newline included. Defaults to stdout. */
  readonly sink?: (line: string) => void;
  readonly bindings?: LogContext;
  readonly clock?: () => Date;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return value in RANK;
}

function serializeCtx(ctx?: LogContext): string {
  if (!ctx || Object.keys(ctx).length === 0) return "";
  return ` ${JSON.stringify(ctx)}`;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function makeLogger(level: LogLevel, opts: LoggerOptions = {}): Logger {
  const sink = opts.sink ?? ((line: string) => void process.stdout.write(line));
  const clock = opts.clock ?? (() => new Date());
  const bindings = opts.bindings ?? {};

  function log(method: LogLevel, msg: string, ctx?: LogContext): void {
    if (RANK[method] < RANK[level]) return;
    const merged = ctx ? { ...bindings, ...ctx } : bindings;
    // One line per record so output can be shipped as-is.
    sink(`[${clock().toISOString()}] ${method.toUpperCase()} ${msg}${serializeCtx(merged)}\n`);
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
    child: (extra) => makeLogger(level, { sink, clock, bindings: { ...bindings, ...extra } }),
  };
}
