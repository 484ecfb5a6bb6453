import type { LogLevel } from "./types.js";

export interface LogContext {
  traceId?: string;
  subject?: string;
  phase?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(ctx: LogContext): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const processSink: LogSink = (level, line) => {
  if (level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
};

function createLogger(baseCtx: LogContext, minLevel: LogLevel, sink: LogSink): Logger {
  const minPriority = LEVEL_PRIORITY[minLevel];

  function emit(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: Record<string, unknown> = {
      level,
      ts: new Date().toISOString(),
      msg,
      ...baseCtx,
      ...ctx,
    };

    // Remove undefined values for cleaner output
    for (const key of Object.keys(entry)) {
      if (entry[key] === undefined) delete entry[key];
    }

    sink(level, JSON.stringify(entry));
  }

  return {
    debug: (msg, ctx) => emit("debug", msg, ctx),
    info: (msg, ctx) => emit("info", msg, ctx),
    warn: (msg, ctx) => emit("warn", msg, ctx),
    error: (msg, ctx) => emit("error", msg, ctx),
    child(ctx: LogContext): Logger {
      return createLogger({ ...baseCtx, ...ctx }, minLevel, sink);
    },
  };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

export function createRootLogger(minLevel?: LogLevel, sink: LogSink = processSink): Logger {
  const envLevel = process.env.LOG_LEVEL;
  return createLogger({}, minLevel ?? (isLogLevel(envLevel) ? envLevel : "info"), sink);
}

/** Logger that drops everything; for callers that do not want engine output. */
export const silentLogger: Logger = createLogger({}, "error", () => {});
