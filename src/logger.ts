/**
 * Structured logger.
 *
 * Environment:
 *   PHASECTL_LOG_LEVEL = debug|info|warn|error (default: info)
 *   PHASECTL_LOG_JSON  = 1 for JSON lines (default: text)
 *
 * Everything goes to stderr; stdout is reserved for command output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogSink = (line: string) => void;

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(component: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  json?: boolean;
  sink?: LogSink;
};

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function envLevel(): LogLevel {
  const raw = (process.env.PHASECTL_LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

export function createLogger(component: string, opts: LoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[opts.level ?? envLevel()];
  const json = opts.json ?? process.env.PHASECTL_LOG_JSON === "1";
  const sink = opts.sink ?? stderrSink;

  function emit(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < minLevel) return;
    const ts = new Date().toISOString();
    if (json) {
      const entry: Record<string, unknown> = { ts, level, component, msg };
      if (data) entry.data = data;
      sink(JSON.stringify(entry));
      return;
    }
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
    sink(data ? `${prefix} ${msg} ${JSON.stringify(data)}` : `${prefix} ${msg}`);
  }

  return {
    debug: (msg, data) => emit("debug", msg, data),
    info: (msg, data) => emit("info", msg, data),
    warn: (msg, data) => emit("warn", msg, data),
    error: (msg, data) => emit("error", msg, data),
    child: (sub) => createLogger(`${component}:${sub}`, opts),
  };
}

/** Logger that drops everything. Library default when the caller passes none. */
export const silentLogger: Logger = createLogger("silent", { level: "error", sink: () => undefined });
