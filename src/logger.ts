/**
 * Structured logger for the registry.
 *
 * Every line carries an ISO timestamp, the level and the component name.
 * Text mode prints `[ts] [LEVEL] [component] message {data}`; JSON mode prints
 * one object per line. All output goes to stderr so command results on
 * stdout stay machine-readable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogSink {
  write(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  sink?: LogSink;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(component: string): Logger;
}

const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(line);
  },
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function formatLine(
  json: boolean,
  level: LogLevel,
  component: string,
  message: string,
  data?: Record<string, unknown>,
): string {
  const ts = new Date().toISOString();
  if (json) {
    const entry: Record<string, unknown> = { ts, level, component, msg: message };
    if (data) entry.data = data;
    return `${JSON.stringify(entry)}\n`;
  }
  const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
  return data ? `${prefix} ${message} ${JSON.stringify(data)}\n` : `${prefix} ${message}\n`;
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? "info"];
  const json = options.json ?? false;
  const sink = options.sink ?? stderrSink;

  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < minLevel) return;
    sink.write(formatLine(json, level, component, message, data));
  };

  return {
    debug: (msg, data) => emit("debug", msg, data),
    info: (msg, data) => emit("info", msg, data),
    warn: (msg, data) => emit("warn", msg, data),
    error: (msg, data) => emit("error", msg, data),
    child: (sub) => createLogger(`${component}:${sub}`, options),
  };
}

/** Logger that drops everything; the default for library use without config. */
export function silentLogger(): Logger {
  return createLogger("registry", { sink: { write: () => undefined } });
}
