/**
 * Structured JSON logger. One line per entry, written through `console`.
 *
 * The minimum level comes from `LOG_LEVEL` (debug, info, warn, error) unless
 * passed explicitly; components derive child loggers carrying their context.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  error: 3,
  info: 1,
  warn: 2,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  [key: string]: unknown;
}

export interface LoggerContext {
  component?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(context: LoggerContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Where formatted entries go; defaults to the matching console method. */
  write?: (entry: LogEntry) => void;
  now?: () => Date;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function levelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) return envLevel;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function writeToConsole(entry: LogEntry): void {
  const output = JSON.stringify(entry);
  switch (entry.level) {
    case "error":
      console.error(output);
      break;
    case "warn":
      console.warn(output);
      break;
    case "debug":
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

function createLoggerWithContext(
  context: LoggerContext,
  options: Required<LoggerOptions>,
): Logger {
  const log =
    (level: LogLevel) =>
    (message: string, metadata?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[options.level]) {
        return;
      }
      const entry: LogEntry = {
        level,
        message,
        timestamp: options.now().toISOString(),
      };
      options.write(Object.assign(entry, context, metadata, { level, message }));
    };

  return {
    child(childContext: LoggerContext): Logger {
      return createLoggerWithContext({ ...context, ...childContext }, options);
    },
    debug: log("debug"),
    error: log("error"),
    info: log("info"),
    warn: log("warn"),
  };
}

export function createLogger(
  component?: string,
  options: LoggerOptions = {},
): Logger {
  return createLoggerWithContext(component ? { component } : {}, {
    level: options.level ?? levelFromEnv(),
    now: options.now ?? (() => new Date()),
    write: options.write ?? writeToConsole,
  });
}

/** Logger that drops every entry. */
export const silentLogger: Logger = {
  child: () => silentLogger,
  debug: () => {},
  error: () => {},
  info: () => {},
  warn: () => {},
};
