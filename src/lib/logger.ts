/**
 * Structured logger.
 *
 * JSON lines in production, coloured one-liners otherwise:
 *
 * ```typescript
 * logger.info("Metadata OK", { url, durationMs: 812 });
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
};

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
};

type LoggerConfig = {
  minLevel?: LogLevel;
  json?: boolean;
  service?: string;
  write?: (level: LogLevel, line: string) => void;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

const isProduction = process.env.NODE_ENV === "production";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function defaultWrite(level: LogLevel, line: string): void {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const {
    minLevel = isLogLevel(envLevel) ? envLevel : isProduction ? "info" : "debug",
    json = isProduction,
    service = "deal-letter",
    write = defaultWrite,
  } = config;

  const minPriority = LOG_LEVEL_PRIORITY[minLevel];

  function format(entry: LogEntry): string {
    if (json) {
      return JSON.stringify({ ...entry.context, ...entry, context: undefined, service });
    }

    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = `${LEVEL_COLORS[entry.level]}${levelStr}\x1b[0m ${entry.message}`;
    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }
    return output;
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < minPriority) return;
    write(level, format({ timestamp: new Date().toISOString(), level, message, context }));
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

export const logger = createLogger();

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
