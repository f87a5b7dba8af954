// src/logger.ts

import { toError } from "./errors";

const LOG_LEVELS = ["debug", "info", "warn", "error", "none"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmittedLevel = Exclude<LogLevel, "none">;

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

/**
 * Environment variable consulted for the initial log level.
 */
export const LOG_LEVEL_ENV = "NODECTL_LOG_LEVEL";

/**
 * Fields carried on every entry: which component logged it, for which node,
 * and which peer address or connection it concerns.
 */
export interface LogContext {
  component?: string;
  nodeId?: string;
  address?: string;
  connection?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: EmittedLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

const CONSOLE_WRITERS: Record<EmittedLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function formatContext(context: LogContext): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      pairs.push(`${key}=${value}`);
    }
  }
  return pairs.length > 0 ? ` [${pairs.join(" ")}]` : "";
}

/**
 * Writes one line per entry: timestamp, level, context, message and, for
 * entries carrying an error, its message.
 */
export const consoleLogHandler: LogHandler = (entry) => {
  const head = `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)}`;
  const tail = entry.error ? `: ${entry.error.message}` : "";
  CONSOLE_WRITERS[entry.level](`${head}${formatContext(entry.context)} ${entry.message}${tail}`);
};

/**
 * Parses a level name, falling back when the value is missing or unknown.
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export interface LoggingOptions {
  level: LogLevel;
  handler: LogHandler;
}

/**
 * Process-wide logging settings shared by every Logger.
 */
export const loggerConfig: LoggingOptions = {
  level: parseLogLevel(process.env[LOG_LEVEL_ENV]),
  handler: consoleLogHandler,
};

export function configureLogging(options: Partial<LoggingOptions>): void {
  if (options.level !== undefined) {
    loggerConfig.level = options.level;
  }
  if (options.handler !== undefined) {
    loggerConfig.handler = options.handler;
  }
}

/**
 * A logger bound to a context. Nodes, connectors and connections each get a
 * child carrying their own identifiers.
 */
export class Logger {
  constructor(private readonly context: LogContext = {}) {}

  child(extra: LogContext): Logger {
    return new Logger({ ...this.context, ...extra });
  }

  debug(message: string, extra?: LogContext): void {
    this.emit("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.emit("info", message, extra);
  }

  warn(message: string, extra?: LogContext): void {
    this.emit("warn", message, extra);
  }

  error(message: string, error: unknown, extra?: LogContext): void {
    this.emit("error", message, extra, toError(error));
  }

  private emit(level: EmittedLevel, message: string, extra?: LogContext, error?: Error): void {
    if (SEVERITY[level] < SEVERITY[loggerConfig.level]) {
      return;
    }
    loggerConfig.handler({
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    });
  }
}

export function createLogger(component: string): Logger {
  return new Logger({ component });
}
