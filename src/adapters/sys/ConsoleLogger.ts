import type { LoggerPort, LogLevel } from "../../ports/sys/LoggerPort";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return fallback;
  }
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  const payload = meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
  switch (level) {
    case "debug":
      return console.debug(payload);
    case "info":
      return console.info(payload);
    case "warn":
      return console.warn(payload);
    case "error":
      return console.error(payload);
    default:
      return console.log(payload);
  }
}

export class ConsoleLogger implements LoggerPort {
  readonly level: LogLevel;
  readonly scope?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.scope = options.scope;
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    log(level, this.scope ? `[${this.scope}] ${message}` : message, meta);
  }
}
