import type { LogLevel, LoggerPort } from "../../ports/sys/LoggerPort";

export interface ConsoleLoggerOptions {
  debugEnabled?: boolean;
}

function write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
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
  }
}

export class ConsoleLogger implements LoggerPort {
  private readonly debugEnabled: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? false;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    write("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    write("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    write("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    write("error", message, meta);
  }
}
