import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): Promise<void>;
}

type ConsoleLevel = "log" | "info" | "warn" | "error" | "debug";

const LEVELS: ConsoleLevel[] = ["log", "info", "warn", "error", "debug"];

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors every console call into `logFile` (append mode) until `shutdown()`
 * restores the original console methods. Without a path this is a no-op.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- device session started ---\n`);

  const original: Record<ConsoleLevel, (...args: unknown[]) => void> = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };

  stream.on("error", (err) => {
    original.error.apply(console, [`Log mirror to ${resolvedLog} failed:`, err.message]);
  });

  const mirror =
    (level: ConsoleLevel) =>
    (...args: unknown[]) => {
      original[level].apply(console, args);
      const message = args.map(formatArg).join(" ");
      stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}\n`);
    };

  for (const level of LEVELS) {
    console[level] = mirror(level);
  }

  let closed = false;
  const shutdown = () =>
    new Promise<void>((resolve) => {
      if (closed) {
        resolve();
        return;
      }
      closed = true;
      for (const level of LEVELS) {
        console[level] = original[level];
      }
      stream.end(`[${new Date().toISOString()}] --- device session ended ---\n`, () => resolve());
    });

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
