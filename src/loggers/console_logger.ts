import { z } from "zod";

/**
 * Console logger. Everything goes to stderr so that diagram XML written to
 * stdout stays clean.
 */

export const LogLevelSchema = z.enum(["error", "warning", "info", "debug"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const validLogLevels: readonly LogLevel[] = LogLevelSchema.options;

// Log levels (lower is more severe)
const LogLevelMap: Record<LogLevel, number> = {
  error: 0,
  warning: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string, ...data: unknown[]) => void;
  warn: (message: string, ...data: unknown[]) => void;
  info: (message: string, ...data: unknown[]) => void;
  debug: (message: string, ...data: unknown[]) => void;
};

/** Fixed-width labels so messages line up in a terminal. */
const LEVEL_LABEL: Record<LogLevel, string> = {
  error: "ERROR ❌  ",
  warning: "WARNING ⚠️",
  info: "INFO      ",
  debug: "DEBUG     ",
};

function timestamp(): string {
  return new Date().toISOString();
}

export function create_logger(level: LogLevel = "info"): Logger {
  const threshold = LogLevelMap[level];

  const write = (messageLevel: LogLevel, message: string, data: unknown[]) => {
    if (LogLevelMap[messageLevel] > threshold) {
      return;
    }
    const line = `${timestamp()} ${LEVEL_LABEL[messageLevel]}: ${message}`;
    if (data.length > 0) {
      console.error(line, ...data);
    } else {
      console.error(line);
    }
  };

  return {
    error: (message, ...data) => write("error", message, data),
    warn: (message, ...data) => write("warning", message, data),
    info: (message, ...data) => write("info", message, data),
    debug: (message, ...data) => write("debug", message, data),
  };
}
