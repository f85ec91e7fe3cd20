import { appendFileSync, writeFileSync } from "node:fs";

export type LogLevel = "info" | "warn" | "error";

export interface RunLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createRunLogger(logPath: string): RunLogger {
  // Truncate any log left by an earlier run in the same directory
  writeFileSync(logPath, "");

  const write = (level: LogLevel, message: string): void => {
    const timestamp = new Date().toISOString();
    appendFileSync(
      logPath,
      `[${timestamp}] [${level.toUpperCase()}] ${message}\n`,
    );
  };

  return {
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
