/**
 * Export progress logging
 * The export pipeline reports every status line through an ExportLogger so the
 * CLI can print it and the MCP server can hand it back to the client.
 */

import chalk from "chalk";

export type LogLevel = "info" | "success" | "warn" | "error";

export interface ExportLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export interface ConsoleLoggerOptions {
  /** stdout is reserved for the protocol when running as an MCP server */
  stream?: "stdout" | "stderr";
  /** Mirrors every line to a callback as well */
  onLog?: (entry: LogEntry) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ExportLogger {
  const write = options.stream === "stderr" ? console.error : console.log;

  const emit = (level: LogLevel, message: string, formatted: string) => {
    write(formatted);
    options.onLog?.({ level, message });
  };

  return {
    info: (message) => emit("info", message, chalk.blue(message)),
    success: (message) => emit("success", message, chalk.green(message)),
    warn: (message) => emit("warn", message, chalk.yellow(message)),
    error: (message) => emit("error", message, chalk.red(message)),
  };
}

export interface MemoryLogger extends ExportLogger {
  readonly entries: LogEntry[];
}

/**
 * Collects log lines instead of printing them (MCP tool results, tests).
 */
export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  return {
    entries,
    info: push("info"),
    success: push("success"),
    warn: push("warn"),
    error: push("error"),
  };
}
