// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Console diagnostics for lanwake.
 * One coloured line per event; warnings and errors go to stderr.
 */

import chalk from "chalk";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogStream = "stdout" | "stderr";

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Output sink; defaults to process.stdout / process.stderr. */
  write?: (line: string, stream: LogStream) => void;
}

const PREFIX = "[lanwake]";

const STYLES: Record<LogLevel, (text: string) => string> = {
  DEBUG: chalk.gray,
  INFO: chalk.blue,
  WARNING: chalk.yellow,
  ERROR: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** LANWAKE_LOG_LEVEL when set to a known level, otherwise INFO. */
export function levelFromEnv(): LogLevel {
  const raw = process.env["LANWAKE_LOG_LEVEL"]?.trim().toUpperCase();
  return raw && isLogLevel(raw) ? raw : "INFO";
}

function defaultWrite(line: string, stream: LogStream): void {
  (stream === "stderr" ? process.stderr : process.stdout).write(line + "\n");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? levelFromEnv();
  const write = options.write ?? defaultWrite;
  const threshold = LOG_LEVELS.indexOf(level);

  const emit = (at: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(at) < threshold) return;
    const stream: LogStream = at === "WARNING" || at === "ERROR" ? "stderr" : "stdout";
    write(STYLES[at](`${PREFIX} ${message}`), stream);
  };

  return {
    level,
    debug: (message) => emit("DEBUG", message),
    info: (message) => emit("INFO", message),
    warn: (message) => emit("WARNING", message),
    error: (message) => emit("ERROR", message),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  level: "ERROR",
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
