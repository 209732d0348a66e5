/**
 * Logger
 * Scoped console logging on stderr, gated by UAC_LOG_LEVEL
 */

import { config } from "./config";

export const LogLevel = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
  SILENT: "silent",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVELS: readonly string[] = Object.values(LogLevel);

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.includes(value);
}

let threshold: LogLevel = isLogLevel(config.LOG_LEVEL) ? config.LOG_LEVEL : LogLevel.WARN;

// stdout carries the report, so every level goes to stderr
let sink: (line: string) => void = (line) => console.error(line);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Redirect log output (tests capture it)
 */
export function setLogSink(write: (line: string) => void): void {
  sink = write;
}

export function resetLogSink(): void {
  sink = (line) => console.error(line);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string): void => {
    if (SEVERITY[level] < SEVERITY[threshold]) return;
    sink(`[${scope}] ${level === "info" ? "" : `${level}: `}${message}`);
  };

  return {
    debug: (message) => emit(LogLevel.DEBUG, message),
    info: (message) => emit(LogLevel.INFO, message),
    warn: (message) => emit(LogLevel.WARN, message),
    error: (message) => emit(LogLevel.ERROR, message),
  };
}
