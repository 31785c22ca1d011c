// ============================================================================
// LOGGING
// ============================================================================
// Scoped console logger. Every line carries a timestamp and a [scope] tag.

import chalk from "chalk";

import { LogLevel } from "../types/index.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function write(level: LogLevel, scope: string, message: string, details: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const prefix = `${chalk.gray(new Date().toISOString())} ${LEVEL_COLORS[level](level.toUpperCase().padEnd(5))} ${chalk.bold(`[${scope}]`)}`;
  const line = `${prefix} ${message}`;

  if (level === "error") {
    console.error(line, ...details);
  } else if (level === "warn") {
    console.warn(line, ...details);
  } else {
    console.log(line, ...details);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, ...details) => write("debug", scope, message, details),
    info: (message, ...details) => write("info", scope, message, details),
    warn: (message, ...details) => write("warn", scope, message, details),
    error: (message, ...details) => write("error", scope, message, details),
  };
}

/**
 * Flatten an unknown thrown value into something loggable.
 */
export function describeError(error: unknown): { type: string; message: string } {
  if (error instanceof Error) {
    return { type: error.constructor.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
}
