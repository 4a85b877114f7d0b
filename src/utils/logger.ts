import chalk from "chalk"; // Using chalk for colored output

// Console logger with levels and colors.
// Everything goes to stderr: stdout belongs to the stdio MCP transport.

export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

export type LogLevelName = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Parses a level name case-insensitively.
 * @returns the normalized name, or undefined when the value is not a level
 */
export function parseLogLevel(value: string | undefined): LogLevelName | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return LOG_LEVEL_NAMES.find((name) => name === normalized);
}

let currentLogLevel: LogLevel =
  LEVELS_BY_NAME[
    parseLogLevel(process.env.MCP_LOG_LEVEL) ??
      parseLogLevel(process.env.LOG_LEVEL) ??
      "info"
  ];

export function setLogLevel(level: LogLevelName): void {
  currentLogLevel = LEVELS_BY_NAME[level];
}

export function getLogLevel(): LogLevelName {
  return (
    LOG_LEVEL_NAMES.find((name) => LEVELS_BY_NAME[name] === currentLogLevel) ??
    "info"
  );
}

export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (currentLogLevel <= LogLevel.DEBUG) {
      console.error(chalk.gray(`[DEBUG]`), message, ...args);
    }
  },
  info: (message: string, ...args: unknown[]) => {
    if (currentLogLevel <= LogLevel.INFO) {
      console.error(chalk.blue(`[INFO]`), message, ...args);
    }
  },
  warn: (message: string, ...args: unknown[]) => {
    if (currentLogLevel <= LogLevel.WARN) {
      console.error(chalk.yellow(`[WARN]`), message, ...args);
    }
  },
  error: (message: string, ...args: unknown[]) => {
    if (currentLogLevel <= LogLevel.ERROR) {
      // Log error message and stack trace if available
      console.error(chalk.red(`[ERROR]`), message, ...args);
      const errorArg = args.find((arg) => arg instanceof Error);
      if (errorArg instanceof Error && errorArg.stack) {
        console.error(chalk.red(errorArg.stack));
      }
    }
  },
};
