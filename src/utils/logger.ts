/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  constructor(private level: LogLevel = "info") {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled("error")) return;

    console.error(`${chalk.red("[ERROR]")} ${message}`);
    if (error !== undefined && this.level === "debug") {
      console.error(error);
    }
  }
}
