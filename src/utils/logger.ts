/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

/**
 * Wraps every console write, e.g. to clear a spinner line before it
 */
export type OutputWrapper = (print: () => void) => void;

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private scope?: string,
    private wrapOutput?: OutputWrapper,
  ) {}

  /**
   * Logger sharing this level and output wrapper that prefixes every message with `[scope]`
   */
  child(scope: string): Logger {
    return new Logger(this.level, scope, this.wrapOutput);
  }

  isEnabled(level: LogLevel): boolean {
    switch (level) {
      case "debug":
        return this.level === "debug";
      case "info":
        return ["debug", "info"].includes(this.level);
      case "warn":
        return ["debug", "info", "warn"].includes(this.level);
      case "error":
        return true;
    }
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      this.emit(() => console.log(`${chalk.dim("[DEBUG]")} ${this.format(message)}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      this.emit(() => console.log(`${chalk.cyan("[INFO]")} ${this.format(message)}`));
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      this.emit(() => console.warn(`${chalk.yellow("[WARN]")} ${this.format(message)}`));
    }
  }

  error(message: string, error?: Error): void {
    this.emit(() => {
      console.error(`${chalk.red("[ERROR]")} ${this.format(message)}`);
      if (error) {
        console.error(error);
      }
    });
  }

  private emit(print: () => void): void {
    if (this.wrapOutput) {
      this.wrapOutput(print);
    } else {
      print();
    }
  }

  private format(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }
}
