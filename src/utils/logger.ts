import { appendFileSync, mkdirSync } from "fs";
import * as path from "path";
import chalk from "chalk";
import { LogLevel } from "../types";

/**
 * Logger handle passed into every component
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export type Level = Exclude<LogLevel, "silent">;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_STYLE: Record<Level, (text: string) => string> = {
  debug: (text) => chalk.dim(text),
  info: (text) => text,
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  /**
   * Append lines to this file instead of writing to stderr
   */
  file?: string;
  /**
   * Override the output sink (mostly for tests)
   */
  sink?: (line: string, level: Level) => void;
}

/**
 * Line-oriented logger: `[I|2024-01-01T00:00:00.000Z|scanner] message`.
 * Writes to stderr so stdout stays free for command results.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope: string;
  private readonly write: (line: string, level: Level) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.scope = options.scope ?? "fs-snapshot";

    const { sink, file } = options;
    if (sink) {
      this.write = sink;
    } else if (file) {
      mkdirSync(path.dirname(file), { recursive: true });
      this.write = (line) => appendFileSync(file, line + "\n", "utf8");
    } else {
      this.write = (line, level) => {
        process.stderr.write(LEVEL_STYLE[level](line) + "\n");
      };
    }
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      level: this.level,
      scope: `${this.scope}.${scope}`,
      sink: this.write,
    });
  }

  private log(level: Level, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const tag = level.charAt(0).toUpperCase();
    const timestamp = new Date().toISOString();
    this.write(`[${tag}|${timestamp}|${this.scope}] ${message}`, level);
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/**
 * Create the process logger from resolved settings
 */
export function createLogger(options: ConsoleLoggerOptions = {}): Logger {
  return new ConsoleLogger(options);
}
