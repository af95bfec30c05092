import { appendFileSync, mkdirSync } from "fs";
import path from "path";

export enum LogLevel {
  SILENT = -1,
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogLevelName = "silent" | "error" | "warn" | "info" | "debug";

export interface Logger {
  error(message: string, error?: unknown): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level: LogLevelName;
  /** Extra sink; every emitted line is appended here as well. */
  file?: string | null;
  scope?: string;
}

const LEVELS: Record<LogLevelName, LogLevel> = {
  silent: LogLevel.SILENT,
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Optional log file shared by a logger and its children. The first failed write
 * disables it; logging never throws into the caller.
 */
class FileSink {
  private enabled = true;

  constructor(readonly file: string) {
    try {
      mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    } catch (error) {
      this.disable(error);
    }
  }

  append(line: string): void {
    if (!this.enabled) return;
    try {
      appendFileSync(this.file, `${line}\n`, "utf-8");
    } catch (error) {
      this.disable(error);
    }
  }

  private disable(error: unknown): void {
    this.enabled = false;
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`⚠️  Log file ${this.file} disabled: ${reason}`);
  }
}

class ConsoleLogger implements Logger {
  private readonly level: LogLevel;

  constructor(
    private readonly options: LoggerOptions,
    private readonly sink: FileSink | null = options.file ? new FileSink(options.file) : null,
  ) {
    this.level = LEVELS[options.level];
  }

  error(message: string, error?: unknown): void {
    const details =
      error instanceof Error
        ? `\nError details: ${error.message}\nStack: ${error.stack ?? "(none)"}`
        : error !== undefined
          ? `\nError details: ${String(error)}`
          : "";
    this.write(LogLevel.ERROR, `${message}${details}`);
  }

  warn(message: string): void {
    this.write(LogLevel.WARN, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({ ...this.options, scope }, this.sink);
  }

  private write(level: LogLevel, message: string): void {
    if (level > this.level) return;

    const scope = this.options.scope ? `[${this.options.scope}] ` : "";
    const line = `${new Date().toISOString()} ${LogLevel[level]}: ${scope}${message}`;

    // stdout stays free for the report path printed by the CLI
    console.error(line);
    this.sink?.append(line);
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

export const silentLogger: Logger = createLogger({ level: "silent" });
