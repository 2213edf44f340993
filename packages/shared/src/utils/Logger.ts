/**
 * Logger
 *
 * Tagged logging used by the codec and the skeletal pipeline.
 * Lines are formatted as `[tag] message` and routed to a sink (console by default).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogSink {
  debug(line: string, data?: unknown): void;
  info(line: string, data?: unknown): void;
  warn(line: string, data?: unknown): void;
  error(line: string, data?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVEL_ENV = "ACTORX_LOG_LEVEL";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const value = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : "info";
}

const consoleSink: LogSink = {
  debug: (line, data) =>
    data === undefined ? console.debug(line) : console.debug(line, data),
  info: (line, data) =>
    data === undefined ? console.log(line) : console.log(line, data),
  warn: (line, data) =>
    data === undefined ? console.warn(line) : console.warn(line, data),
  error: (line, data) =>
    data === undefined ? console.error(line) : console.error(line, data),
};

let currentLevel: LogLevel = levelFromEnv();
let currentSink: LogSink = consoleSink;

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function format(tag: string, message: string): string {
  return `[${tag}] ${message}`;
}

export class Logger {
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  static getLevel(): LogLevel {
    return currentLevel;
  }

  /** Route output elsewhere; pass nothing to restore the console. */
  static setSink(sink?: LogSink): void {
    currentSink = sink ?? consoleSink;
  }

  static debug(tag: string, message: string, data?: unknown): void {
    if (enabled("debug")) currentSink.debug(format(tag, message), data);
  }

  static system(tag: string, message: string, data?: unknown): void {
    if (enabled("info")) currentSink.info(format(tag, message), data);
  }

  static systemWarn(tag: string, message: string, data?: unknown): void {
    if (enabled("warn")) currentSink.warn(format(tag, message), data);
  }

  static systemError(tag: string, message: string, error?: unknown): void {
    if (!enabled("error")) return;
    const detail =
      error === undefined
        ? ""
        : ` ${error instanceof Error ? error.message : String(error)}`;
    currentSink.error(format(tag, `${message}${detail}`), error);
  }
}
