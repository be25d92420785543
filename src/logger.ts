// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Leveled, component-tagged logging.
 *
 * Log levels:
 *   - Error (0): failures that abort a decode or encode
 *   - Warn  (1): recoverable problems such as skipped tag entries (default)
 *   - Info  (2): milestones
 *   - Debug (3): per-directory and per-image detail
 *   - Trace (4): per-chunk detail
 *
 * The default level is read from `TIFF_LOG_LEVEL`.
 *
 * @example
 * ```ts
 * import { logger } from "./logger.js";
 * logger.debug("decoder", "opened stream", { byteOrder: "little" });
 * ```
 */

export enum LogLevel {
  Error = 0,
  Warn = 1,
  Info = 2,
  Debug = 3,
  Trace = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.Error]: "ERROR",
  [LogLevel.Warn]: "WARN",
  [LogLevel.Info]: "INFO",
  [LogLevel.Debug]: "DEBUG",
  [LogLevel.Trace]: "TRACE",
};

/** Destination for formatted log lines. */
export interface LogSink {
  write(level: LogLevel, line: string, data?: unknown): void;
}

/** Writes errors and warnings to stderr and everything else to stdout. */
export const consoleSink: LogSink = {
  write(level, line, data) {
    const args: unknown[] = data === undefined ? [line] : [line, data];
    if (level === LogLevel.Error) {
      console.error(...args);
    } else if (level === LogLevel.Warn) {
      console.warn(...args);
    } else if (level === LogLevel.Info) {
      console.info(...args);
    } else {
      console.debug(...args);
    }
  },
};

/** Parse a level name (case-insensitive). Unknown names yield `fallback`. */
export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.Warn): LogLevel {
  switch (name?.trim().toUpperCase()) {
    case "ERROR":
      return LogLevel.Error;
    case "WARN":
      return LogLevel.Warn;
    case "INFO":
      return LogLevel.Info;
    case "DEBUG":
      return LogLevel.Debug;
    case "TRACE":
      return LogLevel.Trace;
    default:
      return fallback;
  }
}

export class Logger {
  private level: LogLevel;
  private componentFilter: string | null = null;
  private readonly sink: LogSink;

  constructor(level: LogLevel = parseLogLevel(process.env.TIFF_LOG_LEVEL), sink: LogSink = consoleSink) {
    this.level = level;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Only emit messages from `component` (null clears the filter). */
  setComponentFilter(component: string | null): void {
    this.componentFilter = component;
  }

  isEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  log(level: LogLevel, component: string, message: string, data?: unknown): void {
    if (level > this.level) return;
    if (this.componentFilter !== null && component !== this.componentFilter) return;

    const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
    this.sink.write(level, `[${timestamp}] [${LEVEL_NAMES[level]}] [${component}] ${message}`, data);
  }

  error(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.Error, component, message, data);
  }

  warn(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.Warn, component, message, data);
  }

  info(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.Info, component, message, data);
  }

  debug(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.Debug, component, message, data);
  }

  trace(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.Trace, component, message, data);
  }
}

/** Shared instance used when no logger is passed in options. */
export const logger = new Logger();
