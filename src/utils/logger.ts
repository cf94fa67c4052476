/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for Camsnap.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import type { LogEntry } from "./logEmitter.js";
import df from "dateformat";
import { emitLogEntry } from "./logEmitter.js";
import { format } from "node:util";
import { getStreamId } from "./streamContext.js";
import { writeLogEntry } from "./fileLogger.js";

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/* The logger writes either to the console (with colors, for Docker and interactive use) or to the buffered file logger. File mode is the default; the --console
 * flag switches to console mode.
 */

let useConsoleLogging = false;

/**
 * Sets the logging mode.
 * @param enabled - True to log to the console, false to log to the file logger.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables all debug categories. Used by the --debug CLI flag.
 * @param enabled - True to enable all debug logging.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Core logging implementation shared by all log levels. Prefixes the session ID when one is in context, fans the entry out to SSE subscribers, and routes output to
 * the console or the file logger.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param categoryTag - Debug category, for debug entries.
 */
function logWithLevel(level: LogEntry["level"], color: string, message: string, args: unknown[], categoryTag?: string): void {

  const streamId = getStreamId();
  const formatted = args.length > 0 ? format(message, ...args) : message;
  const logMessage = streamId ? [ "[", streamId, "] ", formatted ].join("") : formatted;
  const entry: LogEntry = { level, message: logMessage, timestamp: df(new Date(), "yyyy/mm/dd HH:MM:ss.l") };

  if(categoryTag) {

    entry.categoryTag = categoryTag;
  }

  emitLogEntry(entry);

  if(!useConsoleLogging) {

    writeLogEntry(level, logMessage, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  const consoleMethod = (level === "error") ? console.error : ((level === "warn") ? console.warn : console.log);
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, logMessage, ANSI_COLORS.reset);
  } else {

    consoleMethod(logMessage);
  }
}

/* The LOG object provides printf-style logging (%s, %d, %j, %o via util.format). Debug messages are filtered by category; see debugFilter.ts.
 */
export const LOG = {

  /**
   * Logs a debug message in cyan when the category is enabled via CAMSNAP_DEBUG or --debug.
   * @param category - The debug category (e.g., "session:reconnect").
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, category);
  },

  /**
   * Logs an error message in red. Use for failures that stop an operation: a session that could not be opened, a session that gave up, a failed startup.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use for recovered or per-capture problems: a reconnect, a failed upload.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  }
};
