/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: Buffered file logging with size-based trimming for Camsnap.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Entries are collected in memory and appended to the log file once per second. Every SIZE_CHECK_FREQUENCY writes the real file size is checked; past the limit,
 * the file is cut down to half the limit, keeping the newest complete lines. A write error pauses file logging for a minute instead of failing every call.
 */

const FLUSH_INTERVAL_MS = 1000;
const SIZE_CHECK_FREQUENCY = 100;
const ERROR_RETRY_DELAY_MS = 60000;
const ANSI_RESET = "\x1b[0m";

let logFilePath: Nullable<string> = null;
let writeBuffer: string[] = [];
let writeCount = 0;
let flushTimer: Nullable<ReturnType<typeof setInterval>> = null;
let maxLogSize = 1048576;

// Timestamp when a write error paused logging, or 0 when logging is active.
let pausedAt = 0;

/**
 * Initializes the file logger, creating the log file and its directory if needed. A failure here falls back to no file logging and is reported on stderr.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  maxLogSize = maxSize;

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });

    // Append mode creates the file when missing and leaves existing content alone.
    await fsPromises.appendFile(logPath, "", "utf-8");

    logFilePath = logPath;

    flushTimer = setInterval((): void => {

      void flushLogBuffer();
    }, FLUSH_INTERVAL_MS);

    // The flush timer must not keep the process alive on its own.
    flushTimer.unref();
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Queues a log entry for the next flush.
 * @param level - Log level.
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code applied to the level prefix and message.
 * @param categoryTag - Optional debug category, shown as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!logFilePath) {

    return;
  }

  if(pausedAt) {

    if((Date.now() - pausedAt) < ERROR_RETRY_DELAY_MS) {

      return;
    }

    pausedAt = 0;
  }

  const timestamp = df(new Date(), "yyyy/mm/dd HH:MM:ss.l");
  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  writeBuffer.push([ "[", timestamp, "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join(""));
  writeCount++;

  if((writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void trimIfNeeded();
  }
}

/**
 * Appends the buffered entries to the log file.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    await fsPromises.appendFile(logFilePath, content, "utf-8");
  } catch(error) {

    pausedAt = Date.now();

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging paused for %s seconds.", (error instanceof Error) ? error.message : String(error),
      ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Appends the buffered entries synchronously. Used from the process exit handler, where asynchronous work never completes.
 */
export function flushLogBufferSync(): void {

  if(!logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    fs.appendFileSync(logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Trims the log file to half the maximum size when it has grown past the limit. Skipped while debug logging is active so a diagnostic session is not cut short.
 */
async function trimIfNeeded(): Promise<void> {

  if(!logFilePath || isAnyDebugEnabled()) {

    return;
  }

  try {

    const stats = await fsPromises.stat(logFilePath);

    if(stats.size <= maxLogSize) {

      return;
    }

    const content = await fsPromises.readFile(logFilePath, "utf-8");
    const cutPosition = content.length - Math.floor(maxLogSize / 2);
    const lineStart = content.indexOf("\n", cutPosition);
    const trimmed = content.substring((lineStart === -1) ? cutPosition : (lineStart + 1));
    const tempPath = logFilePath + ".tmp";

    // Write then rename so a crash mid-trim leaves the old file intact.
    await fsPromises.writeFile(tempPath, trimmed, "utf-8");
    await fsPromises.rename(tempPath, logFilePath);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Stops the flush timer and writes any remaining entries.
 */
export function shutdownFileLogger(): void {

  if(flushTimer) {

    clearInterval(flushTimer);
    flushTimer = null;
  }

  flushLogBufferSync();
  logFilePath = null;
}
