/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logs.ts: Log viewing endpoints for Camsnap.
 */
import type { Express, Request, Response } from "express";
import type { LogEntry } from "../utils/index.js";
import { LOG, formatError, isConsoleLogging, subscribeToLogs } from "../utils/index.js";
import type { AppContext } from "./context.js";
import type { Nullable } from "../types/index.js";
import fs from "node:fs";
import { getLogFilePath } from "../config/paths.js";
import { isRecord } from "../config/userConfig.js";

const { promises: fsPromises } = fs;

/* Log entries are parsed from the log file format: [YYYY/MM/DD HH:MM:ss.l] [LEVEL] message
 * The level prefix is present for debug, warn, and error entries; info entries have no prefix.
 */

interface LogsResponse {

  entries: LogEntry[];
  filtered: number;
  mode: "console" | "file";
  total: number;
}

const LOG_LEVELS = [ "error", "info", "warn" ];

// Pattern to match ANSI escape sequences (SGR - Select Graphic Rendition).
// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

// Pattern to match log entries: [timestamp] optional [LEVEL] or [DEBUG:category] message.
const LOG_LINE_PATTERN = /^\[(\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}\.\d{3})\] (?:\[(WARN|ERROR|DEBUG(?::[^\]]+)?)\] )?(.*)$/;

/**
 * Parses a single log line into a structured entry. ANSI color codes are stripped first.
 * @param line - The raw log line from the file.
 * @returns The parsed log entry, or null if the line does not match the expected format.
 */
export function parseLogLine(line: string): Nullable<LogEntry> {

  const match = LOG_LINE_PATTERN.exec(line.replace(ANSI_PATTERN, ""));

  if(!match) {

    return null;
  }

  const timestamp = match[1];
  const levelStr = match[2] ?? "";
  const message = match[3];

  let level: LogEntry["level"] = "info";
  let categoryTag: string | undefined;

  if(levelStr.startsWith("DEBUG")) {

    level = "debug";

    // "DEBUG:session:read" carries the category "session:read".
    const colonIndex = levelStr.indexOf(":");

    if(colonIndex !== -1) {

      categoryTag = levelStr.substring(colonIndex + 1);
    }
  } else if(levelStr === "WARN") {

    level = "warn";
  } else if(levelStr === "ERROR") {

    level = "error";
  }

  const entry: LogEntry = { level, message, timestamp };

  if(categoryTag) {

    entry.categoryTag = categoryTag;
  }

  return entry;
}

/**
 * Reads and parses the log file, returning the most recent entries.
 * @param logFilePath - Path to the log file.
 * @param lines - Maximum number of entries to return.
 * @param levelFilter - Optional level filter.
 * @returns The parsed log entries and metadata.
 */
async function readLogEntries(logFilePath: string, lines: number, levelFilter: Nullable<string>): Promise<LogsResponse> {

  if(isConsoleLogging()) {

    return { entries: [], filtered: 0, mode: "console", total: 0 };
  }

  let content: string;

  try {

    content = await fsPromises.readFile(logFilePath, "utf-8");
  } catch(error) {

    if(isRecord(error) && (error.code === "ENOENT")) {

      return { entries: [], filtered: 0, mode: "file", total: 0 };
    }

    throw error;
  }

  const allEntries: LogEntry[] = [];

  for(const line of content.split("\n")) {

    const entry = line.trim() ? parseLogLine(line) : null;

    if(entry) {

      allEntries.push(entry);
    }
  }

  const filteredEntries = levelFilter ? allEntries.filter((entry) => entry.level === levelFilter) : allEntries;

  return { entries: filteredEntries.slice(-lines), filtered: filteredEntries.length, mode: "file", total: allEntries.length };
}

/**
 * Extracts a valid level filter from a query parameter.
 * @param value - The raw query value.
 * @returns The level, or null for no filtering.
 */
function parseLevel(value: unknown): Nullable<string> {

  return ((typeof value === "string") && LOG_LEVELS.includes(value)) ? value : null;
}

/**
 * Creates the log endpoints: recent entries from the log file, and a live stream of new entries.
 * @param app - The Express application.
 * @param context - The application context.
 */
export function setupLogsEndpoint(app: Express, context: AppContext): void {

  app.get("/logs", async (req: Request, res: Response): Promise<void> => {

    const linesParam = (typeof req.query.lines === "string") ? parseInt(req.query.lines, 10) : NaN;
    const lines = (!Number.isNaN(linesParam) && (linesParam > 0) && (linesParam <= 1000)) ? linesParam : 100;

    try {

      res.json(await readLogEntries(getLogFilePath(context.config), lines, parseLevel(req.query.level)));
    } catch(error) {

      LOG.warn("Unable to read the log file: %s.", formatError(error));

      res.status(500).json({ entries: [], error: "Failed to read log file.", filtered: 0, mode: "file", total: 0 });
    }
  });

  // Live log entries via Server-Sent Events. The connection remains open until the client disconnects.
  app.get("/logs/stream", (req: Request, res: Response): void => {

    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("Content-Type", "text/event-stream");

    res.flushHeaders();

    const filterLevel = parseLevel(req.query.level);

    const unsubscribe = subscribeToLogs((entry) => {

      if(filterLevel && (entry.level !== filterLevel)) {

        return;
      }

      res.write("data: " + JSON.stringify(entry) + "\n\n");
    });

    const heartbeatInterval = setInterval(() => {

      res.write("event: heartbeat\ndata: \n\n");
    }, 30000);

    req.on("close", () => {

      clearInterval(heartbeatInterval);
      unsubscribe();
    });
  });
}
