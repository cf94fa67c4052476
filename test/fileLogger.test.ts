/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.test.ts: Tests for the buffered log file writer.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { flushLogBuffer, initializeFileLogger, shutdownFileLogger, writeLogEntry } from "../src/utils/fileLogger.js";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { createMorganStream } from "../src/utils/index.js";
import os from "node:os";
import { parseLogLine } from "../src/routes/logs.js";
import path from "node:path";

describe("file logger", () => {

  let directory = "";
  let file = "";

  beforeEach(async () => {

    directory = await mkdtemp(path.join(os.tmpdir(), "camsnap-log-"));
    file = path.join(directory, "logs", "camsnap.log");

    await initializeFileLogger(file, 1048576);
  });

  afterEach(async () => {

    shutdownFileLogger();

    await rm(directory, { force: true, recursive: true });
  });

  it("creates the log file and its directory", async () => {

    expect(await readFile(file, "utf-8")).toBe("");
  });

  it("appends entries in the format the log viewer reads back", async () => {

    writeLogEntry("info", "Camsnap is now listening on 0.0.0.0:5590.");
    writeLogEntry("warn", "Capture of frame 3 failed: quota exceeded.", "\x1b[33m");
    writeLogEntry("debug", "Read failed.", undefined, "session:read");

    await flushLogBuffer();

    const lines = (await readFile(file, "utf-8")).split("\n").filter((line) => line.length > 0);

    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}\.\d{3}\] Camsnap is now listening on 0\.0\.0\.0:5590\.$/);
    expect(lines[1]).toMatch(/\] \x1b\[33m\[WARN\] Capture of frame 3 failed: quota exceeded\.\x1b\[0m$/);
    expect(lines.map((line) => parseLogLine(line))).toEqual([
      { level: "info", message: "Camsnap is now listening on 0.0.0.0:5590.", timestamp: expect.any(String) },
      { level: "warn", message: "Capture of frame 3 failed: quota exceeded.", timestamp: expect.any(String) },
      { categoryTag: "session:read", level: "debug", message: "Read failed.", timestamp: expect.any(String) }
    ]);
  });

  it("routes HTTP request lines through the same file", async () => {

    createMorganStream().write("POST /api/capture from 127.0.0.1 responded 409 in 1.2 ms.\n");

    await flushLogBuffer();

    const [ line ] = (await readFile(file, "utf-8")).split("\n");

    expect(parseLogLine(line)).toMatchObject({ level: "info", message: "POST /api/capture from 127.0.0.1 responded 409 in 1.2 ms." });
  });

  it("writes what is still buffered on shutdown", async () => {

    writeLogEntry("info", "Shutting down.");
    shutdownFileLogger();

    expect(await readFile(file, "utf-8")).toMatch(/\] Shutting down\.\n$/);
  });
});
