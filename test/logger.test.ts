/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.test.ts: Tests for log formatting and fan-out.
 */
import { LOG, initDebugFilter, runWithStreamContext, subscribeToLogs } from "../src/utils/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { LogEntry } from "../src/utils/index.js";

describe("LOG", () => {

  let entries: LogEntry[] = [];
  let unsubscribe: () => void = (): void => {};

  beforeEach(() => {

    entries = [];
    unsubscribe = subscribeToLogs((entry) => entries.push(entry));
  });

  afterEach(() => {

    unsubscribe();
    initDebugFilter("");
  });

  it("formats printf-style arguments", () => {

    LOG.warn("Ignoring %s: cannot parse %s as %s.", "TARGET_FPS", "\"x\"", "integer");

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: "warn", message: "Ignoring TARGET_FPS: cannot parse \"x\" as integer." });
    expect(entries[0].timestamp).toMatch(/^\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}\.\d{3}$/);
  });

  it("prefixes the session identifier inside a stream context", async () => {

    await runWithStreamContext({ streamId: "cam-1" }, async () => {

      LOG.info("Connected.");
    });

    LOG.info("Outside.");

    expect(entries.map((entry) => entry.message)).toEqual([ "[cam-1] Connected.", "Outside." ]);
  });

  it("drops debug messages of disabled categories", () => {

    LOG.debug("session:read", "Read failed.");

    initDebugFilter("session,-session:read");

    LOG.debug("session:read", "Read failed.");
    LOG.debug("session:reconnect", "Backing off %sms.", 1000);

    expect(entries).toEqual([ expect.objectContaining({ categoryTag: "session:reconnect", level: "debug", message: "Backing off 1000ms." }) ]);
  });
});
