/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * session.test.ts: Tests for the stream session decode loop and recovery.
 */
import { ConnectError, ReadStallError } from "../src/utils/index.js";
import { ScriptedFrameSource, TEST_SESSION_OPTIONS, makeFrame, recordStatuses } from "./helpers.js";
import { describe, expect, it, vi } from "vitest";
import type { SessionOptions } from "../src/streaming/session.js";
import { StatusHub } from "../src/streaming/statusHub.js";
import { StreamSession } from "../src/streaming/session.js";

const SOURCE = { quality: "low", url: "rtsp://cam.local/live/ch00_1" } as const;

function stall(): ReadStallError {

  return new ReadStallError("No frame received within 500ms.");
}

function createSession(script: ConstructorParameters<typeof ScriptedFrameSource>[0], options: Partial<SessionOptions> = {}, now?: () => number): {
  hub: StatusHub; session: StreamSession; sleeps: number[]; source: ScriptedFrameSource; statuses: string[]; } {

  const hub = new StatusHub();
  const source = new ScriptedFrameSource(script);
  const sleeps: number[] = [];
  const statuses = recordStatuses(hub);

  const session = new StreamSession(SOURCE, source, { ...TEST_SESSION_OPTIONS, ...options }, hub, {

    now,
    random: () => 0,
    sleep: async (ms: number): Promise<void> => {

      sleeps.push(ms);
    }
  });

  return { hub, session, sleeps, source, statuses };
}

describe("StreamSession", () => {

  it("resolves the quality variant into the effective URL", () => {

    const session = new StreamSession({ quality: "high", url: "rtsp://cam.local/live/ch00_1" }, new ScriptedFrameSource([]), TEST_SESSION_OPTIONS, new StatusHub());

    expect(session.url).toBe("rtsp://cam.local/live/ch00_0");
  });

  it("publishes connecting then connected on a successful open", async () => {

    const { session, source, statuses } = createSession([ [] ]);

    await session.open();

    expect(session.isActive).toBe(true);
    expect(session.isOpen).toBe(true);
    expect(source.opened).toEqual([ { options: { connectTimeout: 1000, targetFps: 20 }, url: "rtsp://cam.local/live/ch00_1" } ]);
    expect(statuses).toEqual([ "connecting: Connecting to rtsp://cam.local/live/ch00_1.", "connected: Connected, streaming." ]);
  });

  it("reports a failed open and never starts the loop", async () => {

    const { session, statuses } = createSession([ new ConnectError("Unable to open camera") ]);

    await expect(session.open()).rejects.toThrow(new ConnectError("Unable to open camera"));

    expect(session.isActive).toBe(false);
    expect(session.state).toBe("failed");
    expect(statuses.at(-1)).toBe("failed: Unable to open camera.");
    expect(await session.run()).toBe("stopped");
  });

  it("wraps unexpected open failures in ConnectError", async () => {

    const { session } = createSession([ new Error("socket hang up") ]);

    const error = await session.open().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectError);
    expect(error).toHaveProperty("message", "socket hang up");
  });

  it("keeps the latest frame and paces reads by the target frame rate", async () => {

    const { hub, session, sleeps } = createSession([ [ makeFrame(1), makeFrame(2) ] ]);

    await session.open();

    const run = session.run();

    await vi.waitFor(() => expect(session.framesDecoded).toBe(2));

    expect(session.latestFrame?.sequence).toBe(2);
    expect(hub.getSnapshot().frame).toEqual({ decodedAt: 1700000000002, height: 2, sequence: 2, width: 2 });
    expect(sleeps).toEqual([ 50, 50 ]);

    session.close();

    expect(await run).toBe("stopped");
  });

  it("tolerates read failures below the threshold", async () => {

    const { session, source, statuses } = createSession([ [ makeFrame(1), stall(), stall() ] ]);

    await session.open();

    const run = session.run();

    await vi.waitFor(() => expect(session.consecutiveFailures).toBe(2));

    expect(session.state).toBe("connected");
    expect(session.latestFrame?.sequence).toBe(1);
    expect(source.opened).toHaveLength(1);
    expect(statuses).toEqual([ "connecting: Connecting to rtsp://cam.local/live/ch00_1.", "connected: Connected, streaming." ]);

    session.close();

    expect(await run).toBe("stopped");
  });

  it("resets the failure count after a successful read", async () => {

    const { session } = createSession([ [ makeFrame(1), stall(), stall(), makeFrame(2) ] ]);

    await session.open();

    const run = session.run();

    await vi.waitFor(() => expect(session.latestFrame?.sequence).toBe(2));

    expect(session.consecutiveFailures).toBe(0);

    session.close();

    await run;
  });

  it("ends the session as lost at the threshold under the stop policy", async () => {

    const { session, source, statuses } = createSession([ [ makeFrame(1), stall(), stall(), stall() ] ], { failurePolicy: "stop" });

    await session.open();

    expect(await session.run()).toBe("lost");

    expect(session.isActive).toBe(false);
    expect(session.latestFrame).toBeNull();
    expect(source.handles[0].closed).toBe(true);
    expect(source.opened).toHaveLength(1);
    expect(statuses.at(-1)).toBe("lost: Connection lost after 3 failed reads.");
  });

  it("reconnects at the threshold and resumes streaming", async () => {

    const { session, source, sleeps, statuses } = createSession([ [ makeFrame(1), stall(), stall(), stall() ], [ makeFrame(7) ] ]);

    await session.open();

    const run = session.run();

    await vi.waitFor(() => expect(session.latestFrame?.sequence).toBe(7));

    expect(source.handles[0].closed).toBe(true);
    expect(session.reconnectAttempts).toBe(1);
    expect(session.consecutiveFailures).toBe(0);
    expect(sleeps).toEqual([ 50, 100, 50 ]);
    expect(statuses).toEqual([
      "connecting: Connecting to rtsp://cam.local/live/ch00_1.",
      "connected: Connected, streaming.",
      "retrying: Connection lost, retrying (attempt 1 of 3).",
      "connected: Reconnected, streaming."
    ]);

    session.close();

    expect(await run).toBe("stopped");
    expect(statuses.at(-1)).toBe("stopped: Stream stopped.");
  });

  it("gives up once the reconnect budget is spent", async () => {

    const refused = new ConnectError("Connection refused");
    const { hub, session, source, sleeps } = createSession([ [ stall(), stall(), stall() ], refused, refused, refused ]);

    await session.open();

    expect(await session.run()).toBe("lost");

    expect(source.opened).toHaveLength(4);
    expect(sleeps).toEqual([ 100, 200, 400 ]);
    expect(session.reconnectAttempts).toBe(3);
    expect(hub.getSnapshot().connection).toMatchObject({ attempt: null, maxAttempts: null, message: "Connection lost, gave up after 3 reconnect attempts.",
      state: "lost" });
  });

  it("publishes the attempt number while retrying", async () => {

    const { hub, session, source } = createSession([ [ stall(), stall(), stall() ], [] ]);
    const retrying: (number | null)[] = [];

    hub.subscribe((event) => {

      if((event.type === "status") && (event.data.state === "retrying")) {

        retrying.push(event.data.attempt, event.data.maxAttempts);
      }
    });

    await session.open();

    const run = session.run();

    await vi.waitFor(() => {

      expect(source.opened).toHaveLength(2);
      expect(session.state).toBe("connected");
    });

    expect(retrying).toEqual([ 1, 3 ]);

    session.close();

    await run;
  });

  it("resets the reconnect attempts after sustained streaming", async () => {

    let calls = 0;
    const now = (): number => (calls++) * 30000;
    const { session } = createSession([ [ stall(), stall(), stall() ], [ makeFrame(1), makeFrame(2), makeFrame(3) ] ], {}, now);

    await session.open();

    const run = session.run();

    await vi.waitFor(() => expect(session.framesDecoded).toBe(3));

    expect(session.reconnectAttempts).toBe(0);

    session.close();

    await run;
  });

  it("keeps the reconnect attempts until streaming has been sustained", async () => {

    let calls = 0;
    const now = (): number => (calls++) * 30000;
    const { session } = createSession([ [ stall(), stall(), stall() ], [ makeFrame(1), makeFrame(2) ] ], {}, now);

    await session.open();

    const run = session.run();

    await vi.waitFor(() => expect(session.framesDecoded).toBe(2));

    expect(session.reconnectAttempts).toBe(1);

    session.close();

    await run;
  });

  it("honors a stop requested during the reconnect backoff", async () => {

    const hub = new StatusHub();
    const source = new ScriptedFrameSource([ [ stall(), stall(), stall() ], [] ]);
    const session: StreamSession = new StreamSession(SOURCE, source, TEST_SESSION_OPTIONS, hub, {

      random: () => 0,
      sleep: async (): Promise<void> => {

        session.stop();
      }
    });

    await session.open();

    expect(await session.run()).toBe("stopped");
    expect(source.opened).toHaveLength(1);
    expect(hub.getSnapshot().connection.state).toBe("stopped");
  });

  it("stops promptly when closed during a pending read", async () => {

    const { session, source } = createSession([ [] ]);

    await session.open();

    const run = session.run();

    session.close();

    expect(await run).toBe("stopped");
    expect(source.handles[0].closed).toBe(true);
    expect(session.isOpen).toBe(false);
  });

  it("releases the handle when a frame listener throws", async () => {

    const { hub, session, source, statuses } = createSession([ [ makeFrame(1) ] ]);

    hub.subscribe((event) => {

      if(event.type === "frame") {

        throw new Error("listener failed");
      }
    });

    await session.open();

    expect(await session.run()).toBe("lost");

    expect(session.isActive).toBe(false);
    expect(session.latestFrame).toBeNull();
    expect(source.handles[0].closed).toBe(true);
    expect(statuses.at(-1)).toBe("lost: Stream loop failed: listener failed.");
  });

  it("returns independent frame snapshots", async () => {

    const { session } = createSession([ [ makeFrame(5) ] ]);

    await session.open();

    const run = session.run();

    await vi.waitFor(() => expect(session.framesDecoded).toBe(1));

    const snapshot = session.snapshotFrame();

    expect(snapshot?.data).toEqual(session.latestFrame?.data);
    expect(snapshot?.data).not.toBe(session.latestFrame?.data);

    session.close();

    await run;
  });
});
