/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * manager.ts: Ownership of the live stream session.
 */
import type { Config, Nullable, QualityVariant } from "../types/index.js";
import { ConnectError, LOG, formatError, redactUrl, runWithStreamContext } from "../utils/index.js";
import type { SessionClock, SessionOptions } from "./session.js";
import type { FrameSource } from "./frameSource.js";
import type { StatusHub } from "./statusHub.js";
import { StreamSession } from "./session.js";
import type { StreamSource } from "./source.js";

/*
 * STREAM MANAGER
 *
 * A running instance has at most one live session. The manager owns it: start() opens a session and launches its decode loop as a background task, stop() ends it,
 * and starting with a different source closes the current session before opening the new one. Start and stop requests are serialized, so two overlapping requests
 * cannot leave an orphaned session behind. Everything else (the capture controller, the HTTP routes) reaches the session through getSession().
 */

/**
 * Per-request overrides of the configured source.
 */
export interface StartOptions {

  quality?: QualityVariant;
  url?: string;
}

/**
 * Derives session options from the configuration.
 * @param config - The configuration.
 * @returns The session options.
 */
export function getSessionOptions(config: Config): SessionOptions {

  return {

    backoffJitter: config.recovery.backoffJitter,
    connectTimeout: config.streaming.connectTimeout,
    failurePolicy: config.recovery.failurePolicy,
    maxBackoffDelay: config.recovery.maxBackoffDelay,
    maxReadFailures: config.recovery.maxReadFailures,
    maxReconnectAttempts: config.recovery.maxReconnectAttempts,
    readTimeout: config.streaming.readTimeout,
    reconnectDelay: config.recovery.reconnectDelay,
    sustainedStreamingRequired: config.recovery.sustainedStreamingRequired,
    targetFps: config.streaming.targetFps
  };
}

export class StreamManager {

  private loop: Nullable<Promise<void>> = null;
  private queue: Promise<void> = Promise.resolve();
  private session: Nullable<StreamSession> = null;
  private sessionCount = 0;

  constructor(private readonly config: Config, private readonly frameSource: FrameSource, private readonly hub: StatusHub, private readonly clock: SessionClock = {}) {}

  /**
   * The current session, if any. A session whose connection was lost remains current, inactive, until the next start or stop.
   * @returns The session, or null.
   */
  public getSession(): Nullable<StreamSession> {

    return this.session;
  }

  /**
   * Opens a session and starts its decode loop. When a session with the same source is already active it is returned unchanged; any other current session is
   * closed first.
   * @param options - Source overrides.
   * @returns The active session.
   * @throws ConnectError when no URL is configured or the source cannot be opened.
   */
  public async start(options: StartOptions = {}): Promise<StreamSession> {

    return this.serialize(async () => {

      const source: StreamSource = { quality: options.quality ?? this.config.camera.quality, url: options.url ?? this.config.camera.url };

      if(!source.url) {

        throw new ConnectError("No stream URL configured");
      }

      if(this.session?.isActive && (this.session.source.url === source.url) && (this.session.source.quality === source.quality)) {

        return this.session;
      }

      await this.stopSession();

      const session = new StreamSession(source, this.frameSource, getSessionOptions(this.config), this.hub, this.clock);
      const context = { streamId: "cam-" + String(++this.sessionCount), url: redactUrl(session.url) };

      await runWithStreamContext(context, async () => session.open());

      this.session = session;
      this.loop = runWithStreamContext(context, async () => {

        const outcome = await session.run();

        LOG.debug("session", "Decode loop ended: %s.", outcome);
      }).catch((error: unknown) => {

        LOG.error("Decode loop failed: %s.", formatError(error));
      });

      return session;
    });
  }

  /**
   * Stops the current session and waits for its loop to finish.
   */
  public async stop(): Promise<void> {

    return this.serialize(async () => this.stopSession());
  }

  /**
   * Closes the current session, if any, and waits for its loop.
   */
  private async stopSession(): Promise<void> {

    const session = this.session;
    const loop = this.loop;

    this.session = null;
    this.loop = null;

    if(!session) {

      return;
    }

    session.close();

    await loop;
  }

  /**
   * Runs a task after every previously queued task has settled.
   * @param task - The task.
   * @returns The task's result.
   */
  private async serialize<T>(task: () => Promise<T>): Promise<T> {

    const result = this.queue.then(task);

    this.queue = result.then(() => undefined, () => undefined);

    return result;
  }
}
