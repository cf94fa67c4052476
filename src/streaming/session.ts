/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * session.ts: Stream session with stall detection and reconnection.
 */
import { ConnectError, LOG, delay, formatDuration, formatError, getBackoffDelay, redactUrl } from "../utils/index.js";
import type { ConnectionState, ConnectionStatusUpdate, StatusHub } from "./statusHub.js";
import type { FailurePolicy, Frame, Nullable } from "../types/index.js";
import type { FrameHandle, FrameSource } from "./frameSource.js";
import { cloneFrame } from "./frameSource.js";
import type { StreamSource } from "./source.js";
import { resolveStreamUrl } from "./source.js";

/*
 * STREAM SESSION
 *
 * A session owns one connection to the camera and runs the decode loop that keeps latestFrame current. The loop is driven entirely by read outcomes:
 *
 * 1. A successful read resets the consecutive failure count, replaces latestFrame and publishes the frame, then sleeps for the pacing interval.
 *
 * 2. A failed read (timeout, decoder exit, malformed data) increments the count. Below maxReadFailures nothing else happens and the loop reads again.
 *
 * 3. At maxReadFailures the failure policy decides. "stop" ends the session with status "lost". "reconnect" drops the handle, clears latestFrame, backs off and
 *    opens a new handle from scratch. Each reopen, successful or not, consumes one attempt from maxReconnectAttempts; once they are used up the session ends with
 *    status "lost" and a message saying it gave up.
 *
 * 4. After sustainedStreamingRequired of uninterrupted frames the attempt counter resets, so a camera that drops out once a day is not eventually abandoned.
 *
 * Stopping is cooperative. stop() sets a flag that the loop checks at the top of every iteration, after a failed read and after the reconnect backoff, so the
 * worst-case latency is one read timeout. close() additionally releases the handle, which fails a pending read immediately.
 *
 * The session never throws from run(). Opening is different: a session whose first open fails was never started, so open() throws ConnectError and the caller
 * decides what to do with it.
 */

/**
 * Timing and policy options for a session.
 */
export interface SessionOptions {

  backoffJitter: number;
  connectTimeout: number;
  failurePolicy: FailurePolicy;
  maxBackoffDelay: number;
  maxReadFailures: number;
  maxReconnectAttempts: number;
  readTimeout: number;
  reconnectDelay: number;
  sustainedStreamingRequired: number;
  targetFps: number;
}

/**
 * Replaceable time and randomness sources.
 */
export interface SessionClock {

  now?: () => number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * How a run ended. "stopped" follows a stop request; "lost" means the connection failed and the policy gave up on it.
 */
export type RunOutcome = "lost" | "stopped";

type ReconnectOutcome = "exhausted" | "reconnected" | "stopped";

/**
 * One connection to a video source and its decode loop.
 */
export class StreamSession {

  /**
   * Effective URL after applying the quality variant.
   */
  public readonly url: string;

  private active = false;
  private attempts = 0;
  private currentState: ConnectionState = "idle";
  private decoded = 0;
  private failures = 0;
  private frame: Nullable<Frame> = null;
  private handle: Nullable<FrameHandle> = null;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private stopRequested = false;
  private streamingSince: Nullable<number> = null;

  /**
   * @param source - The camera endpoint. Fixed for the lifetime of the session.
   * @param frameSource - Opens connections to the endpoint.
   * @param options - Timing and policy options.
   * @param hub - Receives frames and status changes.
   * @param clock - Time and randomness sources, replaceable for tests.
   */
  constructor(public readonly source: StreamSource, private readonly frameSource: FrameSource, private readonly options: SessionOptions,
    private readonly hub: StatusHub, clock: SessionClock = {}) {

    this.url = resolveStreamUrl(source.url, source.quality);
    this.now = clock.now ?? Date.now;
    this.random = clock.random ?? Math.random;
    this.sleep = clock.sleep ?? delay;
  }

  /**
   * Whether the session currently holds an open handle.
   */
  public get isOpen(): boolean {

    return this.handle !== null;
  }

  /**
   * Whether the session has been opened and has not yet ended. A session that is reconnecting is still active.
   */
  public get isActive(): boolean {

    return this.active;
  }

  public get consecutiveFailures(): number {

    return this.failures;
  }

  public get reconnectAttempts(): number {

    return this.attempts;
  }

  /**
   * Total frames delivered by the loop over the lifetime of the session.
   */
  public get framesDecoded(): number {

    return this.decoded;
  }

  /**
   * The most recently decoded frame, or null before the first successful read and after the handle has been dropped. The frame is replaced as a whole on every
   * successful read and is never modified; callers that keep it across an await should use snapshotFrame() instead.
   */
  public get latestFrame(): Nullable<Frame> {

    return this.frame;
  }

  public get state(): ConnectionState {

    return this.currentState;
  }

  /**
   * Takes an independent copy of the latest frame.
   * @returns A copy of the latest frame, or null if there is none.
   */
  public snapshotFrame(): Nullable<Frame> {

    return this.frame ? cloneFrame(this.frame) : null;
  }

  /**
   * Opens the connection. On success the session is active and run() may be called.
   * @throws ConnectError when the source cannot be opened. The session remains inactive and status "failed" is published.
   */
  public async open(): Promise<void> {

    if(this.handle) {

      return;
    }

    this.stopRequested = false;
    this.setState({ message: [ "Connecting to ", redactUrl(this.url), "." ].join(""), state: "connecting" });

    try {

      this.handle = await this.openHandle();
    } catch(error) {

      const connectError = (error instanceof ConnectError) ? error : new ConnectError(formatError(error), error);

      LOG.error("Unable to start the stream: %s.", formatError(connectError));
      this.setState({ message: formatError(connectError) + ".", state: "failed" });

      throw connectError;
    }

    this.active = true;
    this.attempts = 0;
    this.failures = 0;

    LOG.info("Connected to %s.", redactUrl(this.url));
    this.setState({ message: "Connected, streaming.", state: "connected" });
  }

  /**
   * Runs the decode loop until a stop request or until the failure policy gives up. Never throws.
   * @returns How the loop ended.
   */
  public async run(): Promise<RunOutcome> {

    if(!this.active) {

      return "stopped";
    }

    try {

      return await this.decode();
    } catch(error) {

      // Reached only when a status or frame listener throws. The handle is released either way.
      return this.finish("lost", [ "Stream loop failed: ", formatError(error), "." ].join(""));
    }
  }

  /**
   * The decode loop proper.
   * @returns How the loop ended.
   */
  private async decode(): Promise<RunOutcome> {

    const pacing = Math.round(1000 / this.options.targetFps);

    for(;;) {

      if(this.stopRequested || !this.handle) {

        return this.finish("stopped");
      }

      let frame: Frame;

      try {

        frame = await this.handle.read(this.options.readTimeout);
      } catch(error) {

        if(this.stopRequested) {

          return this.finish("stopped");
        }

        this.failures++;
        this.streamingSince = null;

        LOG.debug("session:read", "Read failed (%s of %s): %s.", this.failures, this.options.maxReadFailures, formatError(error));

        if(this.failures < this.options.maxReadFailures) {

          continue;
        }

        if(this.options.failurePolicy === "stop") {

          return this.finish("lost", [ "Connection lost after ", String(this.failures), " failed reads." ].join(""));
        }

        const outcome = await this.reconnect();

        if(outcome === "stopped") {

          return this.finish("stopped");
        }

        if(outcome === "exhausted") {

          return this.finish("lost", [ "Connection lost, gave up after ", String(this.options.maxReconnectAttempts), " reconnect attempts." ].join(""));
        }

        continue;
      }

      this.accept(frame);

      await this.sleep(pacing);
    }
  }

  /**
   * Requests the loop to stop. Takes effect at the loop's next checkpoint.
   */
  public stop(): void {

    this.stopRequested = true;
  }

  /**
   * Stops the loop and releases the connection. Idempotent.
   */
  public close(): void {

    this.stopRequested = true;
    this.active = false;
    this.dropHandle();
  }

  /**
   * Records a successfully read frame.
   * @param frame - The frame.
   */
  private accept(frame: Frame): void {

    const now = this.now();

    this.failures = 0;
    this.frame = frame;
    this.decoded++;
    this.hub.emitFrame(frame);

    if(this.streamingSince === null) {

      this.streamingSince = now;

      return;
    }

    if((this.attempts > 0) && ((now - this.streamingSince) >= this.options.sustainedStreamingRequired)) {

      LOG.debug("session:reconnect", "Streaming sustained for %s, resetting %s reconnect attempts.", formatDuration(now - this.streamingSince), this.attempts);

      this.attempts = 0;
    }
  }

  /**
   * Replaces the handle with a fresh one, backing off before each attempt.
   * @returns Whether a new handle was opened, the budget ran out, or a stop was requested meanwhile.
   */
  private async reconnect(): Promise<ReconnectOutcome> {

    this.dropHandle();

    while(this.attempts < this.options.maxReconnectAttempts) {

      this.attempts++;

      const backoff = getBackoffDelay(this.attempts,
        { baseDelay: this.options.reconnectDelay, jitter: this.options.backoffJitter, maxDelay: this.options.maxBackoffDelay }, this.random);

      LOG.warn("Connection lost, reconnecting in %sms (attempt %s of %s).", backoff, this.attempts, this.options.maxReconnectAttempts);

      this.setState({

        attempt: this.attempts,
        maxAttempts: this.options.maxReconnectAttempts,
        message: [ "Connection lost, retrying (attempt ", String(this.attempts), " of ", String(this.options.maxReconnectAttempts), ")." ].join(""),
        state: "retrying"
      });

      // eslint-disable-next-line no-await-in-loop
      await this.sleep(backoff);

      if(this.stopRequested) {

        return "stopped";
      }

      try {

        // eslint-disable-next-line no-await-in-loop
        this.handle = await this.openHandle();
      } catch(error) {

        LOG.debug("session:reconnect", "Reconnect attempt %s failed: %s.", this.attempts, formatError(error));

        continue;
      }

      // A stop that arrived while the open was in flight still wins.
      if(this.stopRequested) {

        return "stopped";
      }

      this.failures = 0;

      LOG.info("Reconnected to %s after %s attempt(s).", redactUrl(this.url), this.attempts);
      this.setState({ message: "Reconnected, streaming.", state: "connected" });

      return "reconnected";
    }

    return "exhausted";
  }

  /**
   * Ends the session and publishes the final state.
   * @param outcome - How the loop ended.
   * @param reason - Status message for a lost connection.
   * @returns The outcome.
   */
  private finish(outcome: RunOutcome, reason = "Connection lost."): RunOutcome {

    this.close();

    if(outcome === "stopped") {

      LOG.info("Stream stopped after %s frames.", this.decoded);
      this.setState({ message: "Stream stopped.", state: "stopped" });
    } else {

      LOG.error("%s", reason);
      this.setState({ message: reason, state: "lost" });
    }

    return outcome;
  }

  /**
   * Opens a new handle with the configured connect options.
   * @returns The handle.
   */
  private async openHandle(): Promise<FrameHandle> {

    return this.frameSource.open(this.url, { connectTimeout: this.options.connectTimeout, targetFps: this.options.targetFps });
  }

  /**
   * Closes the current handle, if any, and forgets the frame it produced.
   */
  private dropHandle(): void {

    this.handle?.close();
    this.handle = null;
    this.frame = null;
    this.streamingSince = null;
  }

  /**
   * Records and publishes a state change.
   * @param update - The new status.
   */
  private setState(update: ConnectionStatusUpdate): void {

    this.currentState = update.state;
    this.hub.emitStatus(update);
  }
}
