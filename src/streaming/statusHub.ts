/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * statusHub.ts: Status and display sink for connection, frame and capture events.
 */
import type { Frame, Nullable, UploadResult } from "../types/index.js";
import { EventEmitter } from "node:events";

/*
 * STATUS TYPES
 *
 * ConnectionStatus describes the stream session as the user sees it. CaptureStatus describes the capture controller. Together with a summary of the most recent frame
 * they make up the snapshot a new subscriber receives before any live events.
 */

/**
 * Connection states. "retrying" and "lost" are separate states: the first is a recoverable condition with an attempt counter, the second is terminal.
 */
export type ConnectionState = "connected" | "connecting" | "failed" | "idle" | "lost" | "retrying" | "stopped";

/**
 * The session's connection status.
 */
export interface ConnectionStatus {

  // Current reconnect attempt, when retrying.
  attempt: Nullable<number>;

  // Reconnect budget, when retrying.
  maxAttempts: Nullable<number>;

  // Human-readable status line, e.g. "Connection lost, retrying (attempt 2 of 5)."
  message: string;
  state: ConnectionState;
  timestamp: string;
}

/**
 * Fields a status update supplies. The hub stamps the time.
 */
export type ConnectionStatusUpdate = Omit<ConnectionStatus, "attempt" | "maxAttempts" | "timestamp"> & Partial<Pick<ConnectionStatus, "attempt" | "maxAttempts">>;

/**
 * The capture controller's state and its last recorded result.
 */
export interface CaptureStatus {

  lastResult: Nullable<UploadResult>;
  state: "capturing" | "idle";
}

/**
 * Summary of a published frame, without its pixels.
 */
export interface FrameInfo {

  decodedAt: number;
  height: number;
  sequence: number;
  width: number;
}

/**
 * Initial snapshot sent when a subscriber connects.
 */
export interface StatusSnapshot {

  capture: CaptureStatus;
  connection: ConnectionStatus;
  frame: Nullable<FrameInfo>;
}

/**
 * Events delivered to subscribers.
 */
export type StatusEvent =
  { data: CaptureStatus; type: "capture" } |
  { data: ConnectionStatus; type: "status" } |
  { data: Frame; type: "frame" };

/*
 * STATUS HUB
 *
 * An EventEmitter that broadcasts session and capture updates to every subscriber: the SSE endpoint, the MJPEG preview, and anything else that wants to follow the
 * camera. The hub keeps the current state of each channel so that a client connecting mid-stream immediately sees where things stand. One hub is created per
 * running instance and handed to the components that publish into it.
 */
export class StatusHub {

  private capture: CaptureStatus = { lastResult: null, state: "idle" };
  private connection: ConnectionStatus = { attempt: null, maxAttempts: null, message: "Stream not started.", state: "idle", timestamp: new Date().toISOString() };
  private readonly emitter = new EventEmitter();
  private frame: Nullable<FrameInfo> = null;

  constructor() {

    // Raise the default listener limit to support many concurrent SSE and preview connections.
    this.emitter.setMaxListeners(100);
  }

  /**
   * Publishes a decoded frame. Frames are immutable once published, so subscribers receive the frame itself.
   * @param frame - The frame.
   */
  public emitFrame(frame: Frame): void {

    this.frame = { decodedAt: frame.decodedAt, height: frame.height, sequence: frame.sequence, width: frame.width };
    this.emitter.emit("frame", frame);
  }

  /**
   * Publishes a connection status change. Leaving the connected state also forgets the last frame summary, since that frame is no longer on display.
   * @param update - The new status.
   */
  public emitStatus(update: ConnectionStatusUpdate): void {

    this.connection = {

      attempt: update.attempt ?? null,
      maxAttempts: update.maxAttempts ?? null,
      message: update.message,
      state: update.state,
      timestamp: new Date().toISOString()
    };

    if(update.state !== "connected") {

      this.frame = null;
    }

    this.emitter.emit("status", this.connection);
  }

  /**
   * Publishes a capture state change.
   * @param status - The new capture status.
   */
  public emitCapture(status: CaptureStatus): void {

    this.capture = status;
    this.emitter.emit("capture", status);
  }

  /**
   * Returns the current state of every channel.
   * @returns The snapshot.
   */
  public getSnapshot(): StatusSnapshot {

    return { capture: this.capture, connection: this.connection, frame: this.frame };
  }

  /**
   * Subscribes a callback to every status event.
   * @param callback - Function to call when an event is emitted.
   * @returns A function to unsubscribe the callback.
   */
  public subscribe(callback: (event: StatusEvent) => void): () => void {

    const captureHandler = (data: CaptureStatus): void => callback({ data, type: "capture" });
    const frameHandler = (data: Frame): void => callback({ data, type: "frame" });
    const statusHandler = (data: ConnectionStatus): void => callback({ data, type: "status" });

    this.emitter.on("capture", captureHandler);
    this.emitter.on("frame", frameHandler);
    this.emitter.on("status", statusHandler);

    return (): void => {

      this.emitter.off("capture", captureHandler);
      this.emitter.off("frame", frameHandler);
      this.emitter.off("status", statusHandler);
    };
  }
}
