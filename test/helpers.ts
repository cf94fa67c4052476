/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * helpers.ts: In-process stand-ins for the camera and the upload target.
 */
import type { Frame, Nullable } from "../src/types/index.js";
import type { FrameHandle, FrameSource, OpenOptions } from "../src/streaming/frameSource.js";
import type { ImageUploader, UploadRequest } from "../src/upload/index.js";
import { ConnectError, ReadStallError } from "../src/utils/index.js";
import type { SessionOptions } from "../src/streaming/session.js";
import type { StatusHub } from "../src/streaming/statusHub.js";

/**
 * Builds a solid-color RGB frame.
 * @param sequence - Frame sequence number.
 * @param width - Width in pixels.
 * @param height - Height in pixels.
 * @param fill - Byte value for every channel of every pixel.
 * @returns The frame.
 */
export function makeFrame(sequence: number, width = 2, height = 2, fill = sequence): Frame {

  return { channels: 3, data: Buffer.alloc(width * height * 3, fill), decodedAt: 1700000000000 + sequence, height, sequence, width };
}

// A read either yields a frame or fails.
export type ReadStep = Error | Frame;

/**
 * A handle that plays back a fixed list of read outcomes. Once the list is used up, reads wait until the handle is closed.
 */
export class ScriptedHandle implements FrameHandle {

  public closed = false;

  private waiting: Nullable<(error: Error) => void> = null;

  constructor(private readonly steps: ReadStep[]) {}

  public async read(): Promise<Frame> {

    if(this.closed) {

      throw new ReadStallError("Handle closed.");
    }

    const step = this.steps.shift();

    if(step === undefined) {

      return new Promise<Frame>((_resolve, reject) => {

        this.waiting = reject;
      });
    }

    if(step instanceof Error) {

      throw step;
    }

    return step;
  }

  public close(): void {

    this.closed = true;
    this.waiting?.(new ReadStallError("Handle closed."));
    this.waiting = null;
  }
}

/**
 * A frame source whose successive opens follow a script: an Error fails the open, a list of steps opens a handle that plays them back.
 */
export class ScriptedFrameSource implements FrameSource {

  public readonly handles: ScriptedHandle[] = [];
  public readonly opened: { options: OpenOptions; url: string }[] = [];

  constructor(private readonly script: (Error | ReadStep[])[]) {}

  public async open(url: string, options: OpenOptions): Promise<FrameHandle> {

    this.opened.push({ options, url });

    const next = this.script.shift();

    if(next === undefined) {

      throw new ConnectError("No scripted connection left");
    }

    if(next instanceof Error) {

      throw next;
    }

    const handle = new ScriptedHandle(next);

    this.handles.push(handle);

    return handle;
  }
}

/**
 * An uploader that records every request and answers through a callback.
 */
export class RecordingUploader implements ImageUploader {

  public readonly name = "recording";
  public readonly requests: UploadRequest[] = [];

  constructor(private readonly respond: (request: UploadRequest) => Promise<string>) {}

  public async upload(request: UploadRequest): Promise<string> {

    this.requests.push(request);

    return this.respond(request);
  }
}

/**
 * Records every connection status published by a hub as "state: message".
 * @param hub - The hub to follow.
 * @returns The list, filled in as statuses arrive.
 */
export function recordStatuses(hub: StatusHub): string[] {

  const statuses: string[] = [];

  hub.subscribe((event) => {

    if(event.type === "status") {

      statuses.push([ event.data.state, ": ", event.data.message ].join(""));
    }
  });

  return statuses;
}

/**
 * Session options with short, round numbers.
 */
export const TEST_SESSION_OPTIONS: SessionOptions = {

  backoffJitter: 0,
  connectTimeout: 1000,
  failurePolicy: "reconnect",
  maxBackoffDelay: 1000,
  maxReadFailures: 3,
  maxReconnectAttempts: 3,
  readTimeout: 500,
  reconnectDelay: 100,
  sustainedStreamingRequired: 60000,
  targetFps: 20
};

/**
 * Builds a binary PPM image.
 * @param width - Width in pixels.
 * @param height - Height in pixels.
 * @param pixels - Exactly width * height * 3 bytes of RGB data.
 * @returns The encoded image.
 */
export function makePpm(width: number, height: number, pixels: Buffer): Buffer {

  return Buffer.concat([ Buffer.from([ "P6\n", String(width), " ", String(height), "\n255\n" ].join(""), "latin1"), pixels ]);
}
