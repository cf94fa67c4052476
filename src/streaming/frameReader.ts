/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * frameReader.ts: Depth-1 frame buffer over a PPM byte stream.
 */
import type { Frame, Nullable } from "../types/index.js";
import { ReadStallError, formatError } from "../utils/index.js";
import type { FrameHandle } from "./frameSource.js";
import { PpmParser } from "./ppm.js";
import type { Readable } from "node:stream";

/*
 * FRAME READER
 *
 * The decoder pushes frames at its own pace; the session pulls them at its own pace. Between the two sits a single slot. A new frame always overwrites the slot, so
 * a slow reader skips frames instead of falling behind, and a read returns either the slot's content or the next frame to arrive. When the byte stream ends or
 * turns out not to be PPM, the reader is finished: the current and every later read fails.
 */

interface Waiter {

  reject: (error: Error) => void;
  resolve: (frame: Frame) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * A FrameHandle reading PPM images from a stream.
 */
export class FrameReader implements FrameHandle {

  private closed = false;
  private endReason: Nullable<string> = null;
  private readonly parser = new PpmParser();
  private pending: Nullable<Frame> = null;
  private sequence = 0;
  private readonly waiters = new Set<Waiter>();

  /**
   * @param input - Stream of concatenated PPM images.
   * @param release - Called once on close() to release whatever produces the stream.
   */
  constructor(private readonly input: Readable, private readonly release: () => void = (): void => {}) {

    input.on("data", this.onData);
    input.once("end", () => this.finish("Stream ended."));
    input.once("error", (error: Error) => this.finish([ "Stream error: ", formatError(error), "." ].join("")));
  }

  /**
   * Number of frames decoded so far, including frames dropped because the slot was overwritten.
   */
  public get framesDecoded(): number {

    return this.sequence;
  }

  /**
   * Marks the reader finished because its producer failed. Pending and future reads reject with the given reason.
   * @param reason - Human-readable reason.
   */
  public fail(reason: string): void {

    this.finish(reason);
  }

  public async read(timeoutMs: number): Promise<Frame> {

    if(this.pending) {

      const frame = this.pending;

      this.pending = null;

      return frame;
    }

    if(this.endReason) {

      throw new ReadStallError(this.endReason);
    }

    return new Promise<Frame>((resolve, reject) => {

      const waiter: Waiter = {

        reject,
        resolve,
        timer: setTimeout(() => {

          this.waiters.delete(waiter);
          reject(new ReadStallError([ "No frame received within ", String(timeoutMs), "ms." ].join("")));
        }, timeoutMs)
      };

      this.waiters.add(waiter);
    });
  }

  public close(): void {

    if(this.closed) {

      return;
    }

    this.closed = true;
    this.input.off("data", this.onData);
    this.finish("Handle closed.");
    this.pending = null;
    this.release();
  }

  /**
   * Parses incoming bytes and publishes completed frames.
   * @param chunk - The next piece of the byte stream.
   */
  private readonly onData = (chunk: Buffer): void => {

    let images;

    try {

      images = this.parser.push(chunk);
    } catch(error) {

      this.input.off("data", this.onData);
      this.finish(formatError(error) + ".");

      return;
    }

    for(const image of images) {

      this.sequence++;
      this.publish({ channels: 3, data: image.data, decodedAt: Date.now(), height: image.height, sequence: this.sequence, width: image.width });
    }
  };

  /**
   * Hands a frame to a waiting reader, or stores it in the slot, replacing whatever was there.
   * @param frame - The decoded frame.
   */
  private publish(frame: Frame): void {

    const waiter = this.waiters.values().next().value;

    if(waiter) {

      clearTimeout(waiter.timer);
      this.waiters.delete(waiter);
      waiter.resolve(frame);

      return;
    }

    this.pending = frame;
  }

  /**
   * Ends the reader. The first reason wins.
   * @param reason - Human-readable reason.
   */
  private finish(reason: string): void {

    if(this.endReason) {

      return;
    }

    this.endReason = reason;
    this.parser.reset();

    for(const waiter of this.waiters) {

      clearTimeout(waiter.timer);
      waiter.reject(new ReadStallError(reason));
    }

    this.waiters.clear();
  }
}
