/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * frameSource.ts: Pull-based frame source contract.
 */
import type { Frame } from "../types/index.js";

/* The stream session treats the camera as an opaque pull-based source: open a URL, read frames one at a time, close. The production implementation drives FFmpeg
 * (ffmpegSource.ts); tests script their own.
 */

/**
 * Options for opening a source.
 */
export interface OpenOptions {

  // Time in milliseconds allowed for the connection to produce its first frame.
  connectTimeout: number;

  // Frame rate the source should deliver.
  targetFps: number;
}

/**
 * An open connection to a video source. A handle retains at most one undelivered frame: when the decoder outruns the reader, older frames are dropped so that a
 * read never returns a stale picture.
 */
export interface FrameHandle {

  /**
   * Releases the connection. Idempotent. Pending reads fail with ReadStallError.
   */
  close(): void;

  /**
   * Returns the next decoded frame.
   * @param timeoutMs - Maximum time to wait for a frame.
   * @throws ReadStallError when no frame arrives in time or the connection has ended.
   */
  read(timeoutMs: number): Promise<Frame>;
}

/**
 * Opens handles to video sources.
 */
export interface FrameSource {

  /**
   * Opens a connection.
   * @param url - The effective source URL.
   * @param options - Open options.
   * @throws ConnectError when the connection cannot be established.
   */
  open(url: string, options: OpenOptions): Promise<FrameHandle>;
}

/**
 * Creates an independent copy of a frame. The copy shares no memory with the original, so the original may be replaced or released while the copy is encoded.
 * @param frame - The frame to copy.
 * @returns A frame with its own pixel buffer.
 */
export function cloneFrame(frame: Frame): Frame {

  return { ...frame, data: Buffer.from(frame.data) };
}
