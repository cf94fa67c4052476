/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * controller.ts: On-demand capture of the latest frame and upload of the result.
 */
import type { Frame, Nullable, UploadResult } from "../types/index.js";
import { JPEG_CONTENT_TYPE, encodeJpeg } from "./encoder.js";
import { LOG, formatError, withTimeout } from "../utils/index.js";
import type { CaptureStatus } from "../streaming/statusHub.js";
import { CaptureIdGenerator } from "./identifier.js";
import type { ImageUploader } from "../upload/index.js";
import type { StatusHub } from "../streaming/statusHub.js";

/*
 * CAPTURE
 *
 * A capture request is only honored while a session is active and has produced a frame. The frame is copied synchronously, before the first await, so the copy is
 * exactly the frame that was current when the request arrived and later decodes cannot touch it. The copy is then encoded to JPEG, given an identifier and handed
 * to the uploader. Encoding and uploading failures become a failure result rather than an exception: a failed capture never disturbs the session.
 *
 * At most one capture runs at a time. A request that arrives while one is in flight is turned away with "busy", and neither "busy" nor "nothing" touches the last
 * recorded result. An upload that exceeds its timeout is aborted, and the capture counts as in flight until the uploader has let go of it.
 */

/**
 * What the controller needs from a stream session.
 */
export interface FrameSurface {

  readonly isActive: boolean;

  /**
   * Returns an independent copy of the latest frame, or null if none has been decoded.
   */
  snapshotFrame(): Nullable<Frame>;
}

/**
 * Result of a capture request.
 */
export type CaptureOutcome = { kind: "busy" } | { kind: "completed"; result: UploadResult } | { kind: "nothing" };

/**
 * Capture settings.
 */
export interface CaptureOptions {

  folder: string;
  idPrefix: string;
  jpegQuality: number;
  uploadTimeout: number;
}

export class CaptureController {

  private inFlight = false;
  private lastResult: Nullable<UploadResult> = null;

  /**
   * @param getSurface - Returns the current session, or null when there is none.
   * @param uploader - Stores encoded captures.
   * @param options - Capture settings.
   * @param hub - Receives capture state changes.
   * @param ids - Issues capture identifiers.
   */
  constructor(private readonly getSurface: () => Nullable<FrameSurface>, private readonly uploader: ImageUploader, private readonly options: CaptureOptions,
    private readonly hub: StatusHub, private readonly ids: CaptureIdGenerator = new CaptureIdGenerator(options.idPrefix)) {}

  /**
   * Whether a capture is in flight.
   */
  public get isBusy(): boolean {

    return this.inFlight;
  }

  /**
   * The most recently recorded result, or null before the first completed capture.
   */
  public get result(): Nullable<UploadResult> {

    return this.lastResult;
  }

  public getStatus(): CaptureStatus {

    return { lastResult: this.lastResult, state: this.inFlight ? "capturing" : "idle" };
  }

  /**
   * Captures the latest frame and uploads it. Capture failures become results; only an error thrown by a status listener propagates.
   * @returns "nothing" when there is no active session or no frame yet, "busy" when a capture is already in flight, otherwise the recorded result.
   */
  public async requestCapture(): Promise<CaptureOutcome> {

    if(this.inFlight) {

      LOG.debug("capture", "Capture requested while another is in flight.");

      return { kind: "busy" };
    }

    const surface = this.getSurface();
    const frame = surface?.isActive ? surface.snapshotFrame() : null;

    if(!frame) {

      LOG.debug("capture", "Capture requested with no frame available.");

      return { kind: "nothing" };
    }

    this.inFlight = true;

    let result: UploadResult;

    try {

      this.hub.emitCapture(this.getStatus());
      result = await this.service(frame);
      this.lastResult = result;
    } finally {

      this.inFlight = false;
    }

    this.hub.emitCapture(this.getStatus());

    return { kind: "completed", result };
  }

  /**
   * Encodes and uploads a frame copy.
   * @param frame - The copy to store.
   * @returns The result to record.
   */
  private async service(frame: Frame): Promise<UploadResult> {

    let id: Nullable<string> = null;

    try {

      const bytes = await encodeJpeg(frame, this.options.jpegQuality);

      id = this.ids.next();

      const url = await this.upload(bytes, id);

      LOG.info("Captured frame %s as %s: %s.", frame.sequence, id, url);

      return { id, ok: true, timestamp: new Date().toISOString(), url };
    } catch(error) {

      const reason = formatError(error);

      LOG.warn("Capture of frame %s failed: %s.", frame.sequence, reason);

      return { id, ok: false, reason, timestamp: new Date().toISOString() };
    }
  }

  /**
   * Uploads an encoded capture within the upload timeout. On timeout the upload is aborted, and the capture stays in flight until the uploader has settled.
   * @param bytes - The encoded image.
   * @param id - The capture identifier.
   * @returns The URL of the stored image.
   */
  private async upload(bytes: Buffer, id: string): Promise<string> {

    const abort = new AbortController();
    const pending = this.uploader.upload({ bytes, contentType: JPEG_CONTENT_TYPE, folder: this.options.folder, id, signal: abort.signal });

    try {

      return await withTimeout(pending, this.options.uploadTimeout, "Upload", abort);
    } catch(error) {

      if(abort.signal.aborted) {

        await pending.then((url) => {

          LOG.warn("Upload of %s completed after timing out and is stored at %s.", id, url);
        }, (abortError: unknown) => {

          LOG.debug("upload", "Abandoned upload of %s ended: %s.", id, formatError(abortError));
        });
      }

      throw error;
    }
  }
}
