/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * preview.ts: Shared JPEG encoding for the live preview.
 */
import type { Frame, Nullable } from "../types/index.js";
import { encodeJpeg } from "./encoder.js";

/* Every preview client wants the same JPEG for the same frame. The encoder remembers the frame it encoded last and hands the same promise to every caller asking for
 * that frame, so N viewers cost one encode per frame. Frames are compared by identity: sequence numbers restart with every reconnect.
 */

/**
 * MJPEG multipart boundary.
 */
export const MJPEG_BOUNDARY = "camsnapframe";

export class PreviewEncoder {

  private cached: Nullable<{ frame: Frame; jpeg: Promise<Buffer> }> = null;

  /**
   * @param quality - JPEG quality of preview images.
   */
  constructor(private readonly quality: number) {}

  /**
   * Encodes a frame, reusing the previous result for the same frame.
   * @param frame - The frame.
   * @returns The JPEG bytes.
   */
  public async encode(frame: Frame): Promise<Buffer> {

    let cached = this.cached;

    if(!cached || (cached.frame !== frame)) {

      const jpeg = encodeJpeg(frame, this.quality);

      cached = { frame, jpeg };
      this.cached = cached;

      // A failed encode must not be handed to the next caller.
      void jpeg.catch((): void => {

        if(this.cached?.jpeg === jpeg) {

          this.cached = null;
        }
      });
    }

    return cached.jpeg;
  }
}

/**
 * Wraps a JPEG image as one part of a multipart/x-mixed-replace response.
 * @param jpeg - The image.
 * @returns The part, including its boundary line and trailing CRLF.
 */
export function formatMjpegPart(jpeg: Buffer): Buffer {

  const header = [ "--", MJPEG_BOUNDARY, "\r\nContent-Type: image/jpeg\r\nContent-Length: ", String(jpeg.length), "\r\n\r\n" ].join("");

  return Buffer.concat([ Buffer.from(header, "latin1"), jpeg, Buffer.from("\r\n", "latin1") ]);
}
