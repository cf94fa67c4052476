/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * encoder.ts: JPEG encoding of decoded frames.
 */
import { EncodeError, formatError } from "../utils/index.js";
import type { Frame } from "../types/index.js";
import sharp from "sharp";

/**
 * MIME type of encoded captures.
 */
export const JPEG_CONTENT_TYPE = "image/jpeg";

/**
 * Encodes a frame as a baseline JPEG.
 * @param frame - The frame to encode. Its pixel buffer is only read.
 * @param quality - JPEG quality, 1-100.
 * @returns The JPEG bytes.
 * @throws EncodeError when the quality is out of range or the frame cannot be encoded.
 */
export async function encodeJpeg(frame: Frame, quality: number): Promise<Buffer> {

  if(!Number.isInteger(quality) || (quality < 1) || (quality > 100)) {

    throw new EncodeError([ "JPEG quality must be an integer between 1 and 100, got ", String(quality) ].join(""));
  }

  if(frame.data.length !== (frame.width * frame.height * frame.channels)) {

    throw new EncodeError([ "Frame data is ", String(frame.data.length), " bytes, expected ", String(frame.width * frame.height * frame.channels), " for ",
      String(frame.width), "x", String(frame.height) ].join(""));
  }

  try {

    return await sharp(frame.data, { raw: { channels: frame.channels, height: frame.height, width: frame.width } }).jpeg({ quality }).toBuffer();
  } catch(error) {

    throw new EncodeError("Unable to encode frame: " + formatError(error), error);
  }
}
