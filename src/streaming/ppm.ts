/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ppm.ts: Incremental parser for concatenated binary PPM images.
 */

/*
 * PPM PARSING
 *
 * FFmpeg's image2pipe muxer writes binary PPM (P6) images back to back with no framing of its own:
 *
 *   "P6" <ws> <width> <ws> <height> <ws> <maxval> <single ws> <width * height * 3 bytes of RGB>
 *
 * Pipe reads split that byte stream at arbitrary points. Header bytes are accumulated until the header parses (a few dozen bytes at most); the payload is then
 * allocated once at its final size and each chunk is copied straight into it, so every byte of the stream is copied once. Only 8-bit images (maxval < 256) are
 * accepted; FFmpeg's ppm encoder produces them for every 8-bit input format.
 */

// Header grammar. Comments are not supported: FFmpeg never writes them.
const HEADER_PATTERN = /^P6\s+(\d+)\s+(\d+)\s+(\d+)\s/;

// A complete header for any realistic frame size fits comfortably within this many bytes. Input that has not matched by then is not PPM.
const MAX_HEADER_LENGTH = 64;

/**
 * One parsed image.
 */
export interface PpmImage {

  data: Buffer;
  height: number;
  width: number;
}

// An image whose header has been parsed and whose payload is still arriving.
interface PartialImage {

  filled: number;
  headerLength: number;
  height: number;
  payload: Buffer;
  width: number;
}

const EMPTY = Buffer.alloc(0);

/**
 * Parses a stream of concatenated PPM images.
 */
export class PpmParser {

  private current: PartialImage | null = null;
  private head: Buffer = EMPTY;

  /**
   * Appends input and returns every image completed by it.
   * @param chunk - The next piece of the byte stream.
   * @returns Completed images, oldest first. Empty when more input is needed.
   * @throws An Error when the input is not an 8-bit binary PPM stream.
   */
  public push(chunk: Buffer): PpmImage[] {

    const images: PpmImage[] = [];
    let input = chunk;

    while(input.length > 0) {

      if(!this.current) {

        this.head = (this.head.length === 0) ? input : Buffer.concat([ this.head, input ]);
        input = EMPTY;

        const header = this.parseHeader();

        if(!header) {

          break;
        }

        this.current = { filled: 0, headerLength: header.length, height: header.height, payload: Buffer.allocUnsafe(header.width * header.height * 3),
          width: header.width };

        input = this.head.subarray(header.length);
        this.head = EMPTY;
      }

      const image = this.current;
      const count = Math.min(input.length, image.payload.length - image.filled);

      input.copy(image.payload, image.filled, 0, count);
      image.filled += count;
      input = input.subarray(count);

      if(image.filled === image.payload.length) {

        images.push({ data: image.payload, height: image.height, width: image.width });
        this.current = null;
      }
    }

    return images;
  }

  /**
   * Number of bytes received but not yet part of a completed image.
   */
  public get pendingBytes(): number {

    return this.head.length + (this.current ? (this.current.headerLength + this.current.filled) : 0);
  }

  /**
   * Discards any partial image.
   */
  public reset(): void {

    this.current = null;
    this.head = EMPTY;
  }

  /**
   * Parses the header at the start of the accumulated header bytes.
   * @returns The header dimensions and byte length, or null if more input is needed.
   * @throws An Error when the buffer does not start with a valid 8-bit P6 header.
   */
  private parseHeader(): { height: number; length: number; width: number } | null {

    if(this.head.length < 2) {

      return null;
    }

    if((this.head[0] !== 0x50) || (this.head[1] !== 0x36)) {

      throw new Error("Invalid PPM stream: expected P6 magic number.");
    }

    const text = this.head.subarray(0, MAX_HEADER_LENGTH).toString("latin1");
    const match = HEADER_PATTERN.exec(text);

    if(!match) {

      if(this.head.length >= MAX_HEADER_LENGTH) {

        throw new Error("Invalid PPM stream: malformed header.");
      }

      return null;
    }

    const width = Number(match[1]);
    const height = Number(match[2]);
    const maxval = Number(match[3]);

    if((width < 1) || (height < 1)) {

      throw new Error([ "Invalid PPM stream: bad dimensions ", String(width), "x", String(height), "." ].join(""));
    }

    if((maxval < 1) || (maxval > 255)) {

      throw new Error([ "Invalid PPM stream: unsupported maxval ", String(maxval), "." ].join(""));
    }

    return { height, length: match[0].length, width };
  }
}
