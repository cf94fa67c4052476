/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ppm.test.ts: Tests for the PPM stream parser.
 */
import { describe, expect, it } from "vitest";
import { PpmParser } from "../src/streaming/ppm.js";
import type { PpmImage } from "../src/streaming/ppm.js";
import { makePpm } from "./helpers.js";

const PIXELS = Buffer.from([ 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12 ]);

describe("PpmParser", () => {

  it("parses back to back images from a single chunk", () => {

    const parser = new PpmParser();
    const images = parser.push(Buffer.concat([ makePpm(2, 2, PIXELS), makePpm(1, 1, Buffer.from([ 9, 8, 7 ])) ]));

    expect(images).toEqual([ { data: PIXELS, height: 2, width: 2 }, { data: Buffer.from([ 9, 8, 7 ]), height: 1, width: 1 } ]);
    expect(parser.pendingBytes).toBe(0);
  });

  it("waits for the rest of an image split across chunks", () => {

    const parser = new PpmParser();
    const bytes = makePpm(2, 2, PIXELS);

    // Split inside the header, then inside the payload.
    expect(parser.push(bytes.subarray(0, 5))).toEqual([]);
    expect(parser.push(bytes.subarray(5, 15))).toEqual([]);
    expect(parser.pendingBytes).toBe(15);
    expect(parser.push(bytes.subarray(15))).toEqual([ { data: PIXELS, height: 2, width: 2 } ]);
  });

  it("does not mistake a partial maxval for a complete header", () => {

    const parser = new PpmParser();

    expect(parser.push(Buffer.from("P6\n1 1\n25", "latin1"))).toEqual([]);
    expect(parser.push(Buffer.from([ 0x35, 0x0a, 1, 2, 3 ]))).toEqual([ { data: Buffer.from([ 1, 2, 3 ]), height: 1, width: 1 } ]);
  });

  it("keeps a trailing partial image for the next chunk", () => {

    const parser = new PpmParser();
    const second = makePpm(1, 1, Buffer.from([ 4, 5, 6 ]));

    expect(parser.push(Buffer.concat([ makePpm(1, 1, Buffer.from([ 1, 2, 3 ])), second.subarray(0, 4) ]))).toHaveLength(1);
    expect(parser.pendingBytes).toBe(4);
    expect(parser.push(second.subarray(4))).toEqual([ { data: Buffer.from([ 4, 5, 6 ]), height: 1, width: 1 } ]);
  });

  it("reassembles full-size frames delivered in pipe-sized chunks", () => {

    const width = 1920;
    const height = 1080;
    const payload = Buffer.alloc(width * height * 3);

    for(let i = 0; i < payload.length; i++) {

      payload[i] = i % 251;
    }

    const stream = Buffer.concat([ makePpm(width, height, payload), makePpm(width, height, payload) ]);
    const parser = new PpmParser();
    const images: PpmImage[] = [];

    for(let offset = 0; offset < stream.length; offset += 65536) {

      const chunk = Buffer.from(stream.subarray(offset, offset + 65536));

      images.push(...parser.push(chunk));

      // Images must not share memory with the chunks they were parsed from.
      chunk.fill(0);
    }

    expect(images).toHaveLength(2);
    expect(images[0].width).toBe(1920);
    expect(images[0].height).toBe(1080);
    expect(images[0].data.equals(payload)).toBe(true);
    expect(images[1].data.equals(payload)).toBe(true);
    expect(parser.pendingBytes).toBe(0);
  });

  it("rejects input without the P6 magic number", () => {

    expect(() => new PpmParser().push(Buffer.from("P3\n1 1\n255\n", "latin1"))).toThrow("Invalid PPM stream: expected P6 magic number.");
  });

  it("rejects empty dimensions", () => {

    expect(() => new PpmParser().push(Buffer.from("P6\n0 2\n255\n", "latin1"))).toThrow("Invalid PPM stream: bad dimensions 0x2.");
  });

  it("rejects 16-bit images", () => {

    expect(() => new PpmParser().push(Buffer.from("P6\n1 1\n65535\n", "latin1"))).toThrow("Invalid PPM stream: unsupported maxval 65535.");
  });

  it("rejects a header that never completes", () => {

    expect(() => new PpmParser().push(Buffer.from("P6 " + "x".repeat(70), "latin1"))).toThrow("Invalid PPM stream: malformed header.");
  });

  it("discards a partial image on reset", () => {

    const parser = new PpmParser();

    parser.push(Buffer.from("P6\n2 2", "latin1"));
    parser.reset();

    expect(parser.pendingBytes).toBe(0);
  });
});
