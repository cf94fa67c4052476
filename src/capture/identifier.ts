/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * identifier.ts: Capture identifier generation.
 */
import df from "dateformat";

/* Capture identifiers look like "snap_20240518_142233_041": a prefix, the local date and time to the second, and the milliseconds as a sub-second disambiguator. Two
 * captures within the same millisecond would still collide, so a repeat of the previously issued identifier gets a "-<n>" suffix.
 */

/**
 * Issues capture identifiers.
 */
export class CaptureIdGenerator {

  private last = "";
  private repeats = 0;

  /**
   * @param prefix - Leading component of every identifier.
   * @param now - Clock, replaceable for tests.
   */
  constructor(private readonly prefix: string, private readonly now: () => Date = (): Date => new Date()) {}

  /**
   * Issues the next identifier.
   * @returns An identifier different from the previous one.
   */
  public next(): string {

    const base = [ this.prefix, df(this.now(), "yyyymmdd_HHMMss_l") ].join("_");

    if(base !== this.last) {

      this.last = base;
      this.repeats = 0;

      return base;
    }

    this.repeats++;

    return [ base, "-", String(this.repeats) ].join("");
  }
}
