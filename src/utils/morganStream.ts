/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for Camsnap.
 */
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/**
 * Creates a Morgan stream that routes HTTP request log lines the same way as application logs: to stdout with a timestamp in console mode, or to the file logger
 * (which adds its own timestamp) otherwise.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      // Morgan terminates every line with a newline; both sinks add their own.
      const trimmedMessage = message.trim();

      if(isConsoleLogging()) {

        // eslint-disable-next-line no-console
        console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", trimmedMessage ].join(""));

        return;
      }

      writeLogEntry("info", trimmedMessage);
    }
  };
}
