/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.ts: FFmpeg process management for RTSP frame decoding.
 */
import { LOG } from "./logger.js";
import type { Nullable } from "../types/index.js";
import type { Readable } from "node:stream";
import { spawn } from "node:child_process";

/*
 * FFMPEG DECODING
 *
 * FFmpeg pulls the RTSP stream over TCP, decimates it to the target frame rate, and writes each decoded picture to stdout as a binary PPM image (P6). PPM carries
 * its own dimensions in a tiny ASCII header, so the reader needs no side channel to learn the frame size, and the pixel payload is plain packed RGB.
 *
 * The process runs for the lifetime of one connection. Reconnecting means killing it and spawning a new one.
 */

// Cached FFmpeg path after resolution. Null means not yet resolved, undefined means not found.
let cachedFFmpegPath: Nullable<string> | undefined = null;

/**
 * Checks if FFmpeg exists at a specific path by attempting to run it.
 * @param pathToCheck - Full path to, or command name of, the FFmpeg executable.
 * @returns Promise resolving to true if FFmpeg runs successfully.
 */
async function checkFFmpegAtPath(pathToCheck: string): Promise<boolean> {

  return new Promise((resolve) => {

    const ffmpeg = spawn(pathToCheck, [ "-version" ], {

      stdio: [ "ignore", "ignore", "ignore" ]
    });

    ffmpeg.on("error", () => {

      resolve(false);
    });

    ffmpeg.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Resolves the FFmpeg executable: the configured path when set, otherwise "ffmpeg" from the system PATH. The result is cached.
 * @param configuredPath - Path from the configuration, or null to search PATH.
 * @returns Promise resolving to the FFmpeg path if found, or undefined if not available.
 */
export async function resolveFFmpegPath(configuredPath: Nullable<string>): Promise<string | undefined> {

  if(cachedFFmpegPath !== null) {

    return cachedFFmpegPath;
  }

  const candidate = configuredPath ?? "ffmpeg";

  cachedFFmpegPath = (await checkFFmpegAtPath(candidate)) ? candidate : undefined;

  return cachedFFmpegPath;
}

/**
 * Returns whether FFmpeg was found by the last resolveFFmpegPath() call.
 * @returns True if FFmpeg is available.
 */
export function isFFmpegAvailable(): boolean {

  return (cachedFFmpegPath !== null) && (cachedFFmpegPath !== undefined);
}

/**
 * Options for the decoder process.
 */
export interface FrameDecoderOptions {

  // Socket I/O timeout for the RTSP connection, in milliseconds.
  socketTimeout: number;

  // Output frame rate.
  targetFps: number;
}

/**
 * A running decoder process.
 */
export interface FFmpegProcess {

  // Gracefully terminates the process. Exits after kill() are not reported through onExit.
  kill: () => void;

  // Readable stream of concatenated PPM images.
  stdout: Readable;
}

/**
 * Builds the FFmpeg argument list for decoding an RTSP URL to PPM images on stdout.
 *
 * - `-rtsp_transport tcp`: Interleave RTP over the RTSP TCP connection; consumer cameras drop UDP packets freely
 * - `-timeout <us>`: Socket I/O timeout, so a dead camera ends the process instead of hanging it
 * - `-fflags nobuffer -flags low_delay`: Emit frames as soon as they are decoded
 * - `-an`: Ignore audio
 * - `-vf fps=<n>`: Decimate to the target frame rate
 * - `-f image2pipe -c:v ppm pipe:1`: Write each frame as a PPM image to stdout
 * @param url - The effective source URL.
 * @param options - Decoder options.
 * @returns The argument list.
 */
export function buildDecoderArgs(url: string, options: FrameDecoderOptions): string[] {

  return [
    "-hide_banner",
    "-loglevel", "warning",
    "-nostdin",
    "-rtsp_transport", "tcp",
    "-timeout", String(options.socketTimeout * 1000),
    "-fflags", "nobuffer",
    "-flags", "low_delay",
    "-i", url,
    "-an",
    "-vf", "fps=" + String(options.targetFps),
    "-f", "image2pipe",
    "-c:v", "ppm",
    "pipe:1"
  ];
}

/**
 * Spawns an FFmpeg process decoding the given URL. The last non-empty stderr line is kept and passed to onExit, since that is where FFmpeg explains why it could
 * not connect.
 * @param url - The effective source URL.
 * @param options - Decoder options.
 * @param onExit - Invoked once when the process exits or fails to spawn, unless kill() was called first.
 * @returns The process wrapper.
 */
export function spawnFrameDecoder(url: string, options: FrameDecoderOptions, onExit: (error: Error) => void): FFmpegProcess {

  const ffmpeg = spawn(cachedFFmpegPath ?? "ffmpeg", buildDecoderArgs(url, options), {

    stdio: [ "ignore", "pipe", "pipe" ]
  });

  let shuttingDown = false;
  let lastStderrLine = "";

  // A spawn failure can raise both "error" and "exit". Only the first is reported.
  const report = (error: Error): void => {

    if(shuttingDown) {

      return;
    }

    shuttingDown = true;
    onExit(error);
  };

  ffmpeg.stderr.on("data", (data: Buffer) => {

    const lines = data.toString().split("\n").map((line) => line.trim()).filter((line) => line.length > 0);

    for(const line of lines) {

      lastStderrLine = line;

      LOG.debug("session:ffmpeg", "FFmpeg: %s", line);
    }
  });

  ffmpeg.on("exit", (code, signal) => {

    const detail = lastStderrLine ? ": " + lastStderrLine : "";

    if(code !== null) {

      report(new Error([ "FFmpeg exited with code ", String(code), detail ].join("")));
    } else {

      report(new Error([ "FFmpeg killed by signal ", String(signal), detail ].join("")));
    }
  });

  ffmpeg.on("error", report);

  const kill = (): void => {

    shuttingDown = true;

    if(!ffmpeg.killed) {

      ffmpeg.kill("SIGTERM");
    }
  };

  return { kill, stdout: ffmpeg.stdout };
}
