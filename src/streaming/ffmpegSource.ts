/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpegSource.ts: FrameSource backed by an FFmpeg decoder process.
 */
import type { Frame, Nullable } from "../types/index.js";
import { ConnectError, LOG, formatError, redactUrl, spawnFrameDecoder } from "../utils/index.js";
import type { FrameDecoderOptions, FFmpegProcess } from "../utils/index.js";
import type { FrameHandle, FrameSource, OpenOptions } from "./frameSource.js";
import { FrameReader } from "./frameReader.js";

// Schemes FFmpeg is asked to open. Anything else is rejected before a process is spawned.
const SUPPORTED_PROTOCOLS = [ "rtsp:", "rtsps:" ];

/**
 * Function that starts a decoder process. Replaceable so the open sequence can run against an in-process stream.
 */
export type DecoderSpawner = (url: string, options: FrameDecoderOptions, onExit: (error: Error) => void) => FFmpegProcess;

/**
 * Opens RTSP sources by spawning FFmpeg. A handle counts as open once the first frame has been decoded: an RTSP server happily accepts a TCP connection and then
 * never sends media, and that must fail the open rather than the first read.
 */
export class FfmpegFrameSource implements FrameSource {

  constructor(private readonly spawner: DecoderSpawner = spawnFrameDecoder) {}

  public async open(url: string, options: OpenOptions): Promise<FrameHandle> {

    validateSourceUrl(url);

    let reader: Nullable<FrameReader> = null;

    // An early decoder exit fails the reader, which turns the pending first read into a ConnectError below carrying FFmpeg's own explanation.
    const decoder = this.spawner(url, { socketTimeout: options.connectTimeout, targetFps: options.targetFps }, (error) => {

      reader?.fail(formatError(error) + ".");
    });

    reader = new FrameReader(decoder.stdout, decoder.kill);

    LOG.debug("session", "Opening %s.", redactUrl(url));

    try {

      // Wait for the first frame, then hand it back so the session's first read returns it.
      const first = await reader.read(options.connectTimeout);

      return new PrimedHandle(reader, first);
    } catch(error) {

      reader.close();

      throw new ConnectError([ "Unable to open ", redactUrl(url), ": ", formatError(error) ].join(""), error);
    }
  }
}

/**
 * Rejects URLs FFmpeg should not be asked to open.
 * @param url - The effective source URL.
 * @throws ConnectError when the URL is malformed, uses an unsupported scheme, or has no host.
 */
export function validateSourceUrl(url: string): void {

  let parsed: URL;

  try {

    parsed = new URL(url);
  } catch(error) {

    throw new ConnectError("Invalid stream URL: " + redactUrl(url), error);
  }

  if(!SUPPORTED_PROTOCOLS.includes(parsed.protocol)) {

    throw new ConnectError([ "Unsupported stream protocol ", parsed.protocol, " (expected rtsp: or rtsps:)" ].join(""));
  }

  if(!parsed.hostname) {

    throw new ConnectError("Stream URL has no host: " + redactUrl(url));
  }
}

/**
 * A handle whose first read returns a frame obtained during open.
 */
class PrimedHandle implements FrameHandle {

  constructor(private readonly reader: FrameReader, private primed: Nullable<Frame>) {}

  public async read(timeoutMs: number): Promise<Frame> {

    if(this.primed) {

      const frame = this.primed;

      this.primed = null;

      return frame;
    }

    return this.reader.read(timeoutMs);
  }

  public close(): void {

    this.primed = null;
    this.reader.close();
  }
}
