/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * preview.ts: Latest-frame JPEG and MJPEG live preview endpoints.
 */
import type { Express, Request, Response } from "express";
import type { Frame, Nullable } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";
import { MJPEG_BOUNDARY, formatMjpegPart } from "../capture/preview.js";
import type { AppContext } from "./context.js";

/* The preview is a multipart/x-mixed-replace stream, which every browser renders in a plain <img> element. Each client follows the hub's frame events, but a client
 * that is still busy with the previous part (encoding, or waiting for its socket to drain) skips frames rather than queueing them, so a slow viewer sees a lower
 * frame rate instead of growing latency.
 */

/**
 * Configures the preview endpoints.
 * @param app - The Express application.
 * @param context - The application context.
 */
export function setupPreviewEndpoints(app: Express, context: AppContext): void {

  app.get("/api/frame.jpg", async (_req: Request, res: Response): Promise<void> => {

    const frame = context.manager.getSession()?.latestFrame ?? null;

    if(!frame) {

      res.status(404).json({ error: "No frame available." });

      return;
    }

    try {

      const jpeg = await context.preview.encode(frame);

      res.setHeader("Cache-Control", "no-store");
      res.type("jpeg").send(jpeg);
    } catch(error) {

      LOG.error("Unable to encode preview frame: %s.", formatError(error));

      res.status(500).json({ error: "Unable to encode frame." });
    }
  });

  app.get("/api/preview.mjpeg", (req: Request, res: Response): void => {

    res.setHeader("Cache-Control", "no-cache, no-store");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("Content-Type", "multipart/x-mixed-replace; boundary=" + MJPEG_BOUNDARY);

    res.flushHeaders();

    let busy = false;
    let closed = false;

    const send = async (frame: Frame): Promise<void> => {

      busy = true;

      try {

        const jpeg = await context.preview.encode(frame);

        if(closed) {

          return;
        }

        // Wait for the socket to drain before accepting the next frame.
        if(!res.write(formatMjpegPart(jpeg))) {

          await new Promise<void>((resolve) => {

            res.once("drain", resolve);
            res.once("close", resolve);
          });
        }
      } catch(error) {

        LOG.debug("http:preview", "Skipping preview frame %s: %s.", frame.sequence, formatError(error));
      } finally {

        busy = false;
      }
    };

    const offer = (frame: Nullable<Frame>): void => {

      if(!frame || busy || closed) {

        return;
      }

      void send(frame);
    };

    offer(context.manager.getSession()?.latestFrame ?? null);

    const unsubscribe = context.hub.subscribe((event) => {

      if(event.type === "frame") {

        offer(event.data);
      }
    });

    LOG.debug("http:preview", "Preview client connected from %s.", req.ip);

    req.on("close", () => {

      closed = true;
      unsubscribe();

      LOG.debug("http:preview", "Preview client disconnected from %s.", req.ip);
    });
  });
}
