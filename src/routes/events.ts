/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * events.ts: Server-Sent Events stream of session and capture status.
 */
import type { Express, Request, Response } from "express";
import type { AppContext } from "./context.js";
import { buildStatusResponse } from "./api.js";

/* The /api/events endpoint keeps the landing page current without polling. A client receives a "snapshot" event with the full status as soon as it connects, then a
 * "status" event for every connection change and a "capture" event for every capture state change. Frames are not sent here: the page shows them through the MJPEG
 * preview. A named heartbeat every 30 seconds keeps proxies from closing an idle connection.
 */

const HEARTBEAT_INTERVAL = 30000;

/**
 * Formats one named SSE event.
 * @param event - Event name.
 * @param data - Payload, serialized as JSON.
 * @returns The event text including its terminating blank line.
 */
export function formatSseEvent(event: string, data: unknown): string {

  return [ "event: ", event, "\ndata: ", JSON.stringify(data), "\n\n" ].join("");
}

/**
 * Configures the status event stream endpoint.
 * @param app - The Express application.
 * @param context - The application context.
 */
export function setupEventsEndpoint(app: Express, context: AppContext): void {

  app.get("/api/events", (req: Request, res: Response): void => {

    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("Content-Type", "text/event-stream");

    res.flushHeaders();

    res.write(formatSseEvent("snapshot", buildStatusResponse(context)));

    const unsubscribe = context.hub.subscribe((event) => {

      if(event.type === "frame") {

        return;
      }

      res.write(formatSseEvent(event.type, event.data));
    });

    const heartbeatInterval = setInterval(() => {

      res.write("event: heartbeat\ndata: \n\n");
    }, HEARTBEAT_INTERVAL);

    req.on("close", () => {

      clearInterval(heartbeatInterval);
      unsubscribe();
    });
  });
}
