/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * api.ts: JSON control API for the stream session and captures.
 */
import type { Express, Request, Response } from "express";
import { ConnectError, LOG, formatError, redactUrl } from "../utils/index.js";
import type { Nullable, QualityVariant } from "../types/index.js";
import type { AppContext } from "./context.js";
import type { StartOptions } from "../streaming/manager.js";
import type { StatusSnapshot } from "../streaming/statusHub.js";
import { isQualityVariant } from "../streaming/source.js";
import { isRecord } from "../config/userConfig.js";

/* The control API is what the landing page's buttons call. Every response is JSON. Errors carry an "error" string; the status code tells the client which kind:
 *
 * - 400: the request itself is malformed (bad URL or quality in the start body).
 * - 409: the request conflicts with the current state (capture while busy, capture with nothing to capture).
 * - 502: the camera could not be opened.
 */

/**
 * Session counters included in the status response.
 */
interface SessionSummary {

  active: boolean;
  consecutiveFailures: number;
  framesDecoded: number;
  open: boolean;
  quality: QualityVariant;
  reconnectAttempts: number;
  url: string;
}

/**
 * Response body of GET /api/status.
 */
export interface StatusResponse extends StatusSnapshot {

  session: Nullable<SessionSummary>;
}

/**
 * Builds the status response from the current state.
 * @param context - The application context.
 * @returns The status response.
 */
export function buildStatusResponse(context: AppContext): StatusResponse {

  const session = context.manager.getSession();
  const snapshot = context.hub.getSnapshot();

  return {

    capture: context.capture.getStatus(),
    connection: snapshot.connection,
    frame: snapshot.frame,
    session: session ? {

      active: session.isActive,
      consecutiveFailures: session.consecutiveFailures,
      framesDecoded: session.framesDecoded,
      open: session.isOpen,
      quality: session.source.quality,
      reconnectAttempts: session.reconnectAttempts,
      url: redactUrl(session.url)
    } : null
  };
}

/**
 * Validates the body of a start request.
 * @param body - The parsed request body.
 * @returns The start options, or an error message.
 */
export function parseStartRequest(body: unknown): { error: string } | { options: StartOptions } {

  const options: StartOptions = {};

  // An absent or empty body starts the configured source.
  if((body === undefined) || (body === null)) {

    return { options };
  }

  if(!isRecord(body)) {

    return { error: "Request body must be a JSON object." };
  }

  if((body.url !== undefined) && (body.url !== "")) {

    if((typeof body.url !== "string") || !/^rtsps?:\/\//i.test(body.url)) {

      return { error: "url must be an rtsp:// or rtsps:// URL." };
    }

    options.url = body.url;
  }

  if(body.quality !== undefined) {

    if(!isQualityVariant(body.quality)) {

      return { error: "quality must be \"high\" or \"low\"." };
    }

    options.quality = body.quality;
  }

  return { options };
}

/**
 * Configures the control API endpoints.
 * @param app - The Express application.
 * @param context - The application context.
 */
export function setupApiEndpoints(app: Express, context: AppContext): void {

  app.get("/api/status", (_req: Request, res: Response): void => {

    res.json(buildStatusResponse(context));
  });

  app.post("/api/stream/start", async (req: Request, res: Response): Promise<void> => {

    const parsed = parseStartRequest(req.body);

    if("error" in parsed) {

      res.status(400).json({ error: parsed.error });

      return;
    }

    try {

      await context.manager.start(parsed.options);

      res.json(buildStatusResponse(context));
    } catch(error) {

      if(error instanceof ConnectError) {

        res.status(502).json({ error: formatError(error) + "." });

        return;
      }

      LOG.error("Unexpected error starting the stream: %s.", formatError(error));

      res.status(500).json({ error: "Internal server error." });
    }
  });

  app.post("/api/stream/stop", async (_req: Request, res: Response): Promise<void> => {

    try {

      await context.manager.stop();

      res.json(buildStatusResponse(context));
    } catch(error) {

      LOG.error("Unexpected error stopping the stream: %s.", formatError(error));

      res.status(500).json({ error: "Internal server error." });
    }
  });

  app.post("/api/capture", async (_req: Request, res: Response): Promise<void> => {

    const outcome = await context.capture.requestCapture();

    switch(outcome.kind) {

      case "busy": {

        res.status(409).json({ error: "A capture is already in progress." });

        break;
      }

      case "nothing": {

        res.status(409).json({ error: "Nothing to capture: the stream is not running or has not produced a frame yet." });

        break;
      }

      default: {

        res.json({ result: outcome.result });

        break;
      }
    }
  });
}
