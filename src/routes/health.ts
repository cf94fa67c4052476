/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for Camsnap.
 */
import type { Express, Request, Response } from "express";
import { getPackageVersion, isFFmpegAvailable } from "../utils/index.js";
import type { AppContext } from "./context.js";
import type { HealthStatus } from "../types/index.js";

/* The health endpoint reports FFmpeg availability, the session's state and counters, and process memory. Without FFmpeg no stream can ever be opened, so that is
 * "unhealthy" and answered with HTTP 503 for load balancers and monitors. A session that is retrying, or whose connection was lost or failed to open, is
 * "degraded": the service itself is fine, the camera is not.
 */

/**
 * Computes the health status.
 * @param context - The application context.
 * @returns The health response body.
 */
export function buildHealthStatus(context: AppContext): HealthStatus {

  const session = context.manager.getSession();
  const connection = context.hub.getSnapshot().connection;
  const ffmpegAvailable = isFFmpegAvailable();
  const memoryUsage = process.memoryUsage();

  let status: HealthStatus["status"] = "healthy";
  let message: string | undefined;

  if(!ffmpegAvailable) {

    status = "unhealthy";
    message = "FFmpeg is not available.";
  } else if([ "failed", "lost", "retrying" ].includes(connection.state)) {

    status = "degraded";
    message = connection.message;
  }

  const health: HealthStatus = {

    ffmpegAvailable,
    memory: {

      heapTotal: memoryUsage.heapTotal,
      heapUsed: memoryUsage.heapUsed,
      rss: memoryUsage.rss
    },
    session: {

      active: session?.isActive ?? false,
      consecutiveFailures: session?.consecutiveFailures ?? 0,
      framesDecoded: session?.framesDecoded ?? 0,
      reconnectAttempts: session?.reconnectAttempts ?? 0,
      state: connection.state
    },
    status,
    timestamp: new Date().toISOString(),
    uploadProvider: context.config.upload.provider,
    uptime: process.uptime(),
    version: getPackageVersion()
  };

  if(message) {

    health.message = message;
  }

  return health;
}

/**
 * Creates a health check endpoint for monitoring application status.
 * @param app - The Express application.
 * @param context - The application context.
 */
export function setupHealthEndpoint(app: Express, context: AppContext): void {

  app.get("/health", (_req: Request, res: Response): void => {

    const health = buildHealthStatus(context);

    res.status((health.status === "unhealthy") ? 503 : 200).json(health);
  });
}
