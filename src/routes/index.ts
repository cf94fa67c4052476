/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for Camsnap.
 */
import type { AppContext } from "./context.js";
import { CAPTURES_ROUTE } from "../upload/index.js";
import type { Express } from "express";
import express from "express";
import { setupApiEndpoints } from "./api.js";
import { setupEventsEndpoint } from "./events.js";
import { setupHealthEndpoint } from "./health.js";
import { setupLogsEndpoint } from "./logs.js";
import { setupPreviewEndpoints } from "./preview.js";
import { setupRootEndpoint } from "./root.js";

/*
 * ROUTE SETUP
 *
 * This module aggregates all route setup functions and provides a single function to configure all HTTP endpoints on the Express application.
 */

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param context - The application context.
 */
export function setupRoutes(app: Express, context: AppContext): void {

  setupApiEndpoints(app, context);
  setupEventsEndpoint(app, context);
  setupHealthEndpoint(app, context);
  setupLogsEndpoint(app, context);
  setupPreviewEndpoints(app, context);
  setupRootEndpoint(app, context);

  // Captures stored by the local uploader. Served regardless of the active provider so that earlier local captures stay reachable.
  app.use(CAPTURES_ROUTE, express.static(context.captureDir, { dotfiles: "deny", fallthrough: false, index: false }));
}

export type { AppContext } from "./context.js";
