/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder for Camsnap.
 */
import type { CliOverrides } from "./config/index.js";
import { CONFIG, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { Config, Nullable } from "./types/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatError, resolveFFmpegPath, setConsoleLogging } from "./utils/index.js";
import { getCaptureDir, getLogFilePath } from "./config/paths.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { AppContext } from "./routes/index.js";
import { CaptureController } from "./capture/controller.js";
import { FfmpegFrameSource } from "./streaming/ffmpegSource.js";
import type { FrameSource } from "./streaming/frameSource.js";
import type { ImageUploader } from "./upload/index.js";
import { PreviewEncoder } from "./capture/preview.js";
import type { Server } from "node:http";
import { StatusHub } from "./streaming/statusHub.js";
import { StreamManager } from "./streaming/manager.js";
import consoleStamp from "console-stamp";
import { createUploader } from "./upload/index.js";
import express from "express";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to ~/.camsnap/camsnap.log.
 */

// Track whether console logging is enabled, set during startServer().
let usingConsoleLogging = false;

/*
 * APPLICATION STATE
 *
 * The HTTP server and the application context are stored globally so they can be released during graceful shutdown.
 */

let server: Nullable<Server> = null;
let appContext: Nullable<AppContext> = null;

/*
 * APPLICATION CONTEXT
 *
 * The context wires the components together: the status hub is shared by the session and the capture controller, the capture controller reads frames from whatever
 * session the manager currently owns, and the routes see all of them.
 */

/**
 * Optional replacements for the collaborators that talk to the outside world.
 */
export interface ContextOverrides {

  frameSource?: FrameSource;
  uploader?: ImageUploader;
}

/**
 * Creates the application context from a configuration.
 * @param config - The configuration.
 * @param overrides - Replacement frame source or uploader.
 * @returns The application context.
 */
export function createAppContext(config: Config, overrides: ContextOverrides = {}): AppContext {

  const captureDir = getCaptureDir(config);
  const hub = new StatusHub();
  const manager = new StreamManager(config, overrides.frameSource ?? new FfmpegFrameSource(), hub);
  const uploader = overrides.uploader ?? createUploader(config, captureDir);

  const capture = new CaptureController(() => manager.getSession(), uploader, {

    folder: config.capture.folder,
    idPrefix: config.capture.idPrefix,
    jpegQuality: config.capture.jpegQuality,
    uploadTimeout: config.capture.uploadTimeout
  }, hub);

  return { capture, captureDir, config, hub, manager, preview: new PreviewEncoder(config.capture.previewQuality), uploader };
}

/*
 * GRACEFUL SHUTDOWN
 *
 * When the process receives a termination signal, we stop the stream session (which terminates FFmpeg) and close the HTTP server before exiting.
 */

/**
 * Sets up signal handlers for graceful shutdown. When SIGINT or SIGTERM is received, we stop the session and the HTTP server before exiting.
 */
function setupGracefulShutdown(): void {

  let shutdownInProgress = false;

  async function shutdown(): Promise<void> {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    try {

      await appContext?.manager.stop();
    } catch(error) {

      LOG.error("Error stopping the stream during shutdown: %s.", formatError(error));
    }

    server?.close((): void => {

      LOG.info("HTTP server closed successfully.");
    });

    // Shut down file logger if in use.
    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", (): void => {

    void shutdown();
  });

  process.on("SIGTERM", (): void => {

    void shutdown();
  });
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. This is separated from the server startup to allow for
 * testing with a context built around fakes.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param context - The application context.
 * @returns The configured Express application.
 */
export function buildApp(context: AppContext): Express {

  const app = express();

  app.use(express.json());

  // Configure Morgan for HTTP request logging based on httpLogLevel configuration. Morgan output goes through morganStream which handles timestamp formatting
  // consistently for both console and file logging modes.
  const httpLogLevel = context.config.logging.httpLogLevel;

  if(httpLogLevel !== "none") {

    const morganFormat = ":method :url from :remote-addr responded :status in :response-time ms.";
    const morganStream = createMorganStream();

    if(httpLogLevel === "errors") {

      app.use(morgan(morganFormat, {

        skip: (_req, res): boolean => res.statusCode < 400,
        stream: morganStream
      }));
    } else if(httpLogLevel === "filtered") {

      // Long-lived and polled endpoints would otherwise dominate the log.
      const skipPatterns = [ "/api/events", "/api/frame.jpg", "/api/preview.mjpeg", "/favicon", "/health", "/logs" ];

      app.use(morgan(morganFormat, {

        skip: (req, res): boolean => {

          // Always log errors.
          if(res.statusCode >= 400) {

            return false;
          }

          const url = req.originalUrl || req.url;

          return skipPatterns.some((pattern) => url.startsWith(pattern));
        },

        stream: morganStream
      }));
    } else {

      // Log all requests.
      app.use(morgan(morganFormat, { stream: morganStream }));
    }
  }

  // Set up all HTTP endpoints.
  setupRoutes(app, context);

  // Global error handler. Express error handlers require 4 parameters even if unused. Malformed JSON bodies arrive here as 400s from the body parser.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction): void => {

    const status = ((err instanceof Error) && ("status" in err) && (typeof err.status === "number")) ? err.status : 500;

    if(status >= 500) {

      LOG.error("Unhandled error in request: %s.", formatError(err));
    }

    if(!res.headersSent) {

      res.status(status).json({ error: (status >= 500) ? "Internal server error." : "Malformed request body." });
    }
  });

  return app;
}

/*
 * SERVER STARTUP
 *
 * The startServer function initializes and starts the HTTP server. It loads and validates configuration, sets up logging, checks for FFmpeg, and starts the Express
 * application. The stream itself is not started until a client asks for it.
 */

/**
 * Options for starting the server.
 */
export interface StartServerOptions extends CliOverrides {

  // Whether to log to console instead of file.
  consoleLogging: boolean;
}

/**
 * Initializes and starts the HTTP server.
 * @param options - Logging mode and CLI overrides.
 */
export async function startServer(options: StartServerOptions): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = options.consoleLogging;
  setConsoleLogging(options.consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(options.consoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file and environment variables, then validate.
  try {

    await initializeConfiguration({ logFile: options.logFile, port: options.port });
    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  // Initialize file logger if not using console logging.
  if(!options.consoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  displayConfiguration();
  setupGracefulShutdown();

  // Without FFmpeg no stream can be opened, but the control page and the health endpoint still explain why.
  const ffmpegPath = await resolveFFmpegPath(CONFIG.streaming.ffmpegPath);

  if(ffmpegPath) {

    LOG.info("Using FFmpeg at: %s", ffmpegPath);
  } else {

    LOG.error("FFmpeg is not available. Install FFmpeg in the system PATH or set FFMPEG_PATH.");
  }

  appContext = createAppContext(CONFIG);

  const app = buildApp(appContext);

  server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

    LOG.info("Camsnap is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
  });

  server.on("error", (error: Error): void => {

    LOG.error("HTTP server error: %s.", formatError(error));

    process.exit(1);
  });
}
