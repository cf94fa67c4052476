#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for Camsnap.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue } from "./config/userConfig.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import { initializeDataDir } from "./config/paths.js";
import path from "node:path";
import { startServer } from "./app.js";

/* These handlers catch unhandled promise rejections and uncaught exceptions to prevent the process from crashing. A single unexpected error in a request handler
 * should not take down the stream session. The handlers log the error and allow the process to continue.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: camsnap [options]");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: " + String(DEFAULTS.server.port) + ")");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.camsnap)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/camsnap.log)");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  CAMERA_QUALITY                  Stream variant: high (ch00_0) or low (ch00_1)");
  console.log("  CAMSNAP_DATA_DIR                Data directory path (default: ~/.camsnap)");
  console.log("  CAMSNAP_DEBUG                   Debug category filter (e.g., 'session', 'session:read', '*,-session:ffmpeg')");
  console.log("  FAILURE_POLICY                  What to do when the stream is lost: reconnect or stop");
  console.log("  PORT                            HTTP server port");
  console.log("  RTSP_URL                        Camera RTSP URL");
  console.log("  UPLOAD_PROVIDER                 Where captures go: local or s3");
  console.log("");
  console.log("Debug categories:");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("  " + entry.category.padEnd(32) + entry.description);
  }

  console.log("");
  console.log("  Run 'camsnap --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints a complete listing of all environment variables organized by category. Generates output dynamically from CONFIG_METADATA so it is always accurate.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */

  // Category ordering: server first (most commonly configured), then alphabetical, with Special last.
  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Camera", key: "camera" },
    { displayName: "Capture", key: "capture" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" },
    { displayName: "Recovery", key: "recovery" },
    { displayName: "Streaming", key: "streaming" },
    { displayName: "Upload", key: "upload" }
  ];

  // Dynamic default descriptions for null settings that resolve at runtime rather than from DEFAULTS.
  const dynamicDefaults: Record<string, string> = {

    "paths.captureDir": "<data-dir>/captures",
    "paths.logFile": "<data-dir>/camsnap.log",
    "streaming.ffmpegPath": "ffmpeg from the system PATH"
  };

  console.log("Camsnap Environment Variables");
  console.log("");
  console.log("All settings can also be configured in <data-dir>/config.json.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const settings = CONFIG_METADATA[category.key] ?? [];

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of settings) {

      if(!setting.envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + setting.envVar);
      console.log("    " + setting.description);

      let defaultStr = dynamicDefaults[setting.path];

      if(!defaultStr) {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = (defaultValue === "") ? "(empty)" : String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      if(setting.validValues) {

        defaultStr = defaultStr + ", one of: " + setting.validValues.join(", ");
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // CAMSNAP_DATA_DIR is resolved before config.json is loaded, so it cannot be in config.json. CAMSNAP_DEBUG is parsed in the entry point.
  console.log("");
  console.log("Special:");
  console.log("  CAMSNAP_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.camsnap");
  console.log("");
  console.log("  CAMSNAP_DEBUG");
  console.log("    Debug category filter (e.g., 'session', 'session:read', '*,-session:ffmpeg').");
  console.log("    Default: (disabled)");

  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  logFile?: string;
  port?: number;
}

/**
 * Validates that a path argument is present and absolute. Prints an error and exits otherwise.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate.
 * @returns The validated path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments into a structured result. Values are stored in ParsedArgs rather than written directly to CONFIG, so that the configuration merge
 * system can apply CLI overrides at the correct priority level (CLI > env > config.json > defaults).
 * @returns Parsed argument flags and values.
 */
function parseArgs(): ParsedArgs {

  const args = process.argv.slice(2);
  const parsed: ParsedArgs = { consoleLogging: false, debugLogging: false };

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console": {

        parsed.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        parsed.debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        printUsage();

        process.exit(0);
      }

      case "-p":
      case "--port": {

        const port = parseInt(args[++i] ?? "", 10);

        if(Number.isNaN(port)) {

          // eslint-disable-next-line no-console
          console.error("Error: --port requires a numeric argument.");

          process.exit(1);
        }

        parsed.port = port;

        break;
      }

      case "--data-dir": {

        parsed.dataDir = requireAbsolutePath("--data-dir", args[++i]);

        break;
      }

      case "--log-file": {

        parsed.logFile = requireAbsolutePath("--log-file", args[++i]);

        break;
      }

      case "-v":
      case "--version": {

        // eslint-disable-next-line no-console
        console.log("Camsnap v" + getPackageVersion());

        process.exit(0);
      }

      default: {

        // eslint-disable-next-line no-console
        console.error("Error: unknown option " + arg + ". Run 'camsnap --help' for usage.");

        process.exit(1);
      }
    }
  }

  return parsed;
}

if(process.argv.slice(2).includes("--list-env")) {

  printEnvironmentVariables();

  process.exit(0);
}

/* The main entry point parses command-line arguments, starts the server, and handles any fatal errors that occur during initialization. If startup fails, we exit
 * with a non-zero code to signal the failure to process managers.
 */

const parsedArgs = parseArgs();

try {

  initializeDataDir(parsedArgs.dataDir);
} catch(error) {

  // eslint-disable-next-line no-console
  console.error("Error: " + formatError(error));

  process.exit(1);
}

// Enable debug logging before starting the server so debug messages during startup are captured. The CAMSNAP_DEBUG environment variable takes precedence over the
// --debug CLI flag, allowing fine-grained category selection.
const debugEnv = process.env.CAMSNAP_DEBUG;

if(debugEnv) {

  initDebugFilter(debugEnv);
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

// The exit event runs synchronously, so buffered log entries from a failed startup are written directly to disk here.
process.on("exit", (): void => {

  flushLogBufferSync();
});

startServer({ consoleLogging: parsedArgs.consoleLogging, logFile: parsedArgs.logFile, port: parsedArgs.port }).catch((error: unknown): void => {

  LOG.error("Fatal startup error occurred: %s.", formatError(error));

  process.exit(1);
});
