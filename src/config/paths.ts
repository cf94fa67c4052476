/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for Camsnap.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* All filesystem paths Camsnap uses are resolved here. The data directory is resolved once at startup via initializeDataDir(), before config.json is loaded, since
 * the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (CAMSNAP_DATA_DIR)
 *   3. Default (~/.camsnap)
 *
 * The log file and capture directory are stored in Config (settable via config.json, env var, or CLI flag) and resolved after config loading.
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. May be called a second time with a CLI flag to override the initial
 * resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @throws If CAMSNAP_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.CAMSNAP_DATA_DIR;

  if(cliDataDir) {

    resolvedDataDir = path.resolve(cliDataDir);
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new Error("CAMSNAP_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".camsnap");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the directory the local uploader writes captures to.
 * @param config - The application configuration.
 * @returns The configured capture directory, or "captures" inside the data directory.
 */
export function getCaptureDir(config: Config): string {

  return config.paths.captureDir ?? path.join(getDataDir(), "captures");
}

/**
 * Returns the log file path.
 * @param config - The application configuration.
 * @returns The configured log file, or camsnap.log inside the data directory.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "camsnap.log");
}
