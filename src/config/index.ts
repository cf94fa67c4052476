/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for Camsnap.
 */
import type { Config, Nullable } from "../types/index.js";
import { DEFAULTS, getAllSettings, getEnvOverrides, getNestedValue, getSettingByPath, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { LOG, redactUrl } from "../utils/index.js";
import { getCaptureDir, getLogFilePath } from "./paths.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. CLI flags (--port, --log-file)
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the HTTP server (port, host)
 * - camera: Source URL and quality variant
 * - streaming: Connect and read timeouts, frame rate, FFmpeg location
 * - recovery: Failure threshold, failure policy, reconnect budget and backoff
 * - capture: JPEG quality, identifier prefix, destination folder, upload timeout
 * - upload: Which uploader to use and its settings
 * - logging: HTTP request logging level and log file size
 * - paths: Capture directory and log file locations
 *
 * Configuration is initialized at startup via initializeConfiguration(), which loads the user config file, merges with defaults, applies environment and CLI
 * overrides. validateConfiguration() then checks every value and reports all problems at once.
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Indicates whether a user config file parse error occurred during initialization.
 */
export let configParseError = false;

/**
 * Overrides supplied on the command line.
 */
export interface CliOverrides {

  logFile?: string;
  port?: number;
}

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment variable and CLI overrides. This must be called at
 * startup, after initializeDataDir(), before any code accesses CONFIG.
 * @param overrides - Values from CLI flags.
 */
export async function initializeConfiguration(overrides: CliOverrides = {}): Promise<void> {

  const result = await loadUserConfig();

  configParseError = result.parseError;

  CONFIG = mergeConfiguration(result.config);

  if(overrides.port !== undefined) {

    CONFIG.server.port = overrides.port;
  }

  if(overrides.logFile !== undefined) {

    CONFIG.paths.logFile = overrides.logFile;
  }
}

/*
 * CONFIGURATION VALIDATION
 *
 * Before starting the server we validate all configuration values. A zero read timeout or a JPEG quality of 500 would otherwise surface as confusing runtime
 * failures long after startup. Validation collects every error so that all problems can be fixed in one pass.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  return validateRange(name, value, min, max);
}

/**
 * Validates that a configuration value is a non-negative integer within an optional range.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validateNonNegativeInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 0)) {

    return [ name, " must be a non-negative integer, got: ", String(value) ].join("");
  }

  return validateRange(name, value, min, max);
}

/**
 * Checks optional bounds.
 * @param name - The configuration name for error messages.
 * @param value - The value to check.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if out of range, null otherwise.
 */
function validateRange(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates all configuration values.
 * @param config - The configuration to validate. Defaults to CONFIG.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  // Metadata-driven checks: numeric ranges and enumerated strings.
  for(const setting of getAllSettings()) {

    const name = setting.envVar ?? setting.path;
    const value = getNestedValue(config, setting.path);
    let error: Nullable<string> = null;

    if(typeof value === "number") {

      error = ((setting.min !== undefined) && (setting.min < 1)) ? validateNonNegativeInt(name, value, setting.min, setting.max) :
        validatePositiveInt(name, value, setting.min, setting.max);
    } else if((typeof value === "string") && setting.validValues && !setting.validValues.includes(value)) {

      error = [ name, " must be one of ", setting.validValues.join(", "), ", got: ", value ].join("");
    }

    if(error) {

      errors.push(error);
    }
  }

  // A configured camera URL must at least name an RTSP endpoint. An empty URL is allowed: the URL can be supplied when the stream is started.
  if(config.camera.url && !/^rtsps?:\/\//i.test(config.camera.url)) {

    errors.push("RTSP_URL must start with rtsp:// or rtsps://, got: " + redactUrl(config.camera.url));
  }

  if(config.upload.provider === "s3") {

    if(!config.upload.s3Bucket) {

      errors.push("S3_BUCKET is required when UPLOAD_PROVIDER is s3.");
    }

    if(!config.upload.s3Region) {

      errors.push("S3_REGION is required when UPLOAD_PROVIDER is s3.");
    }
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Displays the active configuration at startup. Only the most commonly adjusted values are logged.
 */
export function displayConfiguration(): void {

  LOG.info("Starting Camsnap with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Camera: %s (%s quality)", CONFIG.camera.url ? redactUrl(CONFIG.camera.url) : "not configured", CONFIG.camera.quality);
  LOG.info("  Decode: %s fps, connect timeout %sms, read timeout %sms", CONFIG.streaming.targetFps, CONFIG.streaming.connectTimeout,
    CONFIG.streaming.readTimeout);
  LOG.info("  Recovery: %s after %s failed reads, up to %s reconnect attempts", CONFIG.recovery.failurePolicy, CONFIG.recovery.maxReadFailures,
    CONFIG.recovery.maxReconnectAttempts);
  LOG.info("  Uploads: %s", (CONFIG.upload.provider === "s3") ? [ "s3://", CONFIG.upload.s3Bucket, " (", CONFIG.upload.s3Region, ")" ].join("") :
    getCaptureDir(CONFIG));
  LOG.info("  Log file: %s", getLogFilePath(CONFIG));

  const envNames = [ ...getEnvOverrides().keys() ].map((settingPath) => getSettingByPath(settingPath)?.envVar ?? settingPath);

  if(envNames.length > 0) {

    LOG.info("  Environment overrides: %s", envNames.join(", "));
  }

  if(configParseError) {

    LOG.warn("The configuration file could not be parsed. Defaults are in effect for every setting it would have changed.");
  }
}
