/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup for Camsnap.
 */
import type { Nullable } from "../types/index.js";
import { fileURLToPath } from "node:url";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

let cachedPackageVersion: Nullable<string> = null;

/**
 * Gets the current package version from package.json.
 * @returns The current version string (e.g., "1.0.0"), or "0.0.0" when package.json cannot be read.
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    // This file lives in src/utils/ or dist/utils/; package.json is two levels up in both layouts.
    const currentDir = fileURLToPath(new URL(".", import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(resolve(currentDir, "../../package.json"), "utf-8"));

    if((typeof packageJson !== "object") || (packageJson === null) || !("version" in packageJson) || (typeof packageJson.version !== "string")) {

      return "0.0.0";
    }

    cachedPackageVersion = packageJson.version;

    return cachedPackageVersion;
  } catch {

    return "0.0.0";
  }
}
