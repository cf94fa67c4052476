/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Upload collaborator selection.
 */
import type { Config } from "../types/index.js";
import type { ImageUploader } from "./types.js";
import { LocalUploader } from "./local.js";
import { S3Uploader } from "./s3.js";

export * from "./local.js";
export * from "./s3.js";
export * from "./types.js";

/**
 * Creates the uploader selected by the configuration.
 * @param config - The configuration.
 * @param captureDir - Resolved directory for the local uploader.
 * @returns The uploader.
 */
export function createUploader(config: Config, captureDir: string): ImageUploader {

  if(config.upload.provider === "s3") {

    return new S3Uploader({ bucket: config.upload.s3Bucket, publicBaseUrl: config.upload.s3PublicBaseUrl, region: config.upload.s3Region });
  }

  return new LocalUploader(captureDir, config.upload.publicBaseUrl);
}
