/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * s3.ts: Uploader storing captures in an S3 bucket.
 */
import type { ImageUploader, UploadRequest } from "./types.js";
import { LOG, UploadError, formatError } from "../utils/index.js";
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { buildObjectKey, joinUrl } from "./types.js";

/**
 * Settings for the S3 uploader. Credentials come from the SDK's default provider chain (environment, shared config files, instance roles).
 */
export interface S3UploaderOptions {

  bucket: string;

  // Public base URL of the bucket's objects, such as a CDN in front of it. When empty the bucket's virtual-hosted URL is used.
  publicBaseUrl: string;
  region: string;
}

/**
 * Computes the URL an object will be viewable at.
 * @param options - Uploader settings.
 * @param key - Object key.
 * @returns The public URL.
 */
export function buildPublicUrl(options: S3UploaderOptions, key: string): string {

  if(options.publicBaseUrl) {

    return joinUrl(options.publicBaseUrl, key);
  }

  return joinUrl([ "https://", options.bucket, ".s3.", options.region, ".amazonaws.com" ].join(""), key);
}

export class S3Uploader implements ImageUploader {

  public readonly name = "s3";

  private readonly client: S3Client;

  /**
   * @param options - Bucket settings.
   * @param client - S3 client, replaceable for tests. Defaults to a client for the configured region.
   */
  constructor(private readonly options: S3UploaderOptions, client?: S3Client) {

    this.client = client ?? new S3Client({ region: options.region });
  }

  public async upload(request: UploadRequest): Promise<string> {

    const key = buildObjectKey(request.folder, request.id, request.contentType);

    try {

      await this.client.send(new PutObjectCommand({ Body: request.bytes, Bucket: this.options.bucket, ContentType: request.contentType, Key: key }),
        { abortSignal: request.signal });
    } catch(error) {

      throw new UploadError(formatError(error), error);
    }

    LOG.debug("upload", "Stored s3://%s/%s (%s bytes).", this.options.bucket, key, request.bytes.length);

    return buildPublicUrl(this.options, key);
  }
}
