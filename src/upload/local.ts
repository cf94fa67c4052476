/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * local.ts: Uploader storing captures on the local filesystem.
 */
import type { ImageUploader, UploadRequest } from "./types.js";
import { LOG, UploadError, formatError } from "../utils/index.js";
import { buildObjectKey, joinUrl } from "./types.js";
import { promises as fsPromises } from "node:fs";
import path from "node:path";

const { mkdir, writeFile } = fsPromises;

/**
 * URL path under which the HTTP server serves the capture directory.
 */
export const CAPTURES_ROUTE = "/captures";

/**
 * Writes captures beneath a directory that the HTTP server exposes at /captures.
 */
export class LocalUploader implements ImageUploader {

  public readonly name = "local";

  /**
   * @param directory - Root directory for stored captures.
   * @param publicBaseUrl - Origin prefixed to returned URLs, e.g. "http://camsnap.local:5590". Empty for server-relative URLs.
   */
  constructor(private readonly directory: string, private readonly publicBaseUrl: string) {}

  public async upload(request: UploadRequest): Promise<string> {

    const key = buildObjectKey(request.folder, request.id, request.contentType);
    const filePath = path.join(this.directory, ...key.split("/"));

    try {

      await mkdir(path.dirname(filePath), { recursive: true });
      request.signal?.throwIfAborted();
      await writeFile(filePath, request.bytes, { signal: request.signal });
    } catch(error) {

      throw new UploadError([ "Unable to write ", filePath, ": ", formatError(error) ].join(""), error);
    }

    LOG.debug("upload", "Stored %s (%s bytes).", filePath, request.bytes.length);

    return joinUrl(this.publicBaseUrl.replace(/\/+$/, "") + CAPTURES_ROUTE, key);
  }
}
