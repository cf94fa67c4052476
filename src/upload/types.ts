/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * types.ts: Upload collaborator contract and object key construction.
 */
import { UploadError } from "../utils/index.js";

/**
 * One image to store.
 */
export interface UploadRequest {

  bytes: Buffer;
  contentType: string;

  // Destination folder, possibly nested with "/" separators. Empty for the root.
  folder: string;

  // Capture identifier, used as the file name.
  id: string;

  // Aborted when the caller gives up on the upload. Implementations stop their work and reject.
  signal?: AbortSignal;
}

/**
 * Stores images and returns where they can be viewed. Implementations reject with UploadError on remote rejection or transport failure.
 */
export interface ImageUploader {

  // Short provider name for logs and the health endpoint.
  readonly name: string;

  /**
   * Stores an image.
   * @param request - The image and where to put it.
   * @returns The URL of the stored image.
   */
  upload(request: UploadRequest): Promise<string>;
}

// File extensions for the content types captures are stored as.
const EXTENSIONS: Readonly<Record<string, string>> = {

  "image/jpeg": ".jpg",
  "image/png": ".png"
};

/**
 * Builds the storage key for an image: the folder's segments, then the identifier with an extension matching the content type.
 * @param folder - Destination folder.
 * @param id - Capture identifier.
 * @param contentType - MIME type of the image.
 * @returns The key, e.g. "captures/snap_20240518_142233_041.jpg".
 * @throws UploadError when a segment would escape the folder or the identifier is empty.
 */
export function buildObjectKey(folder: string, id: string, contentType: string): string {

  const segments = folder.split("/").filter((segment) => segment.length > 0);

  for(const segment of [ ...segments, id ]) {

    if((segment === ".") || (segment === "..") || segment.includes("\\") || segment.includes("/")) {

      throw new UploadError("Invalid path segment: " + segment);
    }
  }

  if(!id) {

    throw new UploadError("Capture identifier is empty");
  }

  return [ ...segments, id + (EXTENSIONS[contentType] ?? "") ].join("/");
}

/**
 * Appends a key to a base URL, encoding each key segment.
 * @param baseUrl - Base URL, with or without a trailing slash.
 * @param key - Object key.
 * @returns The combined URL.
 */
export function joinUrl(baseUrl: string, key: string): string {

  return [ baseUrl.replace(/\/+$/, ""), key.split("/").map((segment) => encodeURIComponent(segment)).join("/") ].join("/");
}
