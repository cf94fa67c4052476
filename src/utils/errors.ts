/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error types and formatting utilities for Camsnap.
 */

/* Every failure the core can produce belongs to one of four classes. Session-level failures (ConnectError, ReadStallError) are handled inside the stream session
 * and surfaced as status; capture-level failures (EncodeError, UploadError) are handled inside the capture controller and surfaced as a result value. None of them
 * is expected to reach the HTTP layer uncaught.
 */

/**
 * Base class for all Camsnap errors. The optional cause is passed through to Error so the underlying error is available for debug logging.
 */
export class CamsnapError extends Error {

  constructor(message: string, cause?: unknown) {

    super(message, (cause === undefined) ? undefined : { cause });

    this.name = new.target.name;
  }
}

/**
 * The video source could not be opened: malformed URL, unreachable host, decoder failure, or no frame before the connect timeout. Fatal to starting a session.
 */
export class ConnectError extends CamsnapError {}

/**
 * A single frame read failed during an active session. Transient: counted toward the failure threshold.
 */
export class ReadStallError extends CamsnapError {}

/**
 * A frame could not be encoded to a still image. Fatal to that capture only.
 */
export class EncodeError extends CamsnapError {}

/**
 * The upload collaborator rejected the image or the transport failed. Fatal to that capture only.
 */
export class UploadError extends CamsnapError {}

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(isMessageCarrier(error)) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Checks whether a thrown value is a plain object with a string message, as some SDKs reject with.
 * @param value - The thrown value.
 * @returns True if the value carries a string message property.
 */
function isMessageCarrier(value: unknown): value is { message: string } {

  return (typeof value === "object") && (value !== null) && ("message" in value) && (typeof value.message === "string");
}
