/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * streamContext.ts: AsyncLocalStorage-based session context for automatic log correlation.
 */
import { AsyncLocalStorage } from "node:async_hooks";

/* The decode loop, its reconnect attempts and the FFmpeg callbacks all run inside the async context established when a session starts. Log statements anywhere in
 * that call chain pick up the session ID without it being threaded through every function. Timer callbacks that start a fresh async context must re-enter it with
 * runWithStreamContext().
 */

/**
 * Context for the current stream session.
 */
export interface StreamContext {

  // Short session identifier used as a log prefix (e.g., "cam-3").
  streamId: string;

  // Redacted source URL.
  url?: string;
}

const streamContextStorage = new AsyncLocalStorage<StreamContext>();

/**
 * Runs a function within a stream context.
 * @param context - The stream context.
 * @param fn - The async function to run within the context.
 * @returns The result of the function.
 */
export async function runWithStreamContext<T>(context: StreamContext, fn: () => Promise<T>): Promise<T> {

  return streamContextStorage.run(context, fn);
}

/**
 * Retrieves the session ID for the current async operation.
 * @returns The session ID, or undefined outside a session context.
 */
export function getStreamId(): string | undefined {

  return streamContextStorage.getStore()?.streamId;
}
