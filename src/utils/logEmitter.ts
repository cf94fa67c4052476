/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logEmitter.ts: Event emitter for real-time log streaming via SSE.
 */
import { EventEmitter } from "node:events";

/**
 * A structured log entry as sent to SSE clients.
 */
export interface LogEntry {

  categoryTag?: string;
  level: "debug" | "error" | "info" | "warn";
  message: string;
  timestamp: string;
}

const logEmitter = new EventEmitter();

// Each open log viewer holds one listener.
logEmitter.setMaxListeners(100);

/**
 * Emits a log entry to all subscribers.
 * @param entry - The log entry to broadcast.
 */
export function emitLogEntry(entry: LogEntry): void {

  logEmitter.emit("log", entry);
}

/**
 * Subscribes a callback to receive log entries.
 * @param callback - Function to call when a log entry is emitted.
 * @returns A function to unsubscribe the callback.
 */
export function subscribeToLogs(callback: (entry: LogEntry) => void): () => void {

  logEmitter.on("log", callback);

  return (): void => {

    logEmitter.off("log", callback);
  };
}
