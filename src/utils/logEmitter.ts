/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logEmitter.ts: Event emitter for in-process log subscribers.
 */
import { EventEmitter } from "events";

/* A structured log entry as seen by in-process subscribers: the status server's SSE stream and the test suite, which asserts on exact log lines (including the
 * shutdown marker) without reading the log file.
 */

export interface LogEntry {

  categoryTag?: string;
  level: "debug" | "error" | "info" | "warn";
  message: string;
  timestamp: string;
}

const logEmitter = new EventEmitter();

// Each SSE client holds one listener.
logEmitter.setMaxListeners(100);

/**
 * Emits a log entry to all subscribers.
 * @param entry - The log entry to broadcast.
 */
export function emitLogEntry(entry: LogEntry): void {

  logEmitter.emit("log", entry);
}

/**
 * Subscribes a callback to receive log entries. Returns an unsubscribe function.
 * @param callback - Function to call when a log entry is emitted.
 * @returns A function to unsubscribe the callback.
 */
export function subscribeToLogs(callback: (entry: LogEntry) => void): () => void {

  logEmitter.on("log", callback);

  return (): void => {

    logEmitter.off("log", callback);
  };
}
