/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error types, formatting and classification utilities for ChannelWatch.
 */

/* The error taxonomy mirrors how each failure is recovered. ConnectionLostError is always absorbed by the reconnect supervisor. FetchFailedError is logged by the
 * poller, which tries again on its next tick. NotifyError is logged by the change detector and never reaches the monitoring loops. ConfigError is the only fatal
 * kind, and only at startup, before any monitoring task begins.
 */

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
  } else if(error && (typeof error === "object") && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * The push connection ended: transport closed, handshake rejected or timed out, or heartbeat acknowledgements stopped.
 */
export class ConnectionLostError extends Error {

  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {

    super([ "Connection lost: ", reason ].join(""), options);

    this.name = "ConnectionLostError";
    this.reason = reason;
  }
}

/**
 * A poll request failed. The status is set when the remote answered with a non-success HTTP status.
 */
export class FetchFailedError extends Error {

  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "FetchFailedError";
    this.status = status;
  }
}

/**
 * The visual or audio alert mechanism is unavailable.
 */
export class NotifyError extends Error {

  constructor(message: string, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "NotifyError";
  }
}

/**
 * Configuration is missing or invalid, or the watched channel cannot be resolved with the configured credential.
 */
export class ConfigError extends Error {

  constructor(message: string) {

    super(message);

    this.name = "ConfigError";
  }
}

/**
 * Checks whether an error represents cancellation through an AbortSignal. Both fetch and our own abortable waits reject with an error named "AbortError".
 * @param error - The error to check.
 * @returns True if the error is an abort.
 */
export function isAbortError(error: unknown): boolean {

  return (error instanceof Error) && (error.name === "AbortError");
}

/**
 * Creates the error used to reject operations cancelled through an AbortSignal.
 * @param message - Optional description of what was aborted.
 * @returns An Error named "AbortError".
 */
export function createAbortError(message = "The operation was aborted."): Error {

  const error = new Error(message);

  error.name = "AbortError";

  return error;
}
