/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * transport.ts: WebSocket transport for the gateway client.
 */
import { LOG, createAbortError, formatError, getUserAgent } from "../utils/index.js";
import WebSocket from "ws";

/**
 * A bidirectional text-frame connection to the gateway.
 */
export interface GatewayTransport {

  // Closes the connection. Safe to call more than once, and after the remote has closed.
  close(code: number, reason?: string): void;

  // Registers the listener for the end of the connection. Called at most once.
  onClose(listener: (code: number, reason: string) => void): void;

  // Registers the listener for inbound text frames.
  onMessage(listener: (data: string) => void): void;

  send(data: string): void;
}

/**
 * Opens a transport. Resolves once the connection is open, rejects if it cannot be opened, and rejects with an AbortError if the signal aborts first.
 */
export type GatewayTransportFactory = (url: string, signal: AbortSignal) => Promise<GatewayTransport>;

/**
 * Decodes a ws message into text.
 * @param data - The raw message data.
 * @returns The UTF-8 text.
 */
function rawDataToString(data: WebSocket.RawData): string {

  if(Array.isArray(data)) {

    return Buffer.concat(data).toString("utf8");
  }

  if(data instanceof ArrayBuffer) {

    return Buffer.from(data).toString("utf8");
  }

  return data.toString("utf8");
}

/**
 * Wraps an open socket as a transport.
 * @param socket - The open socket.
 * @returns The transport.
 */
function wrapSocket(socket: WebSocket): GatewayTransport {

  // An unhandled "error" event would crash the process. Errors are always followed by "close", which is where the connection is reported lost.
  socket.on("error", (error: Error) => {

    LOG.debug("gateway", "Socket error: %s.", formatError(error));
  });

  return {

    close: (code: number, reason?: string): void => {

      if((socket.readyState === WebSocket.CLOSING) || (socket.readyState === WebSocket.CLOSED)) {

        return;
      }

      socket.close(code, reason);
    },

    onClose: (listener: (code: number, reason: string) => void): void => {

      socket.once("close", (code: number, reason: Buffer) => listener(code, reason.toString("utf8")));
    },

    onMessage: (listener: (data: string) => void): void => {

      socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {

        if(isBinary) {

          LOG.debug("gateway:frames", "Ignoring binary frame.");

          return;
        }

        listener(rawDataToString(data));
      });
    },

    send: (data: string): void => {

      if(socket.readyState === WebSocket.OPEN) {

        socket.send(data);
      }
    }
  };
}

/**
 * Opens a gateway connection with the ws library.
 * @param url - The gateway URL.
 * @param signal - Aborting it cancels the open.
 * @returns Promise resolving to the open transport.
 */
export const connectWebSocket: GatewayTransportFactory = async (url: string, signal: AbortSignal): Promise<GatewayTransport> => {

  if(signal.aborted) {

    throw createAbortError();
  }

  return new Promise((resolve, reject) => {

    const socket = new WebSocket(url, { headers: { "User-Agent": getUserAgent() } });

    const onAbort = (): void => {

      socket.removeAllListeners();
      socket.on("error", () => LOG.debug("gateway", "Socket error after abort."));
      socket.terminate();

      reject(createAbortError());
    };

    signal.addEventListener("abort", onAbort, { once: true });

    socket.once("open", () => {

      signal.removeEventListener("abort", onAbort);
      socket.removeAllListeners("error");

      resolve(wrapSocket(socket));
    });

    socket.once("error", (error: Error) => {

      signal.removeEventListener("abort", onAbort);

      reject(error);
    });
  });
};
