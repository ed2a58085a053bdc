/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fakeTransport.ts: In-process gateway transport for tests.
 */
import type { GatewayTransport, GatewayTransportFactory } from "../watch/transport.js";
import type { Nullable } from "../types/index.js";

/**
 * A gateway transport driven by the test. Frames the client sends are recorded, and the test plays the remote side.
 */
export interface FakeTransport extends GatewayTransport {

  // Close code the client used, or null while the transport is open.
  closedWith: Nullable<number>;

  // Delivers a frame from the remote side.
  receive(frame: Record<string, unknown>): void;

  // Closes the connection from the remote side.
  remoteClose(code: number, reason?: string): void;

  // Frames the client sent, decoded.
  sent: unknown[];
}

/**
 * Creates a fake transport.
 * @returns The transport.
 */
export function createFakeTransport(): FakeTransport {

  let closeListener: Nullable<(code: number, reason: string) => void> = null;
  let messageListener: Nullable<(data: string) => void> = null;

  const transport: FakeTransport = {

    close: (code: number): void => {

      transport.closedWith ??= code;
    },

    closedWith: null,

    onClose: (listener): void => {

      closeListener = listener;
    },

    onMessage: (listener): void => {

      messageListener = listener;
    },

    receive: (frame: Record<string, unknown>): void => {

      messageListener?.(JSON.stringify(frame));
    },

    remoteClose: (code: number, reason = ""): void => {

      const listener = closeListener;

      closeListener = null;
      listener?.(code, reason);
    },

    send: (data: string): void => {

      transport.sent.push(JSON.parse(data));
    },

    sent: []
  };

  return transport;
}

/**
 * Creates a transport factory that hands out the given transports in order, and fails once they run out.
 * @param transports - The transports to hand out.
 * @returns The factory and the URLs it was asked to open.
 */
export function createFakeConnector(...transports: FakeTransport[]): { connect: GatewayTransportFactory, urls: string[] } {

  const queue = [ ...transports ];
  const urls: string[] = [];

  const connect: GatewayTransportFactory = async (url: string): Promise<GatewayTransport> => {

    urls.push(url);

    const next = queue.shift();

    if(!next) {

      return Promise.reject(new Error("connect ECONNREFUSED"));
    }

    return Promise.resolve(next);
  };

  return { connect, urls };
}

/**
 * Lets pending promise callbacks run.
 */
export async function flushMicrotasks(): Promise<void> {

  for(let i = 0; i < 10; i++) {

    // eslint-disable-next-line no-await-in-loop
    await Promise.resolve();
  }
}
