/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * gateway.test.ts: Tests for the gateway client against an in-process transport.
 */
import { ConnectionLostError, subscribeToLogs } from "../utils/index.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeConnector, createFakeTransport, flushMicrotasks } from "../test/fakeTransport.js";
import type { FakeTransport } from "../test/fakeTransport.js";
import type { GatewayClientOptions } from "./gateway.js";
import type { GatewayTransport } from "./transport.js";
import type { ObservedName } from "../types/index.js";
import { createGatewayClient } from "./gateway.js";

const CHANNEL_ID = "1234567890";
const GATEWAY_URL = "wss://gateway.test/?v=10&encoding=json";

const PROPERTIES = { browser: "channelwatch", device: "channelwatch", os: "linux" };

function clientOptions(transport: FakeTransport, overrides: Partial<GatewayClientOptions> = {}): GatewayClientOptions {

  return {

    channelId: CHANNEL_ID,
    connect: createFakeConnector(transport).connect,
    defaultHeartbeatInterval: 41250,
    handshakeTimeout: 15000,
    intents: 1,
    properties: PROPERTIES,
    random: () => 0.5,
    token: "test-secret",
    url: GATEWAY_URL,
    ...overrides
  };
}

function ready(sequence: number, name?: string): Record<string, unknown> {

  const guilds = (name === undefined) ? [] : [ { channels: [ { id: CHANNEL_ID, name } ], id: "1" } ];

  return { d: { guilds, session_id: "session-1" }, op: 0, s: sequence, t: "READY" };
}

describe("createGatewayClient", () => {

  let messages: string[];
  let unsubscribe: () => void;

  beforeEach(() => {

    vi.useFakeTimers();

    messages = [];
    unsubscribe = subscribeToLogs((entry) => messages.push(entry.message));
  });

  afterEach(() => {

    unsubscribe();
    vi.useRealTimers();
  });

  it("identifies after Hello, reports names from READY and CHANNEL_UPDATE, and heartbeats with the last sequence", async () => {

    const transport = createFakeTransport();
    const client = createGatewayClient(clientOptions(transport));
    const controller = new AbortController();
    const events: ObservedName[] = [];
    const markEstablished = vi.fn();

    const result = client.run((event) => events.push(event), controller.signal, { attempt: 1, markEstablished }).catch((e: unknown) => e);

    await flushMicrotasks();

    expect(client.getSnapshot().phase).toBe("identifying");

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10, s: null, t: null });

    expect(transport.sent).toEqual([ { d: { intents: 1, properties: PROPERTIES, token: "test-secret" }, op: 2 } ]);

    transport.receive(ready(1, "general"));

    expect(markEstablished).toHaveBeenCalledWith(1000);
    expect(client.getSnapshot()).toEqual({ heartbeatInterval: 1000, lastSequence: 1, phase: "dispatching", sessionId: "session-1" });

    transport.receive({ d: { id: "999", name: "elsewhere" }, op: 0, s: 2, t: "CHANNEL_UPDATE" });
    transport.receive({ d: { id: CHANNEL_ID, name: "general-renamed" }, op: 0, s: 3, t: "CHANNEL_UPDATE" });

    expect(events.map((event) => [ event.name, event.source ])).toEqual([ [ "general", "gateway" ], [ "general-renamed", "gateway" ] ]);

    // The first beat is jittered to half the interval.
    vi.advanceTimersByTime(500);

    expect(transport.sent[1]).toEqual({ d: 3, op: 1 });

    transport.receive({ op: 11 });

    controller.abort();

    const error = await result;

    expect(error).toMatchObject({ name: "AbortError" });
    expect(transport.closedWith).toBe(1000);
    expect(client.getSnapshot().phase).toBe("terminal");

    expect(messages).toEqual([

      "[gateway] Connection established to wss://gateway.test/?v=10&encoding=json.",
      "[gateway] Handshake accepted: session session-1 ready.",
      "[gateway] Heartbeat acknowledged (sequence 3).",
      "[gateway] Gateway connection closed."
    ]);
  });

  it("reports a name carried by GUILD_CREATE", async () => {

    const transport = createFakeTransport();
    const client = createGatewayClient(clientOptions(transport));
    const controller = new AbortController();
    const events: ObservedName[] = [];
    const result = client.run((event) => events.push(event), controller.signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    transport.receive(ready(1));
    transport.receive({ d: { channels: [ { id: CHANNEL_ID, name: "general" } ], id: "1" }, op: 0, s: 2, t: "GUILD_CREATE" });

    expect(events.map((event) => event.name)).toEqual([ "general" ]);

    controller.abort();

    await result;
  });

  it("omits intents when they are zero", async () => {

    const transport = createFakeTransport();
    const controller = new AbortController();
    const result = createGatewayClient(clientOptions(transport, { intents: 0 })).run(() => undefined, controller.signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10 });

    expect(transport.sent).toEqual([ { d: { properties: PROPERTIES, token: "test-secret" }, op: 2 } ]);

    controller.abort();

    await result;
  });

  it("fails the handshake when READY does not arrive in time", async () => {

    const transport = createFakeTransport();
    const client = createGatewayClient(clientOptions(transport, { handshakeTimeout: 5000 }));
    const result = client.run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await flushMicrotasks();

    vi.advanceTimersByTime(4999);

    expect(transport.closedWith).toBeNull();

    vi.advanceTimersByTime(1);

    const error = await result;

    expect(error).toBeInstanceOf(ConnectionLostError);
    expect(error).toMatchObject({ reason: "handshake timed out after 5000ms" });
    expect(transport.closedWith).toBe(4000);
    expect(messages).toContain("[gateway] Connection lost: handshake timed out after 5000ms.");
  });

  it("treats a close during the handshake as a rejection", async () => {

    const transport = createFakeTransport();
    const result = createGatewayClient(clientOptions(transport)).run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    transport.remoteClose(4004, "Authentication failed.");

    expect(await result).toMatchObject({ reason: "handshake rejected (code 4004: Authentication failed.)" });
  });

  it("reports a remote close after READY as a lost connection", async () => {

    const transport = createFakeTransport();
    const result = createGatewayClient(clientOptions(transport)).run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    transport.receive(ready(1));
    transport.remoteClose(1006);

    expect(await result).toMatchObject({ reason: "closed by remote (code 1006)" });
  });

  it("ends the connection when the remote requests a reconnect", async () => {

    const transport = createFakeTransport();
    const result = createGatewayClient(clientOptions(transport)).run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    transport.receive(ready(1));
    transport.receive({ d: null, op: 7 });

    const error = await result;

    expect(error).toBeInstanceOf(ConnectionLostError);
    expect(error).toMatchObject({ reason: "remote requested a reconnect" });
    expect(transport.closedWith).toBe(4000);
  });

  it("distinguishes an invalid session during the handshake from one after it", async () => {

    const early = createFakeTransport();
    const earlyResult = createGatewayClient(clientOptions(early)).run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await flushMicrotasks();

    early.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    early.receive({ d: false, op: 9 });

    expect(await earlyResult).toMatchObject({ reason: "handshake rejected (invalid session)" });

    const late = createFakeTransport();
    const lateResult = createGatewayClient(clientOptions(late)).run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await flushMicrotasks();

    late.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    late.receive(ready(1));
    late.receive({ d: false, op: 9 });

    expect(await lateResult).toMatchObject({ reason: "session invalidated" });
  });

  it("declares the connection dead when a heartbeat goes unacknowledged", async () => {

    const transport = createFakeTransport();
    const result = createGatewayClient(clientOptions(transport, { random: () => 0 })).run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    transport.receive(ready(1));

    vi.advanceTimersByTime(0);

    expect(transport.sent[1]).toEqual({ d: 1, op: 1 });

    vi.advanceTimersByTime(1000);

    expect(await result).toMatchObject({ reason: "heartbeat acknowledgement missed" });
    expect(transport.sent).toHaveLength(2);
  });

  it("answers a heartbeat request immediately", async () => {

    const transport = createFakeTransport();
    const controller = new AbortController();
    const result = createGatewayClient(clientOptions(transport)).run(() => undefined, controller.signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: { heartbeat_interval: 1000 }, op: 10 });
    transport.receive(ready(4));
    transport.receive({ d: null, op: 1 });

    expect(transport.sent[1]).toEqual({ d: 4, op: 1 });

    controller.abort();

    await result;
  });

  it("falls back to the default heartbeat interval when Hello has none", async () => {

    const transport = createFakeTransport();
    const client = createGatewayClient(clientOptions(transport));
    const controller = new AbortController();
    const result = client.run(() => undefined, controller.signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ d: {}, op: 10 });

    expect(client.getSnapshot().heartbeatInterval).toBe(41250);

    controller.abort();

    await result;
  });

  it("reports a transport that cannot be opened as a lost connection", async () => {

    const client = createGatewayClient({ ...clientOptions(createFakeTransport()), connect: createFakeConnector().connect });
    const error = await client.run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionLostError);
    expect(error).toMatchObject({ reason: "unable to connect (connect ECONNREFUSED)" });
    expect(client.getSnapshot().phase).toBe("terminal");
  });

  it("gives up on a transport that never finishes opening", async () => {

    const signals: AbortSignal[] = [];
    const transport = createFakeTransport();
    let openLate: (opened: GatewayTransport) => void = () => undefined;

    const connect = async (_url: string, signal: AbortSignal): Promise<GatewayTransport> => {

      signals.push(signal);

      return new Promise<GatewayTransport>((resolve) => {

        openLate = resolve;
      });
    };

    const client = createGatewayClient(clientOptions(transport, { connect, handshakeTimeout: 200 }));
    const result = client.run(() => undefined, new AbortController().signal).catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(199);

    expect(client.getSnapshot().phase).toBe("connecting");

    await vi.advanceTimersByTimeAsync(1);

    const error = await result;

    expect(error).toBeInstanceOf(ConnectionLostError);
    expect(error).toMatchObject({ reason: "connection timed out after 200ms" });
    expect(client.getSnapshot().phase).toBe("terminal");
    expect(signals[0].aborted).toBe(true);
    expect(messages).toEqual([ "[gateway] Connection lost: connection timed out after 200ms." ]);

    // A connection that opens after the deadline is closed straight away.
    openLate(transport);
    await flushMicrotasks();

    expect(transport.closedWith).toBe(4000);
  });

  it("stops waiting for the transport when the caller aborts", async () => {

    const client = createGatewayClient(clientOptions(createFakeTransport(), { connect: async () => new Promise<GatewayTransport>(() => undefined) }));
    const controller = new AbortController();
    const result = client.run(() => undefined, controller.signal).catch((e: unknown) => e);

    await flushMicrotasks();

    controller.abort();

    const error = await result;

    expect(error).toMatchObject({ name: "AbortError" });
    expect(client.getSnapshot().phase).toBe("terminal");
    expect(messages).toEqual([]);
  });

  it("ignores frames that are not gateway payloads", async () => {

    const transport = createFakeTransport();
    const client = createGatewayClient(clientOptions(transport));
    const controller = new AbortController();
    const result = client.run(() => undefined, controller.signal).catch((e: unknown) => e);

    await flushMicrotasks();

    transport.receive({ hello: "world" });

    expect(client.getSnapshot().phase).toBe("identifying");

    controller.abort();

    await result;
  });
});
