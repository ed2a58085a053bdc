/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * gateway.ts: Gateway client, the push half of the watcher.
 */
import { ConnectionLostError, LOG, createAbortError, formatError, isAbortError, quoteName, runWithSourceContext } from "../utils/index.js";
import type { GatewayPayload, IdentifyProperties } from "./protocol.js";
import { GatewayOpcode, buildIdentify, defaultIdentifyProperties, parseGatewayPayload, readChannelUpdate, readGuildCreate, readHeartbeatInterval,
  readReady } from "./protocol.js";
import type { GatewayPhase, Nullable, ObservedNameHandler } from "../types/index.js";
import type { GatewayTransport, GatewayTransportFactory } from "./transport.js";
import type { HeartbeatScheduler } from "./heartbeat.js";
import type { SupervisedSession } from "./supervisor.js";
import { connectWebSocket } from "./transport.js";
import { createHeartbeatScheduler } from "./heartbeat.js";

/*
 * GATEWAY CONNECTION LIFECYCLE
 *
 * One call to run() serves exactly one connection, through these phases:
 *
 *   connecting   Open the transport. Failure to open is a lost connection.
 *   identifying  Wait for Hello, start heartbeats at the announced interval, send Identify, and wait for READY. A close or an invalid session here means the
 *                handshake was rejected. No READY within the handshake timeout is a lost connection as well.
 *   ready        READY arrived. If it already lists the watched channel, its name is reported.
 *   dispatching  Follow dispatches. CHANNEL_UPDATE for the watched channel, and GUILD_CREATE for a guild that contains it, report the name.
 *   terminal     The connection is over and run() has rejected.
 *
 * run() never resolves. It rejects with ConnectionLostError when the connection ends, or with an AbortError when the caller's signal aborts. Reconnecting is the
 * supervisor's job. The sequence number is written only by the message handler and read by the heartbeat scheduler through a getter.
 */

/**
 * Gateway client options.
 */
export interface GatewayClientOptions {

  channelId: string;

  // Opens the transport. Defaults to the ws-backed factory.
  connect?: GatewayTransportFactory;

  // Heartbeat interval in milliseconds when Hello does not announce one.
  defaultHeartbeatInterval: number;

  // Milliseconds allowed from open to READY.
  handshakeTimeout: number;

  // Intents bitfield for Identify. Zero omits the field.
  intents: number;

  // Client properties for Identify.
  properties?: IdentifyProperties;

  // Heartbeat jitter source. Defaults to Math.random.
  random?: () => number;

  token: string;

  url: string;
}

/**
 * Connection state for the status endpoint.
 */
export interface GatewaySnapshot {

  heartbeatInterval: Nullable<number>;
  lastSequence: Nullable<number>;
  phase: GatewayPhase;
  sessionId: Nullable<string>;
}

/**
 * The gateway client.
 */
export interface GatewayClient {

  getSnapshot(): GatewaySnapshot;

  /**
   * Serves one connection. The session, when given, is told when the handshake completes.
   */
  run(onObservedName: ObservedNameHandler, signal: AbortSignal, session?: SupervisedSession): Promise<never>;
}

// WebSocket close code for a normal closure.
const NORMAL_CLOSURE = 1000;

// Close code we use when we abandon a connection we consider dead, so the gateway allows a later resume rather than treating it as a clean logout.
const ABANDONED_CLOSURE = 4000;

/**
 * Creates a gateway client.
 * @param options - Client options.
 * @returns The client.
 */
export function createGatewayClient(options: GatewayClientOptions): GatewayClient {

  const connect = options.connect ?? connectWebSocket;
  const properties = options.properties ?? defaultIdentifyProperties();
  const log = LOG.withSource("gateway");

  let heartbeatInterval: Nullable<number> = null;
  let lastSequence: Nullable<number> = null;
  let phase: GatewayPhase = "terminal";
  let sessionId: Nullable<string> = null;

  function setPhase(next: GatewayPhase): void {

    if(next !== phase) {

      log.debug("gateway", "Phase %s -> %s.", phase, next);
      phase = next;
    }
  }

  function emit(onObservedName: ObservedNameHandler, name: string): void {

    runWithSourceContext({ source: "gateway" }, () => onObservedName({ name, observedAt: new Date(), source: "gateway" }));
  }

  function handleDispatch(payload: GatewayPayload, onObservedName: ObservedNameHandler, onReady: (id: string, channelName: Nullable<string>) => void): void {

    switch(payload.t) {

      case "READY": {

        const ready = readReady(payload.d, options.channelId);

        if(!ready) {

          log.debug("gateway", "Ignoring READY without a session ID.");

          break;
        }

        onReady(ready.sessionId, ready.channelName);

        break;
      }

      case "CHANNEL_UPDATE": {

        const name = readChannelUpdate(payload.d, options.channelId);

        if(name !== null) {

          log.debug("gateway", "CHANNEL_UPDATE carries %s.", quoteName(name));

          emit(onObservedName, name);
        }

        break;
      }

      case "GUILD_CREATE": {

        const name = readGuildCreate(payload.d, options.channelId);

        if(name !== null) {

          emit(onObservedName, name);
        }

        break;
      }

      default: {

        log.debug("gateway", "Ignoring dispatch %s.", payload.t ?? "(unnamed)");

        break;
      }
    }
  }

  async function run(onObservedName: ObservedNameHandler, signal: AbortSignal, session?: SupervisedSession): Promise<never> {

    if(signal.aborted) {

      throw createAbortError();
    }

    heartbeatInterval = null;
    lastSequence = null;
    sessionId = null;

    setPhase("connecting");

    // Opening the transport is bound by the handshake timeout too.
    const connectController = new AbortController();
    const opening = connect(options.url, connectController.signal);
    let rejectOpen: (error: Error) => void = () => undefined;
    const abandoned = new Promise<never>((_resolve, reject) => {

      rejectOpen = reject;
    });

    // Rejects before aborting the connector, so the race settles with this error rather than with the connector's AbortError.
    const abandon = (error: Error): void => {

      rejectOpen(error);
      connectController.abort();

      void opening.then((late) => late.close(ABANDONED_CLOSURE), (openError: unknown) => log.debug("gateway", "Abandoned open failed: %s.", formatError(openError)));
    };

    const onConnectAbort = (): void => abandon(createAbortError());
    const connectTimer = setTimeout(() => abandon(new ConnectionLostError([ "connection timed out after ", String(options.handshakeTimeout), "ms" ].join(""))),
      options.handshakeTimeout);

    signal.addEventListener("abort", onConnectAbort, { once: true });

    let transport: GatewayTransport;

    try {

      transport = await Promise.race([ opening, abandoned ]);
    } catch(error) {

      setPhase("terminal");

      if(isAbortError(error)) {

        throw error;
      }

      const lost = (error instanceof ConnectionLostError) ? error :
        new ConnectionLostError([ "unable to connect (", formatError(error), ")" ].join(""), { cause: error });

      log.warn("%s.", lost.message);

      throw lost;
    } finally {

      clearTimeout(connectTimer);
      signal.removeEventListener("abort", onConnectAbort);
    }

    log.info("Connection established to %s.", options.url);

    setPhase("identifying");

    return new Promise<never>((_resolve, reject) => {

      let heartbeat: Nullable<HeartbeatScheduler> = null;
      let settled = false;

      const finish = (error: Error, closeCode: number): void => {

        if(settled) {

          return;
        }

        settled = true;

        clearTimeout(handshakeTimer);
        heartbeat?.stop();
        signal.removeEventListener("abort", onAbort);

        setPhase("terminal");
        transport.close(closeCode);

        if(error instanceof ConnectionLostError) {

          log.warn("%s.", error.message);
        } else {

          log.info("Gateway connection closed.");
        }

        reject(error);
      };

      const lose = (reason: string): void => finish(new ConnectionLostError(reason), ABANDONED_CLOSURE);

      const onAbort = (): void => finish(createAbortError("The gateway connection was closed for shutdown."), NORMAL_CLOSURE);

      const handshakeTimer = setTimeout(() => lose([ "handshake timed out after ", String(options.handshakeTimeout), "ms" ].join("")), options.handshakeTimeout);

      const onReady = (id: string, channelName: Nullable<string>): void => {

        clearTimeout(handshakeTimer);

        sessionId = id;

        setPhase("ready");

        log.info("Handshake accepted: session %s ready.", id);

        session?.markEstablished(heartbeatInterval ?? options.defaultHeartbeatInterval);

        if(channelName !== null) {

          emit(onObservedName, channelName);
        }

        setPhase("dispatching");
      };

      signal.addEventListener("abort", onAbort, { once: true });

      if(signal.aborted) {

        onAbort();

        return;
      }

      transport.onClose((code: number, reason: string) => {

        const detail = [ "code ", String(code), reason ? [ ": ", reason ].join("") : "" ].join("");

        lose((phase === "identifying") ? [ "handshake rejected (", detail, ")" ].join("") : [ "closed by remote (", detail, ")" ].join(""));
      });

      transport.onMessage((raw: string) => {

        if(settled) {

          return;
        }

        const payload = parseGatewayPayload(raw);

        if(!payload) {

          log.debug("gateway:frames", "Ignoring unparseable frame.");

          return;
        }

        log.debug("gateway:frames", "Received op %s%s (sequence %s).", payload.op, payload.t ? [ " ", payload.t ].join("") : "", payload.s ?? "none");

        if(payload.s !== null) {

          lastSequence = payload.s;
        }

        switch(payload.op) {

          case GatewayOpcode.HELLO: {

            if(heartbeat) {

              log.debug("gateway", "Ignoring repeated Hello.");

              break;
            }

            heartbeatInterval = readHeartbeatInterval(payload.d) ?? options.defaultHeartbeatInterval;

            heartbeat = createHeartbeatScheduler({

              getSequence: () => lastSequence,
              interval: heartbeatInterval,
              onTimeout: () => lose("heartbeat acknowledgement missed"),
              random: options.random,
              send: (frame: string) => transport.send(frame)
            });

            heartbeat.start();

            transport.send(buildIdentify(options.token, options.intents, properties));

            break;
          }

          case GatewayOpcode.HEARTBEAT_ACK: {

            heartbeat?.ack();

            log.info("Heartbeat acknowledged (sequence %s).", lastSequence ?? "none");

            break;
          }

          case GatewayOpcode.HEARTBEAT: {

            heartbeat?.beatNow();

            break;
          }

          case GatewayOpcode.RECONNECT: {

            lose("remote requested a reconnect");

            break;
          }

          case GatewayOpcode.INVALID_SESSION: {

            lose((phase === "identifying") ? "handshake rejected (invalid session)" : "session invalidated");

            break;
          }

          case GatewayOpcode.DISPATCH: {

            handleDispatch(payload, onObservedName, onReady);

            break;
          }

          default: {

            log.debug("gateway", "Ignoring op %s.", payload.op);

            break;
          }
        }
      });
    });
  }

  return {

    getSnapshot: (): GatewaySnapshot => ({ heartbeatInterval, lastSequence, phase, sessionId }),

    run
  };
}
