/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * heartbeat.ts: Gateway heartbeat scheduling for ChannelWatch.
 */
import type { Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";
import { buildHeartbeat } from "./protocol.js";

/* The gateway expects a heartbeat every interval and acknowledges each one. The first beat is jittered to a random point within the first interval so that many
 * clients reconnecting together do not beat in lockstep. If an interval elapses and the previous beat is still unacknowledged, the connection is presumed dead: the
 * scheduler reports the timeout once and sends nothing further.
 *
 *   idle ──tick──▶ awaitingAck ──ack──▶ idle
 *                       │
 *                     tick
 *                       ▼
 *                   timedOut
 */

export type HeartbeatState = "awaitingAck" | "idle" | "timedOut";

/**
 * Outcome of a timer tick.
 */
export interface HeartbeatTickResult {

  next: HeartbeatState;

  // Whether a heartbeat frame must be sent.
  send: boolean;
}

/**
 * Advances the state machine when the heartbeat timer fires.
 * @param state - The current state.
 * @returns The next state and whether to send a heartbeat.
 */
export function heartbeatTick(state: HeartbeatState): HeartbeatTickResult {

  switch(state) {

    case "idle": {

      return { next: "awaitingAck", send: true };
    }

    default: {

      return { next: "timedOut", send: false };
    }
  }
}

/**
 * Advances the state machine when an acknowledgement arrives. Acknowledgements outside awaitingAck change nothing.
 * @param state - The current state.
 * @returns The next state.
 */
export function heartbeatAck(state: HeartbeatState): HeartbeatState {

  return (state === "awaitingAck") ? "idle" : state;
}

/**
 * Options for a heartbeat scheduler.
 */
export interface HeartbeatOptions {

  // Reads the last sequence number the connection has seen.
  getSequence: () => Nullable<number>;

  // Heartbeat interval in milliseconds.
  interval: number;

  // Called once when an acknowledgement is missed.
  onTimeout: () => void;

  // Source of jitter in [0, 1). Defaults to Math.random.
  random?: () => number;

  // Writes a frame to the connection.
  send: (frame: string) => void;
}

/**
 * A heartbeat scheduler bound to one connection.
 */
export interface HeartbeatScheduler {

  // Records an acknowledgement (op 11).
  ack(): void;

  // Sends a heartbeat immediately without moving the timer (op 1).
  beatNow(): void;

  getState(): HeartbeatState;

  start(): void;

  stop(): void;
}

/**
 * Creates a heartbeat scheduler.
 * @param options - Scheduler options.
 * @returns The scheduler, not yet started.
 */
export function createHeartbeatScheduler(options: HeartbeatOptions): HeartbeatScheduler {

  const random = options.random ?? Math.random;

  let state: HeartbeatState = "idle";
  let stopped = false;
  let timer: Nullable<ReturnType<typeof setTimeout>> = null;

  function sendBeat(): void {

    const sequence = options.getSequence();

    LOG.debug("heartbeat", "Sending heartbeat (sequence %s).", sequence ?? "none");

    options.send(buildHeartbeat(sequence));
  }

  function stop(): void {

    stopped = true;

    if(timer) {

      clearTimeout(timer);
      timer = null;
    }
  }

  function tick(): void {

    if(stopped) {

      return;
    }

    const result = heartbeatTick(state);

    LOG.debug("heartbeat", "Heartbeat state %s -> %s.", state, result.next);

    state = result.next;

    if(result.send) {

      sendBeat();

      return;
    }

    stop();
    options.onTimeout();
  }

  return {

    ack: (): void => {

      state = heartbeatAck(state);
    },

    beatNow: (): void => {

      if(!stopped) {

        sendBeat();
      }
    },

    getState: (): HeartbeatState => state,

    start: (): void => {

      if(stopped || timer) {

        return;
      }

      const jitter = Math.floor(options.interval * random());

      LOG.debug("heartbeat", "First heartbeat in %sms, then every %sms.", jitter, options.interval);

      timer = setTimeout(() => {

        timer = setInterval(tick, options.interval);

        tick();
      }, jitter);
    },

    stop
  };
}
