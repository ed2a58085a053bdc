/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * supervisor.ts: Reconnection supervisor for the gateway connection.
 */
import type { BackoffPolicy, BackoffState } from "./backoff.js";
import { ConnectionLostError, LOG, delay, formatError, isAbortError } from "../utils/index.js";
import { initialBackoffState, nextBackoff } from "./backoff.js";
import type { Nullable } from "../types/index.js";

/* The supervisor owns all retry state for the gateway. It runs one connection at a time, and when a connection ends for any reason it waits out the backoff and opens
 * a new one, for as long as the signal allows. The connection itself holds no retry state. It only reports, through markEstablished(), that its handshake completed
 * and how long a heartbeat interval is, which is what the supervisor needs to tell a sustained session from a flapping one.
 */

/**
 * The supervisor's view of one connection attempt.
 */
export interface SupervisedSession {

  // One-based number of this attempt since the last reset.
  readonly attempt: number;

  // Records that the handshake completed. The session counts as sustained once it has lived one heartbeat interval past this point.
  markEstablished(heartbeatInterval: number): void;
}

/**
 * Opens a connection and serves it until it is lost.
 */
export type ConnectFunction = (session: SupervisedSession) => Promise<unknown>;

/**
 * Supervisor options.
 */
export interface SupervisorOptions {

  // Clock used to judge sustained sessions. Defaults to Date.now.
  now?: () => number;

  // Called after each backoff computation.
  onBackoff?: (state: BackoffState) => void;

  policy: BackoffPolicy;
}

/**
 * Runs connect() until the signal aborts, waiting out the backoff between attempts.
 * @param connect - Opens and serves one connection.
 * @param signal - Aborting it ends supervision.
 * @param options - Supervisor options.
 * @returns Promise resolving once the signal aborts.
 */
export async function supervise(connect: ConnectFunction, signal: AbortSignal, options: SupervisorOptions): Promise<void> {

  const log = LOG.withSource("gateway");
  const now = options.now ?? Date.now;

  let state = initialBackoffState(options.policy);

  while(!signal.aborted) {

    const established: { at: Nullable<number>, interval: number } = { at: null, interval: 0 };

    const session: SupervisedSession = {

      attempt: state.attempt + 1,

      markEstablished: (heartbeatInterval: number): void => {

        established.at = now();
        established.interval = heartbeatInterval;
      }
    };

    try {

      await connect(session);
    } catch(error) {

      if(signal.aborted || isAbortError(error)) {

        return;
      }

      // The gateway client has already logged why its connection was lost.
      if(!(error instanceof ConnectionLostError)) {

        log.warn("Gateway connection failed: %s.", formatError(error));
      }
    }

    if(signal.aborted) {

      return;
    }

    const sustained = (established.at !== null) && ((now() - established.at) >= established.interval);

    state = nextBackoff(state, sustained, options.policy);

    options.onBackoff?.(state);

    log.debug("supervisor", "Session %s; backoff is now %sms.", sustained ? "was sustained" : "was not sustained", state.nextDelay);
    log.info("Reconnecting in %sms (attempt %s).", state.nextDelay, state.attempt);

    try {

      await delay(state.nextDelay, signal);
    } catch(error) {

      if(isAbortError(error)) {

        return;
      }

      throw error;
    }
  }
}
