/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * backoff.ts: Reconnection backoff policy for ChannelWatch.
 */
import type { Config } from "../types/index.js";

/**
 * Exponential backoff parameters.
 */
export interface BackoffPolicy {

  // Delay in milliseconds for the first attempt after a reset.
  initialDelay: number;

  // Ceiling in milliseconds.
  maxDelay: number;

  // Growth factor per consecutive failure.
  multiplier: number;
}

/**
 * Backoff bookkeeping carried between connection attempts.
 */
export interface BackoffState {

  // Number of consecutive failures counted so far.
  attempt: number;

  // Delay in milliseconds before the attempt that follows.
  nextDelay: number;
}

/**
 * Builds the backoff policy from the recovery settings.
 * @param config - The application configuration.
 * @returns The policy.
 */
export function backoffPolicyFromConfig(config: Config): BackoffPolicy {

  return {

    initialDelay: config.recovery.initialBackoffDelay,
    maxDelay: config.recovery.maxBackoffDelay,
    multiplier: config.recovery.backoffMultiplier
  };
}

/**
 * Returns the backoff state before any failure.
 * @param policy - The backoff policy.
 * @returns A fresh state.
 */
export function initialBackoffState(policy: BackoffPolicy): BackoffState {

  return { attempt: 0, nextDelay: policy.initialDelay };
}

/**
 * Computes the wait before the next connection attempt. A connection that was sustained resets the counter first, so the wait after it is the initial delay. Each
 * failure in a row multiplies the wait until it reaches the ceiling. There is no jitter.
 * @param state - The state after the previous failure.
 * @param sustained - Whether the connection that just ended stayed up for at least one heartbeat interval after its handshake.
 * @param policy - The backoff policy.
 * @returns The new state. Its nextDelay is the wait to apply now and its attempt is the one-based number of the attempt that follows.
 */
export function nextBackoff(state: BackoffState, sustained: boolean, policy: BackoffPolicy): BackoffState {

  const attempt = sustained ? 0 : state.attempt;
  const delay = Math.min(policy.initialDelay * Math.pow(policy.multiplier, attempt), policy.maxDelay);

  return { attempt: attempt + 1, nextDelay: delay };
}
