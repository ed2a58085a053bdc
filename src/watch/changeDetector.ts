/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * changeDetector.ts: Single-writer channel state and change notification for ChannelWatch.
 */
import type { ChannelState, NameChange, ObservedName } from "../types/index.js";
import { LOG, formatError, quoteName } from "../utils/index.js";
import type { NotificationSink } from "../notify/types.js";

/*
 * CHANGE DETECTION
 *
 * Both observation loops hand every name they see to apply(). The detector is the only writer of the channel state, and apply() is synchronous, so each
 * read-compare-write runs to completion before any other observation is processed. When the gateway and the poller report within the same instant, the one that
 * arrives last wins.
 *
 * The first observation from either source seeds the state and raises nothing. After that, only a name that differs from the current one raises a notification.
 * Notifications are chained onto one promise so they reach the sink in the order the changes were detected, and a sink failure is logged and goes no further.
 */

/**
 * Observation and notification counts.
 */
export interface ChangeDetectorStats {

  gatewayObservations: number;
  notifications: number;
  pollObservations: number;
}

/**
 * The change detector.
 */
export interface ChangeDetector {

  /**
   * Compares an observation with the current state.
   * @returns True if the observation changed the name and a notification was queued.
   */
  apply(event: ObservedName): boolean;

  /**
   * Stops accepting observations. Notifications that have not started yet are dropped.
   */
  close(): void;

  /**
   * Resolves once every queued notification has settled.
   */
  drain(): Promise<void>;

  getState(): ChannelState;

  getStats(): ChangeDetectorStats;
}

/**
 * Creates a change detector with an unseeded state.
 * @param sink - Where genuine changes are sent.
 * @returns The change detector.
 */
export function createChangeDetector(sink: NotificationSink): ChangeDetector {

  let closed = false;
  let queue: Promise<void> = Promise.resolve();
  let state: ChannelState = { lastUpdated: null, name: null };

  const stats: ChangeDetectorStats = { gatewayObservations: 0, notifications: 0, pollObservations: 0 };

  async function dispatch(change: NameChange): Promise<void> {

    if(closed) {

      LOG.debug("detector", "Skipping notification for %s during shutdown.", quoteName(change.current));

      return;
    }

    try {

      await sink.notify(change);
    } catch(error) {

      LOG.error("Unable to raise the alert for %s: %s.", quoteName(change.current), formatError(error));
    }
  }

  function apply(event: ObservedName): boolean {

    if(closed) {

      return false;
    }

    if(event.source === "gateway") {

      stats.gatewayObservations++;
    } else {

      stats.pollObservations++;
    }

    const previous = state.name;

    if(previous === null) {

      state = { lastUpdated: event.observedAt, name: event.name };

      LOG.info("Initial name: %s (source: %s).", quoteName(event.name), event.source);

      return false;
    }

    if(event.name === previous) {

      LOG.debug("detector", "Name unchanged: %s (source: %s).", quoteName(event.name), event.source);

      return false;
    }

    state = { lastUpdated: event.observedAt, name: event.name };
    stats.notifications++;

    LOG.info("Name change detected: %s -> %s (source: %s).", quoteName(previous), quoteName(event.name), event.source);

    const change: NameChange = { current: event.name, observedAt: event.observedAt, previous, source: event.source };

    queue = queue.then(async () => dispatch(change));

    return true;
  }

  return {

    apply,

    close: (): void => {

      closed = true;
    },

    drain: async (): Promise<void> => queue,

    getState: (): ChannelState => ({ ...state }),

    getStats: (): ChangeDetectorStats => ({ ...stats })
  };
}
