/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * poller.ts: Fixed-interval REST poller for ChannelWatch.
 */
import { FetchFailedError, LOG, delay, formatError, isAbortError, quoteName, runWithSourceContext, startTimer } from "../utils/index.js";
import type { Nullable, ObservedNameHandler } from "../types/index.js";
import { fetchChannel } from "./rest.js";

/* The poller is the pull half of the watcher. It ticks on a fixed grid anchored at the moment it starts: tick k is due at start + k * interval. A slow or failed fetch
 * never moves the grid. If a fetch runs past one or more slots, those slots are skipped and the next tick lands on the first slot still in the future. Every
 * successful tick reports the name it saw, changed or not; the change detector decides what is news. Failures are logged and the next tick simply tries again.
 */

/**
 * Poller options.
 */
export interface PollClientOptions {

  apiBase: string;
  channelId: string;

  // Milliseconds between ticks.
  interval: number;

  // Per-request timeout in milliseconds.
  requestTimeout: number;

  token: string;
}

/**
 * Poller state for the status endpoint.
 */
export interface PollSnapshot {

  consecutiveFailures: number;
  lastSuccess: Nullable<Date>;
}

/**
 * The REST poller.
 */
export interface PollClient {

  getSnapshot(): PollSnapshot;

  /**
   * Polls until the signal aborts.
   */
  run(onObservedName: ObservedNameHandler, signal: AbortSignal): Promise<void>;
}

/**
 * Creates a poller.
 * @param options - Poller options.
 * @returns The poller.
 */
export function createPollClient(options: PollClientOptions): PollClient {

  let consecutiveFailures = 0;
  let lastSuccess: Nullable<Date> = null;

  async function tick(onObservedName: ObservedNameHandler, signal: AbortSignal): Promise<void> {

    const elapsed = startTimer();

    try {

      const channel = await fetchChannel({ apiBase: options.apiBase, channelId: options.channelId, signal, timeout: options.requestTimeout, token: options.token });

      LOG.debug("poll", "Channel fetched in %sms.", elapsed());

      consecutiveFailures = 0;
      lastSuccess = new Date();

      if(channel.name === null) {

        LOG.debug("poll", "Channel %s has no name.", options.channelId);

        return;
      }

      LOG.info("Poll cycle executed: %s.", quoteName(channel.name));

      onObservedName({ name: channel.name, observedAt: lastSuccess, source: "poll" });
    } catch(error) {

      if(signal.aborted || isAbortError(error)) {

        return;
      }

      consecutiveFailures++;

      if(error instanceof FetchFailedError) {

        LOG.warn("Poll failed (%s in a row): %s.", consecutiveFailures, formatError(error));

        return;
      }

      throw error;
    }
  }

  async function run(onObservedName: ObservedNameHandler, signal: AbortSignal): Promise<void> {

    await runWithSourceContext({ source: "poll" }, async () => {

      const start = Date.now();

      for(let slot = 0; !signal.aborted; slot++) {

        const now = Date.now();
        let due = start + (slot * options.interval);

        if(due < now) {

          const next = Math.ceil((now - start) / options.interval);

          LOG.debug("poll", "Skipping %s missed slot(s).", next - slot);

          slot = next;
          due = start + (slot * options.interval);
        }

        try {

          await delay(due - now, signal);
        } catch(error) {

          if(isAbortError(error)) {

            return;
          }

          throw error;
        }

        await tick(onObservedName, signal);
      }
    });
  }

  return {

    getSnapshot: (): PollSnapshot => ({ consecutiveFailures, lastSuccess }),

    run
  };
}
