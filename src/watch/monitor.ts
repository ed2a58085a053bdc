/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * monitor.ts: Wires the change detector, gateway client and poller into one monitor.
 */
import { ConfigError, FetchFailedError, LOG, formatError, getPackageVersion, quoteName, runWithSourceContext } from "../utils/index.js";
import type { Config, HealthStatus, MonitorStatus, Nullable, ObservedName } from "../types/index.js";
import { backoffPolicyFromConfig } from "./backoff.js";
import { createChangeDetector } from "./changeDetector.js";
import { createGatewayClient } from "./gateway.js";
import { createPollClient } from "./poller.js";
import { fetchChannel } from "./rest.js";
import type { GatewayTransportFactory } from "./transport.js";
import type { NotificationSink } from "../notify/types.js";
import { supervise } from "./supervisor.js";

/*
 * MONITOR
 *
 * The monitor owns one change detector and runs two independent tasks that feed it: the supervised gateway connection and the poller. Neither task waits on or
 * restarts the other, so an outage of one channel leaves the other watching. Both tasks share one AbortController, which stop() uses to end them together.
 *
 * Before either task starts, one REST fetch seeds the state. Its answer is the one place where a remote error is fatal: 401 and 403 mean the credential is wrong,
 * 404 means the channel does not exist, and neither will fix itself by retrying.
 */

// HTTP statuses that mean the configured credential or channel ID can never work.
const FATAL_SEED_STATUSES = new Set([ 401, 403, 404 ]);

/**
 * Monitor options.
 */
export interface MonitorOptions {

  config: Config;

  // Gateway transport factory. Defaults to the ws-backed factory.
  connect?: GatewayTransportFactory;

  // Heartbeat jitter source. Defaults to Math.random.
  random?: () => number;

  sink: NotificationSink;
}

/**
 * A running monitor.
 */
export interface MonitorHandle {

  // Settles once both tasks have ended.
  done: Promise<void>;

  getHealth(): HealthStatus;

  getStatus(): MonitorStatus;

  // Ends both tasks and silences the alarm. Idempotent.
  stop(): Promise<void>;
}

/**
 * Performs the initial seed fetch.
 * @param config - The application configuration.
 * @param apply - Hands the seeded name to the change detector.
 */
async function seedInitialName(config: Config, apply: (event: ObservedName) => void): Promise<void> {

  try {

    const channel = await fetchChannel({

      apiBase: config.poll.apiBase,
      channelId: config.watch.channelId,
      timeout: config.poll.requestTimeout,
      token: config.watch.token
    });

    const name = channel.name;

    if(name === null) {

      LOG.warn("Channel %s has no name. Watching for one to be set.", config.watch.channelId);

      return;
    }

    runWithSourceContext({ source: "poll" }, () => apply({ name, observedAt: new Date(), source: "poll" }));
  } catch(error) {

    if((error instanceof FetchFailedError) && (error.status !== undefined) && FATAL_SEED_STATUSES.has(error.status)) {

      throw new ConfigError((error.status === 404) ? [ "Channel ", config.watch.channelId, " was not found (HTTP 404)." ].join("") :
        [ "The credential was rejected (HTTP ", String(error.status), ")." ].join(""));
    }

    LOG.warn("Initial channel fetch failed: %s. Monitoring starts anyway.", formatError(error));
  }
}

/**
 * Seeds the channel state and starts both observation loops.
 * @param options - Monitor options.
 * @returns The running monitor.
 * @throws ConfigError when the credential is rejected or the channel does not exist.
 */
export async function startMonitor(options: MonitorOptions): Promise<MonitorHandle> {

  const { config, sink } = options;
  const startedAt = Date.now();
  const detector = createChangeDetector(sink);
  const onObservedName = (event: ObservedName): void => {

    detector.apply(event);
  };

  await seedInitialName(config, onObservedName);

  const controller = new AbortController();

  const gateway = createGatewayClient({

    channelId: config.watch.channelId,
    connect: options.connect,
    defaultHeartbeatInterval: config.gateway.defaultHeartbeatInterval,
    handshakeTimeout: config.gateway.handshakeTimeout,
    intents: config.gateway.intents,
    random: options.random,
    token: config.watch.token,
    url: config.gateway.url
  });

  const poller = createPollClient({

    apiBase: config.poll.apiBase,
    channelId: config.watch.channelId,
    interval: config.poll.interval,
    requestTimeout: config.poll.requestTimeout,
    token: config.watch.token
  });

  let reconnectAttempt = 0;

  const gatewayTask = supervise(async (session) => gateway.run(onObservedName, controller.signal, session), controller.signal, {

    onBackoff: (state) => {

      reconnectAttempt = state.attempt;
    },

    policy: backoffPolicyFromConfig(config)
  });

  const pollTask = poller.run(onObservedName, controller.signal);

  const done = Promise.all([ gatewayTask, pollTask ]).then(() => undefined);

  LOG.info("Watching channel %s (current name %s).", config.watch.channelId, quoteName(detector.getState().name));

  let stopping: Nullable<Promise<void>> = null;

  function getStatus(): MonitorStatus {

    const channel = detector.getState();
    const gatewaySnapshot = gateway.getSnapshot();
    const pollSnapshot = poller.getSnapshot();
    const stats = detector.getStats();

    return {

      channel: { id: config.watch.channelId, lastUpdated: channel.lastUpdated?.toISOString() ?? null, name: channel.name },
      gateway: { ...gatewaySnapshot, reconnectAttempt },
      poll: { consecutiveFailures: pollSnapshot.consecutiveFailures, interval: config.poll.interval, lastSuccess: pollSnapshot.lastSuccess?.toISOString() ?? null },
      stats,
      uptime: Date.now() - startedAt
    };
  }

  function getHealth(): HealthStatus {

    const now = Date.now();
    const phase = gateway.getSnapshot().phase;
    const lastSuccess = poller.getSnapshot().lastSuccess;
    const pollAge = lastSuccess ? (now - lastSuccess.getTime()) : null;
    const gatewayHealthy = (phase === "ready") || (phase === "dispatching");
    const pollHealthy = (pollAge !== null) && (pollAge <= (config.poll.interval * 3));

    const health: HealthStatus = {

      gateway: phase,
      pollAge,
      status: "healthy",
      timestamp: new Date(now).toISOString(),
      uptime: now - startedAt,
      version: getPackageVersion()
    };

    if(!gatewayHealthy && !pollHealthy) {

      health.status = "unhealthy";
      health.message = "Neither the gateway nor the poller is delivering observations.";
    } else if(!gatewayHealthy) {

      health.status = "degraded";
      health.message = "The gateway session is down. Polling continues.";
    } else if(!pollHealthy) {

      health.status = "degraded";
      health.message = "Polling has not succeeded recently. The gateway session is up.";
    }

    return health;
  }

  async function stop(): Promise<void> {

    stopping ??= (async (): Promise<void> => {

      LOG.info("Stopping the monitor.");

      controller.abort();
      sink.stopAlarm();
      detector.close();

      try {

        await done;
      } catch(error) {

        LOG.error("Monitoring task failed during shutdown: %s.", formatError(error));
      }

      await detector.drain();

      LOG.info("Shutdown complete.");
    })();

    return stopping;
  }

  return { done, getHealth, getStatus, stop };
}
