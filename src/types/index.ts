/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for ChannelWatch.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from defaults, the user config file, and environment variables, and are validated at startup before any monitoring task begins.
 */

/**
 * The watched channel and the credential used to observe it.
 */
export interface WatchConfig {

  // Snowflake ID of the channel whose name is watched. Environment variable: CHANNEL_ID.
  channelId: string;

  // Static credential presented to both the gateway (Identify) and the REST API (Authorization header). Environment variable: DISCORD_TOKEN.
  token: string;
}

/**
 * Push channel settings.
 */
export interface GatewayConfig {

  // Heartbeat interval in milliseconds used when the gateway's Hello does not announce one. Environment variable: GATEWAY_HEARTBEAT_INTERVAL. Default: 41250ms.
  defaultHeartbeatInterval: number;

  // Time in milliseconds allowed between opening the socket and receiving READY. Environment variable: GATEWAY_HANDSHAKE_TIMEOUT. Default: 15000ms.
  handshakeTimeout: number;

  // Gateway intents bitfield sent with Identify. GUILDS (1) carries CHANNEL_UPDATE. Zero omits the field. Environment variable: GATEWAY_INTENTS. Default: 1.
  intents: number;

  // WebSocket URL of the gateway. Environment variable: GATEWAY_URL.
  url: string;
}

/**
 * Pull channel settings.
 */
export interface PollConfig {

  // Base URL of the REST API, without a trailing slash. Environment variable: API_BASE.
  apiBase: string;

  // Fixed interval in milliseconds between poll ticks. Environment variable: POLL_INTERVAL. Default: 1500ms.
  interval: number;

  // Timeout in milliseconds for a single poll request. Environment variable: POLL_REQUEST_TIMEOUT. Default: 5000ms.
  requestTimeout: number;
}

/**
 * Reconnection backoff settings for the push channel.
 */
export interface RecoveryConfig {

  // Multiplier applied to the delay for every consecutive failed connection. Environment variable: BACKOFF_MULTIPLIER. Default: 2.
  backoffMultiplier: number;

  // Delay in milliseconds before the first reconnection attempt. Environment variable: INITIAL_BACKOFF_DELAY. Default: 1000ms.
  initialBackoffDelay: number;

  // Ceiling in milliseconds for the reconnection delay. Environment variable: MAX_BACKOFF_DELAY. Default: 60000ms.
  maxBackoffDelay: number;
}

/**
 * Alert settings.
 */
export interface NotifyConfig {

  // Number of times the alarm sound plays for a single change. Environment variable: ALARM_REPEATS. Default: 10.
  alarmRepeats: number;

  // Time in milliseconds between alarm plays. Environment variable: ALARM_REPEAT_INTERVAL. Default: 3000ms.
  alarmRepeatInterval: number;

  // Whether desktop notifications and sounds are raised. When false, changes are only logged. Environment variable: NOTIFY_ENABLED. Default: true.
  enabled: boolean;

  // Path to the alarm sound file. When null, boom.mp3 in the data directory is used. Environment variable: SOUND_PATH.
  soundPath: Nullable<string>;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // Maximum log file size in bytes. When exceeded, the file is trimmed to half this size. Environment variable: LOG_MAX_SIZE. Default: 1048576 (1MB).
  maxSize: number;
}

/**
 * Filesystem locations that can be overridden.
 */
export interface PathsConfig {

  // Absolute path to the log file. When unset, <data-dir>/channelwatch.log is used. Environment variable: CHANNELWATCH_LOG_FILE.
  logFile?: string;
}

/**
 * Local status server binding.
 */
export interface ServerConfig {

  // Whether the local status server runs. Environment variable: STATUS_SERVER. Default: true.
  enabled: boolean;

  // Interface address to bind. Environment variable: HOST. Default: 127.0.0.1.
  host: string;

  // TCP port. Environment variable: PORT. Default: 5590.
  port: number;
}

/**
 * Root configuration object.
 */
export interface Config {

  // Push channel settings.
  gateway: GatewayConfig;

  // Logging configuration.
  logging: LoggingConfig;

  // Alert settings.
  notify: NotifyConfig;

  // Filesystem overrides.
  paths: PathsConfig;

  // Pull channel settings.
  poll: PollConfig;

  // Reconnection backoff.
  recovery: RecoveryConfig;

  // Local status server.
  server: ServerConfig;

  // The watched channel.
  watch: WatchConfig;
}

/*
 * MONITORING TYPES
 *
 * These types flow between the two observation loops and the change detector. An ObservedName is produced by either loop and consumed once; the ChannelState is the
 * only long-lived value and belongs to the change detector.
 */

/**
 * The observation loop that produced an event.
 */
export type ObservationSource = "gateway" | "poll";

/**
 * A single observation of the channel's name.
 */
export interface ObservedName {

  name: string;
  observedAt: Date;
  source: ObservationSource;
}

/**
 * Callback through which both loops hand observations to the change detector.
 */
export type ObservedNameHandler = (event: ObservedName) => void;

/**
 * The last known name of the watched channel. The name is null until the first observation seeds it.
 */
export interface ChannelState {

  lastUpdated: Nullable<Date>;
  name: Nullable<string>;
}

/**
 * A genuine change handed to the notification sink.
 */
export interface NameChange {

  current: string;
  observedAt: Date;
  previous: string;
  source: ObservationSource;
}

/**
 * Gateway connection phase, in the order a healthy session moves through them.
 */
export type GatewayPhase = "connecting" | "dispatching" | "identifying" | "ready" | "terminal";

/**
 * Snapshot of the whole monitor, served by the status endpoint.
 */
export interface MonitorStatus {

  channel: {

    id: string;
    lastUpdated: Nullable<string>;
    name: Nullable<string>;
  };
  gateway: {

    heartbeatInterval: Nullable<number>;
    lastSequence: Nullable<number>;
    phase: GatewayPhase;
    reconnectAttempt: number;
    sessionId: Nullable<string>;
  };
  poll: {

    consecutiveFailures: number;
    interval: number;
    lastSuccess: Nullable<string>;
  };
  stats: {

    gatewayObservations: number;
    notifications: number;
    pollObservations: number;
  };
  uptime: number;
}

/**
 * Response body of the health endpoint.
 */
export interface HealthStatus {

  // Gateway phase at the time of the request.
  gateway: GatewayPhase;

  // Optional explanation when the status is not healthy.
  message?: string;

  // Milliseconds since the poller last fetched successfully, or null if it never has.
  pollAge: Nullable<number>;

  status: "degraded" | "healthy" | "unhealthy";

  timestamp: string;

  uptime: number;

  version: string;
}
