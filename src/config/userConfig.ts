/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for ChannelWatch.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";
import fs from "node:fs";
import { getConfigFilePath } from "./paths.js";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * ChannelWatch reads optional settings from <data-dir>/config.json. The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables, including a .env file in the working directory
 * 4. CLI flags (highest priority)
 *
 * The credential and channel ID usually come from the environment (DISCORD_TOKEN, CHANNEL_ID), but they can live in config.json as well.
 */

/**
 * Metadata describing a single configuration setting. Default values are not stored here; use getNestedValue(DEFAULTS, setting.path).
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: string | null;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "poll.interval").
  path: string;

  // Whether the value is a credential that must never be printed.
  secret?: boolean;

  // Data type used to parse environment values and check config file values.
  type: "boolean" | "float" | "host" | "integer" | "path" | "port" | "string";

  // Unit of measurement printed by --list-env (e.g., "ms").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  gateway: [
    {

      description: "Heartbeat interval used when the gateway Hello does not announce one.",
      envVar: "GATEWAY_HEARTBEAT_INTERVAL",
      max: 300000,
      min: 1000,
      path: "gateway.defaultHeartbeatInterval",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Time allowed between opening the gateway socket and receiving READY. A slower handshake counts as a lost connection.",
      envVar: "GATEWAY_HANDSHAKE_TIMEOUT",
      max: 120000,
      min: 1000,
      path: "gateway.handshakeTimeout",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Intents bitfield sent with Identify. 1 (GUILDS) delivers CHANNEL_UPDATE to bot accounts. 0 omits the field.",
      envVar: "GATEWAY_INTENTS",
      path: "gateway.intents",
      type: "integer"
    },
    {

      description: "WebSocket URL of the gateway.",
      envVar: "GATEWAY_URL",
      path: "gateway.url",
      type: "string"
    }
  ],

  logging: [
    {

      description: "Maximum log file size in bytes. When exceeded, the file is trimmed to half this size keeping the most recent logs.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  notify: [
    {

      description: "Number of times the alarm sound plays for a single name change.",
      envVar: "ALARM_REPEATS",
      max: 1000,
      min: 1,
      path: "notify.alarmRepeats",
      type: "integer"
    },
    {

      description: "Time between alarm plays.",
      envVar: "ALARM_REPEAT_INTERVAL",
      max: 600000,
      min: 100,
      path: "notify.alarmRepeatInterval",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Raise desktop notifications and play the alarm sound. When disabled, changes are only logged.",
      envVar: "NOTIFY_ENABLED",
      path: "notify.enabled",
      type: "boolean"
    },
    {

      description: "Path to the alarm sound file.",
      envVar: "SOUND_PATH",
      path: "notify.soundPath",
      type: "path"
    }
  ],

  paths: [
    {

      description: "Log file path. Must be an absolute path.",
      envVar: "CHANNELWATCH_LOG_FILE",
      path: "paths.logFile",
      type: "path"
    }
  ],

  poll: [
    {

      description: "Base URL of the REST API used for polling.",
      envVar: "API_BASE",
      path: "poll.apiBase",
      type: "string"
    },
    {

      description: "Fixed interval between poll requests. Failures never stretch it.",
      envVar: "POLL_INTERVAL",
      max: 3600000,
      min: 500,
      path: "poll.interval",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Timeout for a single poll request.",
      envVar: "POLL_REQUEST_TIMEOUT",
      max: 60000,
      min: 100,
      path: "poll.requestTimeout",
      type: "integer",
      unit: "ms"
    }
  ],

  recovery: [
    {

      description: "Multiplier applied to the reconnection delay after each consecutive failed connection. Must be greater than 1.",
      envVar: "BACKOFF_MULTIPLIER",
      max: 10,
      min: 1,
      path: "recovery.backoffMultiplier",
      type: "float"
    },
    {

      description: "Delay before the first reconnection attempt, and after any connection that stayed up for a full heartbeat interval.",
      envVar: "INITIAL_BACKOFF_DELAY",
      max: 600000,
      min: 100,
      path: "recovery.initialBackoffDelay",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Ceiling for the reconnection delay.",
      envVar: "MAX_BACKOFF_DELAY",
      max: 3600000,
      min: 100,
      path: "recovery.maxBackoffDelay",
      type: "integer",
      unit: "ms"
    }
  ],

  server: [
    {

      description: "Run the local status server used by `channelwatch status` and health checks.",
      envVar: "STATUS_SERVER",
      path: "server.enabled",
      type: "boolean"
    },
    {

      description: "Interface address the status server binds to.",
      envVar: "HOST",
      path: "server.host",
      type: "host"
    },
    {

      description: "TCP port of the status server.",
      envVar: "PORT",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    }
  ],

  watch: [
    {

      description: "ID of the channel whose name is watched.",
      envVar: "CHANNEL_ID",
      path: "watch.channelId",
      type: "string"
    },
    {

      description: "Credential presented to the gateway and the REST API.",
      envVar: "DISCORD_TOKEN",
      path: "watch.token",
      secret: true,
      type: "string"
    }
  ]
};

/**
 * Recursively optional view of a configuration object, as found in config.json.
 */
export type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

/**
 * The user configuration file shape. Every field is optional; absent fields take their defaults.
 */
export type UserConfig = DeepPartial<Config>;

/**
 * Result of loading the user config file.
 */
export interface UserConfigLoadResult {

  config: UserConfig;
  parseError: boolean;
  parseErrorMessage?: string;
}

/**
 * Loads the user configuration file. A missing file is normal and yields an empty configuration. Invalid JSON is reported and ignored.
 * @returns The parsed configuration and parse status.
 */
export async function loadUserConfig(): Promise<UserConfigLoadResult> {

  const configFilePath = getConfigFilePath();

  try {

    const content = await fsPromises.readFile(configFilePath, "utf-8");

    try {

      const parsed: unknown = JSON.parse(content);

      if((parsed === null) || (typeof parsed !== "object") || Array.isArray(parsed)) {

        LOG.warn("Configuration file %s does not contain a JSON object. Using defaults.", configFilePath);

        return { config: {}, parseError: true, parseErrorMessage: "Expected a JSON object." };
      }

      return { config: parsed as UserConfig, parseError: false };
    } catch(parseError) {

      const message = (parseError instanceof Error) ? parseError.message : String(parseError);

      LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", configFilePath, message);

      return { config: {}, parseError: true, parseErrorMessage: message };
    }
  } catch(error) {

    // File doesn't exist - this is normal, use defaults.
    if((error as NodeJS.ErrnoException).code === "ENOENT") {

      return { config: {}, parseError: false };
    }

    LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, (error instanceof Error) ? error.message : String(error));

    return { config: {}, parseError: false };
  }
}

/*
 * CONFIGURATION MERGING
 *
 * These functions merge defaults, user config, environment overrides and CLI flags into the final CONFIG object.
 */

/**
 * Hard-coded default configuration values. These are the baseline values used when neither user config nor environment variables provide a value.
 */
export const DEFAULTS: Config = {

  gateway: {

    defaultHeartbeatInterval: 41250,
    handshakeTimeout: 15000,
    intents: 1,
    url: "wss://gateway.discord.gg/?v=10&encoding=json"
  },

  logging: {

    maxSize: 1048576
  },

  notify: {

    alarmRepeatInterval: 3000,
    alarmRepeats: 10,
    enabled: true,
    soundPath: null
  },

  paths: {},

  poll: {

    apiBase: "https://discord.com/api/v10",
    interval: 1500,
    requestTimeout: 5000
  },

  recovery: {

    backoffMultiplier: 2,
    initialBackoffDelay: 1000,
    maxBackoffDelay: 60000
  },

  server: {

    enabled: true,
    host: "127.0.0.1",
    port: 5590
  },

  watch: {

    channelId: "",
    token: ""
  }
};

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, type: SettingMetadata["type"]): boolean | number | string | undefined {

  switch(type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.trim().toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "float": {

      const num = parseFloat(value);

      return Number.isNaN(num) ? undefined : num;
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    default: {

      return value.trim();
    }
  }
}

/**
 * Checks whether a value read from config.json has the JavaScript type a setting expects. Mismatched values are ignored rather than merged.
 * @param value - The value from the config file.
 * @param type - The setting type.
 * @returns True if the value can be merged.
 */
function matchesSettingType(value: unknown, type: SettingMetadata["type"]): boolean {

  switch(type) {

    case "boolean": {

      return typeof value === "boolean";
    }

    case "float":
    case "integer":
    case "port": {

      return (typeof value === "number") && Number.isFinite(value);
    }

    case "path": {

      return (value === null) || (typeof value === "string");
    }

    default: {

      return typeof value === "string";
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "poll.interval").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if((current === null) || (current === undefined) || (typeof current !== "object")) {

      return undefined;
    }

    current = (current as Record<string, unknown>)[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "poll.interval").
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  let current = obj;

  for(let i = 0; i < (parts.length - 1); i++) {

    const part = parts[i];

    if((current[part] === undefined) || (current[part] === null) || (typeof current[part] !== "object")) {

      current[part] = {};
    }

    current = current[part] as Record<string, unknown>;
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Returns every setting across all categories.
 * @returns The flattened setting list.
 */
export function getAllSettings(): SettingMetadata[] {

  return Object.values(CONFIG_METADATA).flat();
}

/**
 * Merges user configuration with defaults, environment overrides and CLI overrides to produce the final configuration. Priority: CLI > env > user config > defaults.
 * @param userConfig - User configuration from the config file.
 * @param env - Environment to read overrides from.
 * @param cliOverrides - Setting paths mapped to values given on the command line.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, env: NodeJS.ProcessEnv = process.env, cliOverrides: Record<string, unknown> = {}): Config {

  // Start with a deep copy of defaults.
  const config = JSON.parse(JSON.stringify(DEFAULTS)) as Config;

  for(const setting of getAllSettings()) {

    const userValue = getNestedValue(userConfig, setting.path);

    if((userValue !== undefined) && matchesSettingType(userValue, setting.type)) {

      setNestedValue(config as unknown as Record<string, unknown>, setting.path, userValue);
    } else if(userValue !== undefined) {

      LOG.warn("Ignoring %s in the configuration file: expected type %s.", setting.path, setting.type);
    }
  }

  for(const setting of getAllSettings()) {

    const envValue = setting.envVar ? env[setting.envVar] : undefined;

    if((envValue !== undefined) && (envValue !== "")) {

      const parsedValue = parseEnvValue(envValue, setting.type);

      if(parsedValue !== undefined) {

        setNestedValue(config as unknown as Record<string, unknown>, setting.path, parsedValue);
      }
    }
  }

  for(const [ settingPath, value ] of Object.entries(cliOverrides)) {

    if(value !== undefined) {

      setNestedValue(config as unknown as Record<string, unknown>, settingPath, value);
    }
  }

  return config;
}

/**
 * Formats a setting's default for display, hiding nothing since defaults contain no secrets.
 * @param setting - The setting.
 * @returns The default value as text.
 */
export function describeDefault(setting: SettingMetadata): string {

  const defaultValue: Nullable<unknown> = getNestedValue(DEFAULTS, setting.path) ?? null;

  if((defaultValue === null) || (defaultValue === "")) {

    return "(unset)";
  }

  return ((typeof defaultValue === "number") && setting.unit) ? [ String(defaultValue), " (", setting.unit, ")" ].join("") : String(defaultValue);
}
