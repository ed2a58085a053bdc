/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for ChannelWatch.
 */
import type { Config, Nullable } from "../types/index.js";
import { ConfigError, LOG, getCurrentPattern, redactToken } from "../utils/index.js";
import { DEFAULTS, getAllSettings, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { getLogFilePath, getSoundPath } from "./paths.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. CLI flags (--log-file)
 * 2. Environment variables (DISCORD_TOKEN, CHANNEL_ID, POLL_INTERVAL, ...)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - watch: The credential and the channel being watched
 * - gateway: WebSocket endpoint, handshake timing and Identify intents
 * - poll: REST endpoint and the fixed poll cadence
 * - recovery: Reconnection backoff parameters
 * - notify: Desktop notification and alarm sound settings
 * - server: Local status server binding
 * - logging, paths: Log file location and size
 *
 * Configuration is initialized at startup via initializeConfiguration(), then checked by validateConfiguration(). A validation failure is a ConfigError and the
 * process exits before any connection is attempted.
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = JSON.parse(JSON.stringify(DEFAULTS)) as Config;

/**
 * Indicates whether a user config file parse error occurred during initialization.
 */
export let configParseError = false;

/**
 * The parse error message if configParseError is true.
 */
export let configParseErrorMessage: string | undefined;

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment and CLI overrides. This must be called at startup
 * before any code accesses CONFIG.
 * @param cliOverrides - Setting paths mapped to values given on the command line.
 */
export async function initializeConfiguration(cliOverrides: Record<string, unknown> = {}): Promise<void> {

  const result = await loadUserConfig();

  configParseError = result.parseError;
  configParseErrorMessage = result.parseErrorMessage;

  CONFIG = mergeConfiguration(result.config, process.env, cliOverrides);

  LOG.debug("config", "Configuration initialized from defaults, user config, environment variables and command line.");
}

/*
 * CONFIGURATION VALIDATION
 *
 * Numeric settings are checked against the bounds declared in CONFIG_METADATA. The watched channel and its credential have no defaults and must be supplied. We
 * collect every error before throwing so a misconfigured installation can be fixed in one pass.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range. It returns an error message if validation fails, allowing the caller to
 * collect all errors before reporting them.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  // Check for NaN (from parseInt of invalid input) and non-positive values.
  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates that a configuration value is a positive number (including floats) within an optional range.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveNumber(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(Number.isNaN(value) || (value <= 0)) {

    return [ name, " must be a positive number, got: ", String(value) ].join("");
  }

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates a configuration and throws a ConfigError listing every invalid value.
 * @param config - The configuration to validate. Defaults to the active CONFIG.
 * @throws ConfigError if any configuration value is invalid.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  for(const setting of getAllSettings()) {

    const value = getNestedValue(config, setting.path);
    const name = setting.envVar ?? setting.path;

    if((typeof value !== "number") || (setting.min === undefined)) {

      continue;
    }

    const error = (setting.type === "float") ? validatePositiveNumber(name, value, setting.min, setting.max) :
      validatePositiveInt(name, value, setting.min, setting.max);

    if(error) {

      errors.push(error);
    }
  }

  // The intents bitfield may legitimately be zero, so it only has to be a non-negative integer.
  if(!Number.isInteger(config.gateway.intents) || (config.gateway.intents < 0)) {

    errors.push([ "GATEWAY_INTENTS must be a non-negative integer, got: ", String(config.gateway.intents) ].join(""));
  }

  if(!config.watch.token) {

    errors.push("DISCORD_TOKEN is required.");
  }

  if(!config.watch.channelId) {

    errors.push("CHANNEL_ID is required.");
  } else if(!/^\d+$/.test(config.watch.channelId)) {

    errors.push([ "CHANNEL_ID must be a numeric channel ID, got: ", config.watch.channelId ].join(""));
  }

  if(!/^wss?:\/\//.test(config.gateway.url)) {

    errors.push([ "GATEWAY_URL must be a ws:// or wss:// URL, got: ", config.gateway.url ].join(""));
  }

  if(!/^https?:\/\//.test(config.poll.apiBase)) {

    errors.push([ "API_BASE must be an http:// or https:// URL, got: ", config.poll.apiBase ].join(""));
  }

  // The range check above rejects values below 1. Exactly 1 would keep every reconnection delay at the initial one.
  if(config.recovery.backoffMultiplier === 1) {

    errors.push("BACKOFF_MULTIPLIER must be greater than 1, got: 1");
  }

  if(config.recovery.maxBackoffDelay < config.recovery.initialBackoffDelay) {

    errors.push([ "MAX_BACKOFF_DELAY (", String(config.recovery.maxBackoffDelay), ") must not be less than INITIAL_BACKOFF_DELAY (",
      String(config.recovery.initialBackoffDelay), ")." ].join(""));
  }

  if(errors.length > 0) {

    throw new ConfigError([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Displays the active configuration at startup. The credential is never printed in full.
 */
export function displayConfiguration(): void {

  const debugPattern = getCurrentPattern();

  LOG.info("Starting ChannelWatch with configuration:");
  LOG.info("  Channel: %s", CONFIG.watch.channelId);
  LOG.info("  Token: %s", redactToken(CONFIG.watch.token));
  LOG.info("  Gateway: %s", CONFIG.gateway.url);
  LOG.info("  Poll interval: %sms (timeout %sms)", CONFIG.poll.interval, CONFIG.poll.requestTimeout);
  LOG.info("  Reconnect backoff: %sms x%s up to %sms", CONFIG.recovery.initialBackoffDelay, CONFIG.recovery.backoffMultiplier, CONFIG.recovery.maxBackoffDelay);
  LOG.info("  Notifications: %s", CONFIG.notify.enabled ? [ "enabled (sound ", getSoundPath(CONFIG), ")" ].join("") : "disabled");
  LOG.info("  Status server: %s", CONFIG.server.enabled ? [ CONFIG.server.host, ":", String(CONFIG.server.port) ].join("") : "disabled");
  LOG.info("  Log file: %s", getLogFilePath(CONFIG));

  if(debugPattern) {

    LOG.info("  Debug categories: %s", debugPattern);
  }
}
