/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.test.ts: Tests for configuration validation.
 */
import { describe, expect, it } from "vitest";
import { validateConfiguration, validatePositiveInt, validatePositiveNumber } from "./index.js";
import { ConfigError } from "../utils/index.js";
import { mergeConfiguration } from "./userConfig.js";

const REQUIRED = { CHANNEL_ID: "1234567890", DISCORD_TOKEN: "test-secret" };

describe("validatePositiveInt", () => {

  it("accepts values inside the range", () => {

    expect(validatePositiveInt("POLL_INTERVAL", 1500, 500, 3600000)).toBeNull();
  });

  it("rejects non-integers, values below the minimum and values above the maximum", () => {

    expect(validatePositiveInt("POLL_INTERVAL", 1.5)).toBe("POLL_INTERVAL must be a positive integer, got: 1.5");
    expect(validatePositiveInt("POLL_INTERVAL", 100, 500)).toBe("POLL_INTERVAL must be at least 500, got: 100");
    expect(validatePositiveInt("PORT", 70000, 1, 65535)).toBe("PORT must be at most 65535, got: 70000");
  });
});

describe("validatePositiveNumber", () => {

  it("accepts fractions", () => {

    expect(validatePositiveNumber("BACKOFF_MULTIPLIER", 1.5, 1, 10)).toBeNull();
  });

  it("rejects zero", () => {

    expect(validatePositiveNumber("BACKOFF_MULTIPLIER", 0)).toBe("BACKOFF_MULTIPLIER must be a positive number, got: 0");
  });
});

describe("validateConfiguration", () => {

  it("accepts the defaults once the channel and credential are set", () => {

    expect(() => validateConfiguration(mergeConfiguration({}, REQUIRED))).not.toThrow();
  });

  it("requires the credential and the channel", () => {

    expect(() => validateConfiguration(mergeConfiguration({}, {}))).toThrow(new ConfigError([

      "Configuration validation failed:",
      "  DISCORD_TOKEN is required.",
      "  CHANNEL_ID is required."
    ].join("\n")));
  });

  it("collects every error into one message", () => {

    const config = mergeConfiguration({}, { ...REQUIRED, CHANNEL_ID: "general", GATEWAY_URL: "https://gateway.test", POLL_INTERVAL: "100" });

    let message = "";

    try {

      validateConfiguration(config);
    } catch(error) {

      message = (error instanceof ConfigError) ? error.message : "";
    }

    expect(message.split("\n")).toEqual([

      "Configuration validation failed:",
      "  POLL_INTERVAL must be at least 500, got: 100",
      "  CHANNEL_ID must be a numeric channel ID, got: general",
      "  GATEWAY_URL must be a ws:// or wss:// URL, got: https://gateway.test"
    ]);
  });

  it("allows zero intents", () => {

    expect(() => validateConfiguration(mergeConfiguration({}, { ...REQUIRED, GATEWAY_INTENTS: "0" }))).not.toThrow();
  });

  it("rejects a backoff multiplier that would never grow the delay", () => {

    expect(() => validateConfiguration(mergeConfiguration({}, { ...REQUIRED, BACKOFF_MULTIPLIER: "1" })))
      .toThrow(new ConfigError("Configuration validation failed:\n  BACKOFF_MULTIPLIER must be greater than 1, got: 1"));
    expect(() => validateConfiguration(mergeConfiguration({}, { ...REQUIRED, BACKOFF_MULTIPLIER: "1.1" }))).not.toThrow();
  });

  it("rejects a backoff ceiling below the initial delay", () => {

    expect(() => validateConfiguration(mergeConfiguration({}, { ...REQUIRED, INITIAL_BACKOFF_DELAY: "5000", MAX_BACKOFF_DELAY: "1000" })))
      .toThrow("MAX_BACKOFF_DELAY (1000) must not be less than INITIAL_BACKOFF_DELAY (5000).");
  });
});
