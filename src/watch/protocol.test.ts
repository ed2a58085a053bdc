/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * protocol.test.ts: Tests for gateway frame decoding and encoding.
 */
import { buildHeartbeat, buildIdentify, parseGatewayPayload, readChannelUpdate, readGuildCreate, readHeartbeatInterval, readReady } from "./protocol.js";
import { describe, expect, it } from "vitest";

const CHANNEL_ID = "1234567890";

describe("parseGatewayPayload", () => {

  it("decodes a dispatch frame", () => {

    expect(parseGatewayPayload("{\"op\":0,\"s\":5,\"t\":\"CHANNEL_UPDATE\",\"d\":{\"id\":\"1\"}}")).toEqual({ d: { id: "1" }, op: 0, s: 5, t: "CHANNEL_UPDATE" });
  });

  it("fills in null for absent fields", () => {

    expect(parseGatewayPayload("{\"op\":11}")).toEqual({ d: null, op: 11, s: null, t: null });
  });

  it("rejects text that is not JSON", () => {

    expect(parseGatewayPayload("not json")).toBeNull();
  });

  it("rejects JSON without a numeric opcode", () => {

    expect(parseGatewayPayload("{\"op\":\"10\"}")).toBeNull();
    expect(parseGatewayPayload("[1,2]")).toBeNull();
    expect(parseGatewayPayload("null")).toBeNull();
  });
});

describe("readHeartbeatInterval", () => {

  it("returns the announced interval", () => {

    expect(readHeartbeatInterval({ heartbeat_interval: 41250 })).toBe(41250);
  });

  it("returns null for a missing or non-positive interval", () => {

    expect(readHeartbeatInterval({})).toBeNull();
    expect(readHeartbeatInterval({ heartbeat_interval: 0 })).toBeNull();
    expect(readHeartbeatInterval(null)).toBeNull();
  });
});

describe("readReady", () => {

  it("finds the channel name in a guild channel list", () => {

    const d = { guilds: [ { channels: [ { id: "1", name: "other" } ] }, { channels: [ { id: CHANNEL_ID, name: "general" } ] } ], session_id: "abc" };

    expect(readReady(d, CHANNEL_ID)).toEqual({ channelName: "general", sessionId: "abc" });
  });

  it("falls back to the private channel list", () => {

    const d = { guilds: [], private_channels: [ { id: CHANNEL_ID, name: "dm-group" } ], session_id: "abc" };

    expect(readReady(d, CHANNEL_ID)).toEqual({ channelName: "dm-group", sessionId: "abc" });
  });

  it("returns a null name when READY does not carry the channel", () => {

    expect(readReady({ session_id: "abc" }, CHANNEL_ID)).toEqual({ channelName: null, sessionId: "abc" });
  });

  it("requires a session ID", () => {

    expect(readReady({ guilds: [] }, CHANNEL_ID)).toBeNull();
  });
});

describe("readChannelUpdate", () => {

  it("returns the new name for the watched channel", () => {

    expect(readChannelUpdate({ id: CHANNEL_ID, name: "general-renamed" }, CHANNEL_ID)).toBe("general-renamed");
  });

  it("ignores updates for other channels", () => {

    expect(readChannelUpdate({ id: "999", name: "elsewhere" }, CHANNEL_ID)).toBeNull();
  });

  it("keeps an empty name", () => {

    expect(readChannelUpdate({ id: CHANNEL_ID, name: "" }, CHANNEL_ID)).toBe("");
  });
});

describe("readGuildCreate", () => {

  it("returns the watched channel's name from the guild", () => {

    expect(readGuildCreate({ channels: [ { id: CHANNEL_ID, name: "general" } ] }, CHANNEL_ID)).toBe("general");
  });

  it("returns null when the guild does not hold the channel", () => {

    expect(readGuildCreate({ channels: [] }, CHANNEL_ID)).toBeNull();
  });
});

describe("frame builders", () => {

  const properties = { browser: "channelwatch", device: "channelwatch", os: "linux" };

  it("builds Identify with intents", () => {

    expect(JSON.parse(buildIdentify("test-secret", 1, properties))).toEqual({ d: { intents: 1, properties, token: "test-secret" }, op: 2 });
  });

  it("omits intents when they are zero", () => {

    expect(JSON.parse(buildIdentify("test-secret", 0, properties))).toEqual({ d: { properties, token: "test-secret" }, op: 2 });
  });

  it("builds a heartbeat carrying the last sequence", () => {

    expect(buildHeartbeat(null)).toBe("{\"d\":null,\"op\":1}");
    expect(buildHeartbeat(42)).toBe("{\"d\":42,\"op\":1}");
  });
});
