/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * protocol.ts: Gateway wire shapes and payload readers for ChannelWatch.
 */
import type { Nullable } from "../types/index.js";

/* Every gateway frame is a JSON object { op, d, s, t }. Only dispatch frames (op 0) carry a sequence number and an event name. The readers below never throw: a
 * frame or payload that does not have the expected shape yields null, and the gateway client ignores it.
 */

/**
 * Gateway opcodes used by the client.
 */
export const GatewayOpcode = {

  DISPATCH: 0,
  HEARTBEAT: 1,
  HEARTBEAT_ACK: 11,
  HELLO: 10,
  IDENTIFY: 2,
  INVALID_SESSION: 9,
  RECONNECT: 7
} as const;

/**
 * A decoded gateway frame.
 */
export interface GatewayPayload {

  d: unknown;
  op: number;
  s: Nullable<number>;
  t: Nullable<string>;
}

/**
 * Client properties sent with Identify.
 */
export interface IdentifyProperties {

  browser: string;
  device: string;
  os: string;
}

/**
 * The fields of READY the client keeps.
 */
export interface ReadyInfo {

  // The watched channel's name when READY already carries it.
  channelName: Nullable<string>;
  sessionId: string;
}

/**
 * Narrows an unknown value to a plain object.
 * @param value - The value to check.
 * @returns True if the value is a non-array object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {

  return (value !== null) && (typeof value === "object") && !Array.isArray(value);
}

/**
 * Decodes one text frame. Frames that are not JSON objects with a numeric opcode yield null.
 * @param raw - The frame text.
 * @returns The decoded payload, or null.
 */
export function parseGatewayPayload(raw: string): Nullable<GatewayPayload> {

  let parsed: unknown;

  try {

    parsed = JSON.parse(raw);
  } catch {

    return null;
  }

  if(!isRecord(parsed) || (typeof parsed.op !== "number")) {

    return null;
  }

  return {

    d: parsed.d ?? null,
    op: parsed.op,
    s: (typeof parsed.s === "number") ? parsed.s : null,
    t: (typeof parsed.t === "string") ? parsed.t : null
  };
}

/**
 * Reads the heartbeat interval announced by Hello.
 * @param d - The Hello payload.
 * @returns The interval in milliseconds, or null when absent or not a positive number.
 */
export function readHeartbeatInterval(d: unknown): Nullable<number> {

  if(!isRecord(d) || (typeof d.heartbeat_interval !== "number") || !(d.heartbeat_interval > 0)) {

    return null;
  }

  return d.heartbeat_interval;
}

/**
 * Looks for a channel by ID in a list of channel objects.
 * @param channels - The candidate list.
 * @param channelId - The watched channel ID.
 * @returns The channel's name, or null when the channel is absent or has no name.
 */
function findNameInChannels(channels: unknown, channelId: string): Nullable<string> {

  if(!Array.isArray(channels)) {

    return null;
  }

  for(const channel of channels) {

    if(isRecord(channel) && (channel.id === channelId) && (typeof channel.name === "string")) {

      return channel.name;
    }
  }

  return null;
}

/**
 * Reads READY. The watched channel's name is looked up in the guild channel lists and then in the private channel list.
 * @param d - The READY payload.
 * @param channelId - The watched channel ID.
 * @returns The session ID and any channel name found, or null when the payload has no session ID.
 */
export function readReady(d: unknown, channelId: string): Nullable<ReadyInfo> {

  if(!isRecord(d) || (typeof d.session_id !== "string")) {

    return null;
  }

  let channelName: Nullable<string> = null;

  if(Array.isArray(d.guilds)) {

    for(const guild of d.guilds) {

      channelName = isRecord(guild) ? findNameInChannels(guild.channels, channelId) : null;

      if(channelName !== null) {

        break;
      }
    }
  }

  channelName ??= findNameInChannels(d.private_channels, channelId);

  return { channelName, sessionId: d.session_id };
}

/**
 * Reads CHANNEL_UPDATE.
 * @param d - The dispatch payload.
 * @param channelId - The watched channel ID.
 * @returns The new name when the update concerns the watched channel, otherwise null.
 */
export function readChannelUpdate(d: unknown, channelId: string): Nullable<string> {

  if(!isRecord(d) || (d.id !== channelId) || (typeof d.name !== "string")) {

    return null;
  }

  return d.name;
}

/**
 * Reads GUILD_CREATE.
 * @param d - The dispatch payload.
 * @param channelId - The watched channel ID.
 * @returns The watched channel's name when the guild carries it, otherwise null.
 */
export function readGuildCreate(d: unknown, channelId: string): Nullable<string> {

  return isRecord(d) ? findNameInChannels(d.channels, channelId) : null;
}

/**
 * Builds the Identify frame.
 * @param token - The credential.
 * @param intents - Intents bitfield. Zero omits the field.
 * @param properties - Client properties.
 * @returns The serialized frame.
 */
export function buildIdentify(token: string, intents: number, properties: IdentifyProperties): string {

  const d: Record<string, unknown> = { properties, token };

  if(intents > 0) {

    d.intents = intents;
  }

  return JSON.stringify({ d, op: GatewayOpcode.IDENTIFY });
}

/**
 * Builds a Heartbeat frame.
 * @param sequence - The last sequence number received, or null before the first dispatch.
 * @returns The serialized frame.
 */
export function buildHeartbeat(sequence: Nullable<number>): string {

  return JSON.stringify({ d: sequence, op: GatewayOpcode.HEARTBEAT });
}

/**
 * Client properties reported with Identify. The client names itself rather than impersonating a browser.
 * @returns The properties object.
 */
export function defaultIdentifyProperties(): IdentifyProperties {

  return { browser: "channelwatch", device: "channelwatch", os: process.platform };
}
