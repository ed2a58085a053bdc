/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logReader.ts: Log file parsing and event statistics for ChannelWatch.
 */
import type { LogEntry } from "./logEmitter.js";
import type { Nullable } from "../types/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/* Log file lines have the form: [YYYY/MM/DD HH:MM:ss.l] [LEVEL] message. The level prefix is present for debug, warn and error entries; info entries have none.
 * Lines may contain ANSI color codes, which are stripped before parsing. The status command and the /logs endpoint both read the log through this module.
 */

// Pattern to match ANSI escape sequences (SGR - Select Graphic Rendition).
// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

// Pattern to match log entries: [timestamp] optional [LEVEL] or [LEVEL:category] message.
const LOG_LINE_PATTERN = /^\[(\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}\.\d{3})\] (?:\[(WARN|ERROR|DEBUG(?::[^\]]+)?)\] )?(.*)$/;

// A quoted channel name as written by quoteName(), followed by the observation source.
const QUOTED_NAME = "(\"(?:[^\"\\\\]|\\\\.)*\")";

const INITIAL_NAME_PATTERN = new RegExp([ "Initial name: ", QUOTED_NAME, " \\(source: (?:gateway|poll)\\)\\.$" ].join(""));
const NAME_CHANGE_PATTERN = new RegExp([ "Name change detected: .* -> ", QUOTED_NAME, " \\(source: (gateway|poll)\\)\\.$" ].join(""));
const POLL_CYCLE_PATTERN = new RegExp([ "Poll cycle executed: ", QUOTED_NAME, "\\.$" ].join(""));

/**
 * Event counts derived from the log.
 */
export interface LogStatistics {

  // Name changes detected, each of which raised an alarm.
  alarms: number;

  // Name changes first seen on the gateway.
  gatewayDetections: number;

  heartbeatAcks: number;

  // Successful poll cycles.
  pollCycles: number;

  // Name changes first seen by the poller.
  pollDetections: number;

  // Reconnection attempts scheduled by the supervisor.
  reconnects: number;
}

/**
 * Strips ANSI escape codes from a string.
 * @param text - The text that may contain ANSI codes.
 * @returns The text with all ANSI codes removed.
 */
export function stripAnsiCodes(text: string): string {

  return text.replace(ANSI_PATTERN, "");
}

/**
 * Parses a single log line into a structured entry.
 * @param line - The raw log line from the file.
 * @returns The parsed log entry, or null if the line does not match the expected format.
 */
export function parseLogLine(line: string): Nullable<LogEntry> {

  const match = LOG_LINE_PATTERN.exec(stripAnsiCodes(line));

  if(!match) {

    return null;
  }

  const timestamp = match[1];
  const levelStr: string | undefined = match[2];
  const message = match[3];

  let level: LogEntry["level"] = "info";
  let categoryTag: string | undefined;

  if(levelStr?.startsWith("DEBUG")) {

    level = "debug";

    // "DEBUG:gateway:frames" carries the category "gateway:frames".
    const colonIndex = levelStr.indexOf(":");

    if(colonIndex !== -1) {

      categoryTag = levelStr.substring(colonIndex + 1);
    }
  } else if(levelStr === "WARN") {

    level = "warn";
  } else if(levelStr === "ERROR") {

    level = "error";
  }

  const entry: LogEntry = { level, message, timestamp };

  if(categoryTag) {

    entry.categoryTag = categoryTag;
  }

  return entry;
}

/**
 * Reads and parses the whole log file.
 * @param logFilePath - The log file.
 * @returns The parsed entries, oldest first. A missing file yields no entries.
 */
export async function readLogFile(logFilePath: string): Promise<LogEntry[]> {

  let content: string;

  try {

    content = await fsPromises.readFile(logFilePath, "utf-8");
  } catch(error) {

    if((error as NodeJS.ErrnoException).code === "ENOENT") {

      return [];
    }

    throw error;
  }

  const entries: LogEntry[] = [];

  for(const line of content.split("\n")) {

    const entry = line.trim() ? parseLogLine(line) : null;

    if(entry) {

      entries.push(entry);
    }
  }

  return entries;
}

/**
 * Counts monitoring events in a list of log entries. Request lines from the status server are tagged "[http]" and never match.
 * @param entries - Parsed log entries.
 * @returns The event counts.
 */
export function computeLogStatistics(entries: LogEntry[]): LogStatistics {

  const stats: LogStatistics = { alarms: 0, gatewayDetections: 0, heartbeatAcks: 0, pollCycles: 0, pollDetections: 0, reconnects: 0 };

  for(const entry of entries) {

    const change = NAME_CHANGE_PATTERN.exec(entry.message);

    if(change) {

      stats.alarms++;

      if(change[2] === "gateway") {

        stats.gatewayDetections++;
      } else {

        stats.pollDetections++;
      }

      continue;
    }

    if(entry.message.includes("Heartbeat acknowledged")) {

      stats.heartbeatAcks++;
    } else if(POLL_CYCLE_PATTERN.test(entry.message)) {

      stats.pollCycles++;
    } else if(entry.message.includes("Reconnecting in ")) {

      stats.reconnects++;
    }
  }

  return stats;
}

/**
 * Decodes a quoted name captured from a log line.
 * @param quoted - The JSON string literal.
 * @returns The name, or null if the literal is malformed.
 */
function decodeQuotedName(quoted: string): Nullable<string> {

  try {

    const value: unknown = JSON.parse(quoted);

    return (typeof value === "string") ? value : null;
  } catch {

    return null;
  }
}

/**
 * Finds the most recent channel name recorded in the log.
 * @param entries - Parsed log entries, oldest first.
 * @returns The last name seen, or null if the log records none.
 */
export function findLastKnownName(entries: LogEntry[]): Nullable<string> {

  for(let i = entries.length - 1; i >= 0; i--) {

    const message = entries[i].message;
    const match = NAME_CHANGE_PATTERN.exec(message) ?? INITIAL_NAME_PATTERN.exec(message) ?? POLL_CYCLE_PATTERN.exec(message);

    if(match) {

      const name = decodeQuotedName(match[1]);

      if(name !== null) {

        return name;
      }
    }
  }

  return null;
}
