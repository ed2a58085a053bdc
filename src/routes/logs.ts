/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logs.ts: Log viewing endpoints for ChannelWatch.
 */
import type { Express, Request, Response } from "express";
import { LOG, formatError, isConsoleLogging, readLogFile, subscribeToLogs } from "../utils/index.js";
import { CONFIG } from "../config/index.js";
import type { LogEntry } from "../utils/index.js";
import { getLogFilePath } from "../config/paths.js";

interface LogsResponse {

  entries: LogEntry[];
  filtered: number;
  mode: "console" | "file";
  total: number;
}

// Levels accepted by the level query parameter.
const VALID_LEVELS = [ "error", "info", "warn" ];

/**
 * Reads the log file and returns the most recent entries.
 * @param lines - Maximum number of entries to return.
 * @param levelFilter - Optional level filter (error, warn, info, or undefined for all).
 * @returns The entries and counts.
 */
async function readLogEntries(lines: number, levelFilter?: string): Promise<LogsResponse> {

  // In console mode there is no log file to read.
  if(isConsoleLogging()) {

    return { entries: [], filtered: 0, mode: "console", total: 0 };
  }

  const allEntries = await readLogFile(getLogFilePath(CONFIG));
  const filteredEntries = (levelFilter && VALID_LEVELS.includes(levelFilter)) ? allEntries.filter((entry) => entry.level === levelFilter) : allEntries;

  return { entries: filteredEntries.slice(-lines), filtered: filteredEntries.length, mode: "file", total: allEntries.length };
}

/**
 * Reads a single string query parameter.
 * @param value - The raw query value.
 * @returns The value when it is a single string, otherwise undefined.
 */
function queryString(value: unknown): string | undefined {

  return (typeof value === "string") ? value : undefined;
}

/* The /logs endpoint returns recent log entries as JSON, with optional "lines" and "level" query parameters. The /logs/stream endpoint delivers live entries via
 * Server-Sent Events until the client disconnects.
 */

/**
 * Creates the log endpoints.
 * @param app - The Express application.
 */
export function setupLogsEndpoint(app: Express): void {

  app.get("/logs", async (req: Request, res: Response): Promise<void> => {

    const linesParam = parseInt(queryString(req.query.lines) ?? "", 10);
    const lines = (!isNaN(linesParam) && (linesParam > 0) && (linesParam <= 1000)) ? linesParam : 100;

    try {

      res.json(await readLogEntries(lines, queryString(req.query.level)));
    } catch(error) {

      LOG.error("Unable to read the log file: %s.", formatError(error));

      res.status(500).json({ entries: [], error: "Failed to read log file.", filtered: 0, mode: "file", total: 0 });
    }
  });

  app.get("/logs/stream", (req: Request, res: Response): void => {

    // Cache-Control prevents proxies from buffering the stream, and Connection: keep-alive ensures the connection stays open.
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("Content-Type", "text/event-stream");

    res.flushHeaders();

    const levelFilter = queryString(req.query.level);
    const filterLevel = (levelFilter && VALID_LEVELS.includes(levelFilter)) ? levelFilter : null;

    const unsubscribe = subscribeToLogs((entry) => {

      if(filterLevel && (entry.level !== filterLevel)) {

        return;
      }

      res.write([ "data: ", JSON.stringify(entry), "\n\n" ].join(""));
    });

    // Send a named heartbeat event every 30 seconds to keep the connection alive through proxies and allow clients to detect staleness.
    const heartbeatInterval = setInterval(() => {

      res.write("event: heartbeat\ndata: \n\n");
    }, 30000);

    req.on("close", () => {

      clearInterval(heartbeatInterval);
      unsubscribe();
    });
  });
}
