/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * status.ts: Monitor status route for ChannelWatch.
 */
import type { Express, Request, Response } from "express";
import type { MonitorHandle } from "../watch/monitor.js";

/**
 * Creates the status endpoint, which returns the monitor snapshot: the channel's current name, the gateway session, the poller and the observation counters. The
 * status command reads the current name from here while the watcher is running.
 * @param app - The Express application.
 * @param monitor - The running monitor.
 */
export function setupStatusEndpoint(app: Express, monitor: MonitorHandle): void {

  app.get("/status", (_req: Request, res: Response): void => {

    res.json(monitor.getStatus());
  });
}
