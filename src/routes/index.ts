/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for the ChannelWatch status server.
 */
import type { Express } from "express";
import type { MonitorHandle } from "../watch/monitor.js";
import { setupHealthEndpoint } from "./health.js";
import { setupLogsEndpoint } from "./logs.js";
import { setupStatusEndpoint } from "./status.js";

/*
 * ROUTE SETUP
 *
 * This module aggregates all route setup functions and provides a single function to configure all HTTP endpoints on the Express application.
 */

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param monitor - The running monitor the endpoints report on.
 */
export function setupRoutes(app: Express, monitor: MonitorHandle): void {

  setupHealthEndpoint(app, monitor);
  setupLogsEndpoint(app);
  setupStatusEndpoint(app, monitor);
}

export { setupHealthEndpoint } from "./health.js";
export { setupLogsEndpoint } from "./logs.js";
export { setupStatusEndpoint } from "./status.js";
