/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for ChannelWatch.
 */
import type { Express, Request, Response } from "express";
import type { MonitorHandle } from "../watch/monitor.js";

/* The health endpoint reports whether the watcher is receiving observations. It is healthy when the gateway session is up and the poller has succeeded within the
 * last three poll intervals, degraded when only one of the two is working, and unhealthy when neither is. Returns HTTP 503 when unhealthy so that supervisors and
 * monitoring systems can act on the status code alone.
 */

/**
 * Creates the health check endpoint.
 * @param app - The Express application.
 * @param monitor - The running monitor.
 */
export function setupHealthEndpoint(app: Express, monitor: MonitorHandle): void {

  app.get("/health", (_req: Request, res: Response): void => {

    const health = monitor.getHealth();

    // Return HTTP 503 when unhealthy to allow monitoring systems to detect problems via status code.
    const httpStatus = (health.status === "unhealthy") ? 503 : 200;

    res.status(httpStatus).json(health);
  });
}
