/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Watcher startup, status server and graceful shutdown for ChannelWatch.
 */
import { CONFIG, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatError, setConsoleLogging } from "./utils/index.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { MonitorHandle } from "./watch/monitor.js";
import type { Nullable } from "./types/index.js";
import type { Server } from "node:http";
import consoleStamp from "console-stamp";
import { createNotificationSink } from "./notify/index.js";
import express from "express";
import { getLogFilePath } from "./config/paths.js";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";
import { startMonitor } from "./watch/monitor.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/channelwatch.log, which is also what `channelwatch status` reads.
 */

// Track whether console logging is enabled, set during startWatcher().
let usingConsoleLogging = false;

/*
 * APPLICATION STATE
 *
 * The monitor and the status server are stored globally so they can be closed during graceful shutdown.
 */

let monitor: Nullable<MonitorHandle> = null;
let server: Nullable<Server> = null;

/**
 * Options for starting the watcher.
 */
export interface WatcherOptions {

  // Setting paths mapped to values given on the command line.
  cliOverrides: Record<string, unknown>;

  // Log to the console instead of the log file.
  useConsoleLogging: boolean;
}

/**
 * Reports a fatal startup error and exits. In file logging mode the error is also printed to stderr so that a foreground invocation shows why it stopped.
 * @param error - The error.
 */
function exitWithError(error: unknown): never {

  LOG.error(formatError(error) + ".");

  if(!usingConsoleLogging) {

    // eslint-disable-next-line no-console
    console.error("Error: " + formatError(error) + ".");

    shutdownFileLogger();
  }

  process.exit(1);
}

/*
 * GRACEFUL SHUTDOWN
 *
 * When the process receives a termination signal, we close the status server, then stop the monitor, which ends both observation loops and silences any alarm. The
 * monitor logs "Shutdown complete." as its final line, so the status server is closed first.
 */

/**
 * Closes the status server, dropping any open log streams.
 */
async function closeServer(): Promise<void> {

  const activeServer = server;

  if(!activeServer) {

    return;
  }

  server = null;

  await new Promise<void>((resolve) => {

    activeServer.close((error?: Error): void => {

      if(error) {

        LOG.warn("Error closing the status server: %s.", formatError(error));
      } else {

        LOG.info("Status server closed.");
      }

      resolve();
    });

    // Server-Sent Event clients hold their connections open indefinitely.
    activeServer.closeAllConnections();
  });
}

/**
 * Stops everything and exits.
 * @param exitCode - Process exit code.
 */
async function shutdown(exitCode: number): Promise<void> {

  LOG.info("Shutting down.");

  await closeServer();

  if(monitor) {

    await monitor.stop();
  }

  if(!usingConsoleLogging) {

    shutdownFileLogger();
  }

  process.exit(exitCode);
}

/**
 * Sets up signal handlers for graceful shutdown.
 */
function setupGracefulShutdown(): void {

  let shutdownInProgress = false;

  const onSignal = (signal: string): void => {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Received %s.", signal);

    void shutdown(0);
  };

  process.on("SIGINT", (): void => onSignal("SIGINT"));
  process.on("SIGTERM", (): void => onSignal("SIGTERM"));
}

/*
 * STATUS SERVER
 *
 * A small local HTTP server exposes /health, /status and /logs. It is optional, binds to the loopback interface by default, and failing to bind never stops the
 * watcher.
 */

/**
 * Creates and configures the Express application for the status server.
 * @param activeMonitor - The running monitor.
 * @returns The configured Express application.
 */
export function buildApp(activeMonitor: MonitorHandle): Express {

  const app = express();

  // Log requests through the same path as application logs, skipping successful health checks which supervisors may poll frequently.
  app.use(morgan(":method :url from :remote-addr responded :status in :response-time ms.", {

    skip: (req, res): boolean => (res.statusCode < 400) && (req.originalUrl || req.url).startsWith("/health"),
    stream: createMorganStream()
  }));

  setupRoutes(app, activeMonitor);

  // Global error handler. Express error handlers require 4 parameters even if unused.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).send("Internal server error");
    }
  });

  return app;
}

/*
 * STARTUP
 */

/**
 * Loads and validates the configuration, starts the monitor and the status server, and installs the shutdown handlers. Returns once everything is running; the
 * monitor then runs until a termination signal arrives.
 * @param options - Startup options.
 */
export async function startWatcher(options: WatcherOptions): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = options.useConsoleLogging;
  setConsoleLogging(options.useConsoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(options.useConsoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  await initializeConfiguration(options.cliOverrides);

  // The log file location and size come from the configuration, so the file logger starts right after it is loaded.
  if(!options.useConsoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  try {

    validateConfiguration();
  } catch(error) {

    exitWithError(error);
  }

  displayConfiguration();

  let activeMonitor: MonitorHandle;

  try {

    activeMonitor = await startMonitor({ config: CONFIG, sink: createNotificationSink(CONFIG) });
  } catch(error) {

    exitWithError(error);
  }

  monitor = activeMonitor;

  setupGracefulShutdown();

  // The monitoring tasks only end on shutdown. If they end any other way something unrecoverable happened, and the watcher exits rather than watching nothing.
  void activeMonitor.done.catch((error: unknown): void => {

    LOG.error("Monitoring stopped unexpectedly: %s.", formatError(error));

    void shutdown(1);
  });

  if(CONFIG.server.enabled) {

    const activeServer = buildApp(activeMonitor).listen(CONFIG.server.port, CONFIG.server.host, (): void => {

      LOG.info("Status server is listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
    });

    activeServer.on("error", (error: Error): void => {

      LOG.warn("Status server unavailable: %s.", formatError(error));

      server = null;
    });

    server = activeServer;
  }
}
