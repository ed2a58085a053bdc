#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for ChannelWatch.
 */
import { CONFIG_METADATA, describeDefault } from "./config/userConfig.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { handleStart, handleStatus, handleStop, handleTest, printServiceUsage } from "./service/index.js";
import { parseArgs, toCliOverrides } from "./args.js";
import type { ParsedArgs } from "./args.js";
import dotenv from "dotenv";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import { initializeDataDir } from "./config/paths.js";
import { startWatcher } from "./app.js";

/* These handlers catch unhandled promise rejections and uncaught exceptions so that a fault in one observation loop does not take the other down with it. The
 * handlers log the error and allow the process to continue. Connection faults are handled by the reconnect supervisor and poll faults by the poller.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: channelwatch [command] [options]");
  console.log("");
  console.log("Watches one channel's name and raises a desktop alert the moment it changes.");
  console.log("");
  console.log("Commands:");
  console.log("  run                 Run the watcher in the foreground (default)");
  printServiceUsage();
  console.log("");
  console.log("Options:");
  console.log("  -c, --console       Log to console instead of file");
  console.log("  -d, --debug         Enable debug logging for every category");
  console.log("  -h, --help          Show this help message");
  console.log("  -v, --version       Show version number");
  console.log("  --data-dir <path>   Set data directory (default: ~/.channelwatch)");
  console.log("  --list-env          List all environment variables");
  console.log("  --log-file <path>   Set log file path (default: <data-dir>/channelwatch.log)");
  console.log("");
  console.log("Required Environment Variables:");
  console.log("  DISCORD_TOKEN       Credential used for the gateway and the REST API");
  console.log("  CHANNEL_ID          ID of the channel to watch");
  console.log("");
  console.log("  Run 'channelwatch --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints every environment variable from CONFIG_METADATA, organized by category.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */
  const categoryOrder: { displayName: string, key: string }[] = [
    { displayName: "Watch", key: "watch" },
    { displayName: "Gateway", key: "gateway" },
    { displayName: "Poll", key: "poll" },
    { displayName: "Recovery", key: "recovery" },
    { displayName: "Notify", key: "notify" },
    { displayName: "Status Server", key: "server" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" }
  ];

  // Defaults that are resolved against the data directory at runtime.
  const dynamicDefaults: Record<string, string> = {

    "notify.soundPath": "<data-dir>/boom.mp3",
    "paths.logFile": "<data-dir>/channelwatch.log"
  };

  console.log("ChannelWatch Environment Variables");
  console.log("");
  console.log("Settings can also be placed in <data-dir>/config.json, or in a .env file in the working directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    console.log("");
    console.log(category.displayName + ":");

    for(const setting of CONFIG_METADATA[category.key]) {

      if(!setting.envVar) {

        continue;
      }

      console.log("");
      console.log("  " + setting.envVar);
      console.log("    " + setting.description);
      console.log("    Default: " + (dynamicDefaults[setting.path] ?? describeDefault(setting)));
    }
  }

  console.log("");
  console.log("Special:");
  console.log("");
  console.log("  CHANNELWATCH_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.channelwatch");
  console.log("");
  console.log("  CHANNELWATCH_DEBUG");
  console.log("    Debug category filter (e.g., 'gateway', 'poll,heartbeat', '*,-gateway:frames'). Categories:");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("      " + entry.category.padEnd(16) + entry.description);
  }

  console.log("    Default: (disabled)");
  /* eslint-enable no-console */
}

/**
 * Runs the parsed command.
 * @param parsedArgs - Parsed arguments.
 * @returns Exit code, or null when the watcher keeps running.
 */
async function runCommand(parsedArgs: ParsedArgs): Promise<number | null> {

  const cliOverrides = toCliOverrides(parsedArgs);

  switch(parsedArgs.command) {

    case "start": {

      return handleStart(parsedArgs.forwardedArgs);
    }

    case "stop": {

      return handleStop();
    }

    case "status": {

      return handleStatus(cliOverrides);
    }

    case "test": {

      return handleTest(cliOverrides);
    }

    default: {

      /* Safety net for exit paths that bypass graceful shutdown, such as a fatal startup error. The 'exit' event runs synchronously, so buffered log entries are
       * flushed synchronously.
       */
      process.on("exit", (): void => {

        flushLogBufferSync();
      });

      await startWatcher({ cliOverrides, useConsoleLogging: parsedArgs.consoleLogging });

      return null;
    }
  }
}

let parsedArgs: ParsedArgs;

try {

  parsedArgs = parseArgs(process.argv.slice(2));
} catch(error) {

  // eslint-disable-next-line no-console
  console.error("Error: " + formatError(error) + ". Run 'channelwatch --help' for usage.");

  process.exit(1);
}

if(parsedArgs.help) {

  printUsage();

  process.exit(0);
}

if(parsedArgs.version) {

  // eslint-disable-next-line no-console
  console.log("ChannelWatch v" + getPackageVersion());

  process.exit(0);
}

if(parsedArgs.listEnv) {

  printEnvironmentVariables();

  process.exit(0);
}

// A .env file in the working directory supplies environment variables that are not already set.
const envResult = dotenv.config();

if(envResult.error && ((envResult.error as NodeJS.ErrnoException).code !== "ENOENT")) {

  // eslint-disable-next-line no-console
  console.error("Error: Unable to read .env: " + formatError(envResult.error) + ".");

  process.exit(1);
}

initializeDataDir(parsedArgs.dataDir);

// The CHANNELWATCH_DEBUG environment variable takes precedence over the --debug CLI flag, allowing fine-grained category selection.
const debugEnv = process.env.CHANNELWATCH_DEBUG;

if(debugEnv) {

  initDebugFilter(debugEnv);
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

runCommand(parsedArgs).then((exitCode) => {

  if(exitCode !== null) {

    process.exit(exitCode);
  }
}).catch((error: unknown): void => {

  LOG.error("Fatal error occurred: %s.", formatError(error));

  // eslint-disable-next-line no-console
  console.error("Error: " + formatError(error) + ".");

  process.exit(1);
});
