/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for ChannelWatch.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for filesystem paths. The data directory is resolved once at startup via initializeDataDir(), before config.json is
 * loaded, because the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (CHANNELWATCH_DATA_DIR)
 *   3. Default (~/.channelwatch)
 *
 * The PID file always lives in the data directory so that start, stop and status agree on it without loading any configuration.
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. May be called a second time with a CLI flag to override the initial
 * resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.CHANNELWATCH_DATA_DIR;

  if(cliDataDir) {

    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      // eslint-disable-next-line no-console
      console.error("Error: CHANNELWATCH_DATA_DIR must be an absolute path, got: " + envDataDir);

      process.exit(1);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".channelwatch");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the path to the PID file written by `channelwatch start`.
 * @returns The absolute path to channelwatch.pid inside the data directory.
 */
export function getPidFilePath(): string {

  return path.join(getDataDir(), "channelwatch.pid");
}

/**
 * Returns the log file path. When config.paths.logFile is set, that absolute path is used directly.
 * @param config - The application configuration.
 * @returns The absolute path to the log file.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "channelwatch.log");
}

/**
 * Returns the alarm sound path. When config.notify.soundPath is set, that path is used directly.
 * @param config - The application configuration.
 * @returns The path to the alarm sound file.
 */
export function getSoundPath(config: Config): string {

  return config.notify.soundPath ?? path.join(getDataDir(), "boom.mp3");
}
