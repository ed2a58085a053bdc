/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: File-based logging with automatic size-based trimming for ChannelWatch.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* A detached watcher has no terminal, so its log file is both the operator's record and the input of the status command, which greps it for connection, heartbeat,
 * poll and change lines. Entries are buffered and flushed once a second. When the file grows past the configured maximum it is trimmed to half that size, keeping
 * the most recent complete lines. Timestamps use the same format as console-stamp in console mode: yyyy/mm/dd HH:MM:ss.l
 */

// Path to the log file, set during initialization.
let logFilePath: Nullable<string> = null;

// Buffer for collecting log entries before flushing to disk.
let writeBuffer: string[] = [];

// Approximate file size tracked in memory between actual file size checks.
let approximateSize = 0;

// Counter for tracking writes since last file size check.
let writeCount = 0;

// Timer for periodic buffer flushing.
let flushTimer: Nullable<ReturnType<typeof setInterval>> = null;

// Timestamp when logging was disabled after a write error, or zero while logging is healthy.
let disabledAt = 0;

// Maximum log file size, set during initialization.
let maxLogSize = 1048576;

// Interval in milliseconds between buffer flushes.
const FLUSH_INTERVAL_MS = 1000;

// Number of writes between file size checks.
const SIZE_CHECK_FREQUENCY = 100;

// Duration in milliseconds to disable logging after a write error before retrying.
const ERROR_RETRY_DELAY_MS = 60000;

const ANSI_RESET = "\x1b[0m";

/**
 * Initializes the file logger, creating the log file and its directory if needed.
 * @param logPath - Absolute path to the log file, resolved by the caller via getLogFilePath().
 * @param maxSize - Maximum log file size in bytes from CONFIG.logging.maxSize.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  maxLogSize = maxSize;

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });

    try {

      const stats = await fsPromises.stat(logPath);

      approximateSize = stats.size;
    } catch(error) {

      if((error as NodeJS.ErrnoException).code !== "ENOENT") {

        throw error;
      }

      await fsPromises.writeFile(logPath, "", "utf-8");
      approximateSize = 0;
    }

    logFilePath = logPath;

    flushTimer = setInterval((): void => {

      void flushLogBuffer();
    }, FLUSH_INTERVAL_MS);

    // The flush timer must not keep the process alive on its own.
    flushTimer.unref();
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Formats a log line the way it is written to the file.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code.
 * @param categoryTag - Optional debug category tag, appended to the level prefix as [DEBUG:category].
 * @param now - Timestamp of the entry.
 * @returns The complete line including the trailing newline.
 */
export function formatLogLine(level: string, message: string, color?: string, categoryTag?: string, now = new Date()): string {

  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  return [ "[", df(now, "yyyy/mm/dd HH:MM:ss.l"), "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join("");
}

/**
 * Writes a log entry to the buffer. Entries are flushed to disk periodically.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code to apply to the level prefix and message.
 * @param categoryTag - Optional debug category tag.
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!logFilePath) {

    return;
  }

  if(disabledAt) {

    if((Date.now() - disabledAt) < ERROR_RETRY_DELAY_MS) {

      return;
    }

    disabledAt = 0;
  }

  const entry = formatLogLine(level, message, color, categoryTag);

  writeBuffer.push(entry);
  approximateSize += entry.length;
  writeCount++;

  if((writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void checkAndTrimFile();
  }
}

/**
 * Flushes the write buffer to disk asynchronously. Called periodically by the flush timer.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    await fsPromises.appendFile(logFilePath, content, "utf-8");
  } catch(error) {

    // Disable logging temporarily to prevent an error cascade.
    disabledAt = Date.now();

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.",
      (error instanceof Error) ? error.message : String(error), ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Flushes the write buffer to disk synchronously. Used on exit so the final lines, including the shutdown marker, reach the file.
 */
export function flushLogBufferSync(): void {

  if(!logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    fs.appendFileSync(logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Checks the actual file size and trims if it exceeds the maximum.
 */
async function checkAndTrimFile(): Promise<void> {

  if(!logFilePath) {

    return;
  }

  try {

    const stats = await fsPromises.stat(logFilePath);

    approximateSize = stats.size;

    // Not trimmed while debug output is enabled.
    if((approximateSize > maxLogSize) && !isAnyDebugEnabled()) {

      await trimLogFile(logFilePath);
    }
  } catch(error) {

    if((error as NodeJS.ErrnoException).code === "ENOENT") {

      approximateSize = 0;
    }

    // eslint-disable-next-line no-console
    console.warn("Error checking log file size: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Trims the log file to half the maximum size, keeping only complete lines. Writes to a temporary file and renames it over the original.
 * @param filePath - The log file.
 */
async function trimLogFile(filePath: string): Promise<void> {

  try {

    const content = await fsPromises.readFile(filePath, "utf-8");
    const cutPosition = content.length - Math.floor(maxLogSize / 2);

    if(cutPosition <= 0) {

      return;
    }

    // Keep complete lines only: start after the first newline past the cut.
    const newline = content.indexOf("\n", cutPosition);
    const trimmedContent = content.substring((newline === -1) ? cutPosition : (newline + 1));
    const tempPath = filePath + ".tmp";

    await fsPromises.writeFile(tempPath, trimmedContent, "utf-8");
    await fsPromises.rename(tempPath, filePath);

    approximateSize = trimmedContent.length;
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Shuts down the file logger, flushing any remaining buffer synchronously.
 */
export function shutdownFileLogger(): void {

  if(flushTimer) {

    clearInterval(flushTimer);
    flushTimer = null;
  }

  flushLogBufferSync();

  logFilePath = null;
}
