/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for ChannelWatch.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import type { LogEntry } from "./logEmitter.js";
import df from "dateformat";
import { emitLogEntry } from "./logEmitter.js";
import { format } from "util";
import { getSourceTag } from "./sourceContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes for log output formatting. Warnings appear in yellow and errors in red. The reset code restores the default color after each colored
 * message.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/* The logger operates in one of two modes: console mode (stdout/stderr with colors, timestamps added by console-stamp) or file mode (the buffered file logger). File
 * mode is the default so that a detached watcher keeps a log the status command can read. Console mode is enabled with the --console CLI flag.
 */

// Flag indicating whether to use console logging instead of file logging.
let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging, false for file logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging, false if using file logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables debug logging. When called with true, initializes the debug filter with wildcard (*) to enable all categories.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/* The LOG object provides a centralized logging interface with color-coded output and printf-style format strings. All methods accept a format string followed by
 * optional arguments, using Node's util.format() for interpolation.
 *
 * The observation source is detected via AsyncLocalStorage. Inside runWithSourceContext(), messages are prefixed with the source tag so gateway and poll output can
 * be told apart when grepping the log. Outside a source context, LOG.withSource() creates a bound logger.
 */

/**
 * Core logging implementation shared by all log levels. Handles source prefixing, subscriber emission, and output routing.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param explicitSource - Optional explicit source tag (used by the withSource helper).
 * @param categoryTag - Optional debug category tag for category-filtered debug messages.
 */
function logWithLevel(level: LogEntry["level"], color: string, message: string, args: unknown[], explicitSource?: string, categoryTag?: string): void {

  const source = explicitSource ?? getSourceTag();
  const formatted = args.length > 0 ? format(message, ...args) : message;
  const logMessage = source ? [ "[", source, "] ", formatted ].join("") : formatted;

  const entry: LogEntry = { level, message: logMessage, timestamp: df(new Date(), "yyyy/mm/dd HH:MM:ss.l") };

  if(categoryTag) {

    entry.categoryTag = categoryTag;
  }

  emitLogEntry(entry);

  if(useConsoleLogging) {

    /* eslint-disable no-console */
    let consoleMethod;

    switch(level) {

      case "error": {

        consoleMethod = console.error;

        break;
      }

      case "warn": {

        consoleMethod = console.warn;

        break;
      }

      default: {

        consoleMethod = console.log;

        break;
      }
    }
    /* eslint-enable no-console */

    if(color) {

      consoleMethod("%s%s%s", color, logMessage, ANSI_COLORS.reset);
    } else {

      consoleMethod(logMessage);
    }
  } else {

    writeLogEntry(level, logMessage, color || undefined, categoryTag);
  }
}

/**
 * Bound logger interface returned by LOG.withSource(). Provides the same logging methods but with a fixed source tag.
 */
export interface BoundLogger {

  debug: (category: string, message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

export const LOG = {

  /**
   * Logs a debug message in cyan, filtered by category. Debug messages are only output when the category is enabled via CHANNELWATCH_DEBUG or the --debug flag.
   * @param category - The debug category (e.g., "gateway:frames", "poll").
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, undefined, category);
  },

  /**
   * Logs an error message in red. Use this for failures that stop something from working, such as an invalid configuration or an alert that could not be raised.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for recoverable faults such as a lost connection or a failed poll.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  },

  /**
   * Creates a bound logger with a fixed source tag, for code that runs outside a source context such as timer callbacks.
   *
   * Example:
   *   const log = LOG.withSource("gateway");
   *   log.warn("Heartbeat acknowledgement missed.");
   *
   * @param source - The source tag to include in all log messages.
   * @returns A logger object with debug, error, warn, and info methods that include the specified tag.
   */
  withSource: function(source: string): BoundLogger {

    return {

      debug: (category: string, message: string, ...args: unknown[]): void => {

        if(isAnyDebugEnabled() && isCategoryEnabled(category)) {

          logWithLevel("debug", ANSI_COLORS.cyan, message, args, source, category);
        }
      },
      error: (message: string, ...args: unknown[]): void => { logWithLevel("error", ANSI_COLORS.red, message, args, source); },
      info: (message: string, ...args: unknown[]): void => { logWithLevel("info", "", message, args, source); },
      warn: (message: string, ...args: unknown[]): void => { logWithLevel("warn", ANSI_COLORS.yellow, message, args, source); }
    };
  }
};
