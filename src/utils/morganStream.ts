/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for the ChannelWatch status server.
 */
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/* Morgan writes to stdout by default. This adapter sends status server request lines down the same path as application logs: timestamped console output in console
 * mode, the file logger (which adds its own timestamp) otherwise. Request lines are tagged "[http]" so the status command's log statistics never count them.
 */

/**
 * Creates a Morgan stream options object that routes request log lines based on the logging mode.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      const line = [ "[http] ", message.trim() ].join("");

      if(isConsoleLogging()) {

        // eslint-disable-next-line no-console
        console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", line ].join(""));
      } else {

        writeLogEntry("info", line);
      }
    }
  };
}
