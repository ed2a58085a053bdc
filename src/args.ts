/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * args.ts: Command-line parsing for ChannelWatch.
 */
import { ConfigError } from "./utils/index.js";
import path from "node:path";

/**
 * Commands the CLI accepts. "run" is the default and runs the watcher in the foreground.
 */
export type CliCommand = "run" | "start" | "status" | "stop" | "test";

const COMMANDS: readonly CliCommand[] = [ "run", "start", "status", "stop", "test" ];

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  command: CliCommand;
  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;

  // Options to hand to the detached watcher started by `start`.
  forwardedArgs: string[];

  help: boolean;
  listEnv: boolean;
  logFile?: string;
  version: boolean;
}

/**
 * Reads the path value of a flag and checks that it is absolute.
 * @param flag - The CLI flag name for the error message.
 * @param value - The value following the flag, if any.
 * @returns The path.
 * @throws ConfigError when the value is missing or relative.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    throw new ConfigError([ flag, " requires a path argument." ].join(""));
  }

  if(!path.isAbsolute(value)) {

    throw new ConfigError([ flag, " requires an absolute path, got: ", value ].join(""));
  }

  return value;
}

/**
 * Parses command-line arguments. Values are returned rather than written to CONFIG so the configuration merge can apply them at the correct priority level.
 * @param args - Arguments after the program name.
 * @returns Parsed command, flags and values.
 * @throws ConfigError for an unknown command or option, or an invalid path.
 */
export function parseArgs(args: string[]): ParsedArgs {

  const parsed: ParsedArgs = { command: "run", consoleLogging: false, debugLogging: false, forwardedArgs: [], help: false, listEnv: false, version: false };

  let commandSeen = false;

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console": {

        parsed.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        parsed.debugLogging = true;
        parsed.forwardedArgs.push(arg);

        break;
      }

      case "-h":
      case "--help": {

        parsed.help = true;

        break;
      }

      case "-v":
      case "--version": {

        parsed.version = true;

        break;
      }

      case "--list-env": {

        parsed.listEnv = true;

        break;
      }

      case "--data-dir": {

        parsed.dataDir = requireAbsolutePath(arg, args[++i]);
        parsed.forwardedArgs.push(arg, parsed.dataDir);

        break;
      }

      case "--log-file": {

        parsed.logFile = requireAbsolutePath(arg, args[++i]);
        parsed.forwardedArgs.push(arg, parsed.logFile);

        break;
      }

      default: {

        const command = COMMANDS.find((candidate) => candidate === arg);

        if(!command || commandSeen) {

          throw new ConfigError(arg.startsWith("-") ? [ "Unknown option '", arg, "'." ].join("") : [ "Unknown command '", arg, "'." ].join(""));
        }

        commandSeen = true;
        parsed.command = command;

        break;
      }
    }
  }

  return parsed;
}

/**
 * Converts parsed flags into configuration overrides keyed by setting path.
 * @param parsed - Parsed arguments.
 * @returns The overrides.
 */
export function toCliOverrides(parsed: ParsedArgs): Record<string, unknown> {

  const overrides: Record<string, unknown> = {};

  if(parsed.logFile) {

    overrides["paths.logFile"] = parsed.logFile;
  }

  return overrides;
}
