/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * commands.ts: Process control command handlers for the ChannelWatch CLI.
 */
import type { Config, MonitorStatus, Nullable } from "../types/index.js";
import type { LogEntry, LogStatistics } from "../utils/index.js";
import { computeLogStatistics, delay, findLastKnownName, formatDuration, formatError, readLogFile } from "../utils/index.js";
import { getLogFilePath, getPidFilePath, getSoundPath } from "../config/paths.js";
import { isProcessRunning, readPidFile, removePidFile, writePidFile } from "./pidFile.js";
import { loadUserConfig, mergeConfiguration } from "../config/userConfig.js";
import { createDesktopNotifier } from "../notify/index.js";
import { spawn } from "node:child_process";

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

/**
 * Everything `channelwatch status` reports.
 */
export interface StatusReport {

  // The channel's current name, or null when neither the server nor the log knows it.
  currentName: Nullable<string>;

  // Where the current name came from.
  nameSource: Nullable<"log" | "server">;

  pid: Nullable<number>;

  // The last log entries, oldest first.
  recentEntries: LogEntry[];

  running: boolean;

  stats: LogStatistics;

  // Milliseconds since the watcher was started, when it is running.
  uptime: Nullable<number>;
}

/*
 * PROCESS CONTROL COMMANDS
 *
 * These handlers implement `channelwatch start`, `stop`, `status` and `test`. Each handler prints its output directly to the console and returns an exit code. They
 * read the same configuration layers as the watcher itself so that they agree on the data directory, the log file and the status server port.
 */

// How long start waits before checking that the detached watcher survived its startup.
const STARTUP_CHECK_DELAY = 1500;

// How long stop waits for the watcher to exit after SIGTERM.
const STOP_TIMEOUT = 10000;

// Number of log entries shown by status.
const RECENT_LOG_ENTRIES = 5;

/**
 * Prints a message to stdout.
 * @param message - The message to print.
 */
function print(message: string): void {

  // eslint-disable-next-line no-console
  console.log(message);
}

/**
 * Prints an error message to stderr.
 * @param message - The error message to print.
 */
function printError(message: string): void {

  // eslint-disable-next-line no-console
  console.error(message);
}

/**
 * Loads the configuration the way the watcher does, without validating it.
 * @param cliOverrides - Setting paths mapped to values given on the command line.
 * @returns The merged configuration.
 */
async function loadCommandConfig(cliOverrides: Record<string, unknown>): Promise<Config> {

  const result = await loadUserConfig();

  return mergeConfiguration(result.config, process.env, cliOverrides);
}

/**
 * Fetches the live monitor snapshot from the status server.
 * @param config - The configuration, for the server address.
 * @returns The snapshot, or null when the server is disabled or unreachable.
 */
async function fetchMonitorStatus(config: Config): Promise<Nullable<MonitorStatus>> {

  if(!config.server.enabled) {

    return null;
  }

  // A wildcard bind address is reachable through loopback.
  const host = [ "0.0.0.0", "::" ].includes(config.server.host) ? "127.0.0.1" : config.server.host;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), 3000);

  try {

    const response = await fetch([ "http://", host.includes(":") ? [ "[", host, "]" ].join("") : host, ":", String(config.server.port), "/status" ].join(""),
      { signal: controller.signal });

    if(!response.ok) {

      return null;
    }

    return await response.json() as MonitorStatus;
  } catch {

    return null;
  } finally {

    clearTimeout(timeoutId);
  }
}

/**
 * Formats a status report for the terminal.
 * @param report - The report.
 * @returns The lines to print.
 */
export function formatStatusReport(report: StatusReport): string[] {

  const lines = [ "ChannelWatch Status", "─".repeat(40) ];

  lines.push("Running:         " + (report.running ? "Yes" : "No"));

  if(report.running && (report.pid !== null)) {

    lines.push("PID:             " + String(report.pid));
  }

  if(report.uptime !== null) {

    lines.push("Uptime:          " + formatDuration(report.uptime));
  }

  lines.push("Current name:    " + ((report.currentName === null) ? "(unknown)" : [ JSON.stringify(report.currentName), " (from ", report.nameSource ?? "log", ")" ].join("")));

  lines.push("");
  lines.push("Log statistics:");
  lines.push("  Gateway detections: " + String(report.stats.gatewayDetections));
  lines.push("  Poll detections:    " + String(report.stats.pollDetections));
  lines.push("  Poll cycles:        " + String(report.stats.pollCycles));
  lines.push("  Heartbeat ACKs:     " + String(report.stats.heartbeatAcks));
  lines.push("  Reconnects:         " + String(report.stats.reconnects));
  lines.push("  Alarms raised:      " + String(report.stats.alarms));

  lines.push("");
  lines.push("Recent log entries:");

  if(report.recentEntries.length === 0) {

    lines.push("  (none)");
  }

  for(const entry of report.recentEntries) {

    lines.push([ "  [", entry.timestamp, "] ", (entry.level === "info") ? "" : [ "[", entry.level.toUpperCase(), "] " ].join(""), entry.message ].join(""));
  }

  return lines;
}

/**
 * Prints usage information for the process control commands.
 */
export function printServiceUsage(): void {

  print("Process control:");
  print("  start               Start the watcher in the background");
  print("  stop                Stop the background watcher");
  print("  status              Show running state, current name, event statistics and recent log lines");
  print("  test                Raise one test notification and play the alarm sound once");
}

/**
 * Handles `channelwatch start`. Re-launches this program detached with the same options and records its PID.
 * @param forwardedArgs - Options to pass to the detached watcher.
 * @returns Exit code (0 for success, 1 for error).
 */
export async function handleStart(forwardedArgs: string[]): Promise<number> {

  const pidFilePath = getPidFilePath();
  const existing = await readPidFile(pidFilePath);

  if(existing?.running) {

    print("ChannelWatch is already running (PID " + String(existing.pid) + ").");

    return 0;
  }

  if(existing) {

    await removePidFile(pidFilePath);
  }

  const entryScript = process.argv[1];

  const child = spawn(process.execPath, [ ...process.execArgv, entryScript, ...forwardedArgs ], {

    detached: true,
    env: process.env,
    stdio: "ignore"
  });

  const pid = child.pid;

  if(pid === undefined) {

    printError("Error: Failed to start the watcher.");

    return 1;
  }

  child.unref();

  await writePidFile(pidFilePath, pid);

  await delay(STARTUP_CHECK_DELAY);

  if(!isProcessRunning(pid)) {

    await removePidFile(pidFilePath);

    printError("Error: The watcher exited during startup. Run 'channelwatch' in the foreground or check the log for the reason.");

    return 1;
  }

  print("ChannelWatch started (PID " + String(pid) + ").");

  return 0;
}

/**
 * Handles `channelwatch stop`. Sends SIGTERM to the recorded process and waits for it to exit.
 * @returns Exit code (0 for success, 1 for error).
 */
export async function handleStop(): Promise<number> {

  const pidFilePath = getPidFilePath();
  const existing = await readPidFile(pidFilePath);

  if(!existing) {

    print("ChannelWatch is not running.");

    return 0;
  }

  if(!existing.running) {

    await removePidFile(pidFilePath);

    print("ChannelWatch is not running. Removed a stale PID file.");

    return 0;
  }

  print("Stopping ChannelWatch (PID " + String(existing.pid) + ")...");

  try {

    process.kill(existing.pid, "SIGTERM");
  } catch(error) {

    printError("Error: Failed to signal the watcher: " + formatError(error) + ".");

    return 1;
  }

  const deadline = Date.now() + STOP_TIMEOUT;

  while(isProcessRunning(existing.pid)) {

    if(Date.now() >= deadline) {

      printError("Error: The watcher did not exit within " + formatDuration(STOP_TIMEOUT) + ".");

      return 1;
    }

    // eslint-disable-next-line no-await-in-loop
    await delay(200);
  }

  await removePidFile(pidFilePath);

  print("ChannelWatch stopped.");

  return 0;
}

/**
 * Builds the status report from the PID file, the status server and the log.
 * @param config - The configuration.
 * @returns The report.
 */
export async function collectStatus(config: Config): Promise<StatusReport> {

  const pidInfo = await readPidFile(getPidFilePath());
  const running = pidInfo?.running ?? false;
  const entries = await readLogFile(getLogFilePath(config));
  const liveStatus = running ? await fetchMonitorStatus(config) : null;

  let currentName: Nullable<string> = null;
  let nameSource: StatusReport["nameSource"] = null;

  if(liveStatus && (liveStatus.channel.name !== null)) {

    currentName = liveStatus.channel.name;
    nameSource = "server";
  } else {

    currentName = findLastKnownName(entries);
    nameSource = (currentName === null) ? null : "log";
  }

  return {

    currentName,
    nameSource,
    pid: pidInfo?.pid ?? null,
    recentEntries: entries.slice(-RECENT_LOG_ENTRIES),
    running,
    stats: computeLogStatistics(entries),
    uptime: (running && pidInfo) ? (Date.now() - pidInfo.startedAt.getTime()) : null
  };
}

/**
 * Handles `channelwatch status`.
 * @param cliOverrides - Setting paths mapped to values given on the command line.
 * @returns Exit code (0 when running, 3 when not running).
 */
export async function handleStatus(cliOverrides: Record<string, unknown>): Promise<number> {

  const config = await loadCommandConfig(cliOverrides);
  const report = await collectStatus(config);

  for(const line of formatStatusReport(report)) {

    print(line);
  }

  if(!report.running && (report.pid !== null)) {

    await removePidFile(getPidFilePath());
  }

  return report.running ? 0 : 3;
}

/**
 * Handles `channelwatch test`. Shows one notification and plays the alarm sound once, reporting either failure.
 * @param cliOverrides - Setting paths mapped to values given on the command line.
 * @returns Exit code (0 for success, 1 for error).
 */
export async function handleTest(cliOverrides: Record<string, unknown>): Promise<number> {

  const config = await loadCommandConfig(cliOverrides);
  const notifier = createDesktopNotifier({ alarmRepeatInterval: config.notify.alarmRepeatInterval, alarmRepeats: 1, soundPath: getSoundPath(config) });

  let exitCode = 0;

  print("Sending a test notification...");

  try {

    await notifier.showNotification("test notification");
  } catch(error) {

    printError("Error: " + formatError(error) + ".");

    exitCode = 1;
  }

  print("Playing " + getSoundPath(config) + "...");

  try {

    await notifier.playSound();
  } catch(error) {

    printError("Error: " + formatError(error) + ".");

    exitCode = 1;
  }

  if(exitCode === 0) {

    print("Notification and sound are working.");
  }

  return exitCode;
}
