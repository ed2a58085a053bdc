/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pidFile.ts: PID file management for the detached watcher.
 */
import type { Nullable } from "../types/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* `channelwatch start` records the detached watcher's process ID in a PID file. The file's modification time doubles as the start time, which is how status reports
 * uptime without asking the running process. A PID file whose process no longer exists is stale and is removed by whichever command finds it.
 */

/**
 * What the PID file says about the watcher.
 */
export interface PidFileInfo {

  pid: number;

  // Whether a process with this ID exists.
  running: boolean;

  // When the PID file was written.
  startedAt: Date;
}

/**
 * Checks whether a process exists. Signal 0 performs the permission and existence checks without delivering a signal. EPERM means the process exists but belongs
 * to another user.
 * @param pid - The process ID.
 * @returns True if the process exists.
 */
export function isProcessRunning(pid: number): boolean {

  try {

    process.kill(pid, 0);

    return true;
  } catch(error) {

    return (error as NodeJS.ErrnoException).code === "EPERM";
  }
}

/**
 * Reads the PID file.
 * @param pidFilePath - The PID file.
 * @returns The recorded process, or null when there is no PID file or it does not hold a process ID.
 */
export async function readPidFile(pidFilePath: string): Promise<Nullable<PidFileInfo>> {

  let content: string;
  let stats: fs.Stats;

  try {

    [ content, stats ] = await Promise.all([ fsPromises.readFile(pidFilePath, "utf-8"), fsPromises.stat(pidFilePath) ]);
  } catch(error) {

    if((error as NodeJS.ErrnoException).code === "ENOENT") {

      return null;
    }

    throw error;
  }

  const pid = parseInt(content.trim(), 10);

  if(!Number.isInteger(pid) || (pid < 1)) {

    return null;
  }

  return { pid, running: isProcessRunning(pid), startedAt: stats.mtime };
}

/**
 * Writes the PID file, creating its directory if needed.
 * @param pidFilePath - The PID file.
 * @param pid - The process ID to record.
 */
export async function writePidFile(pidFilePath: string, pid: number): Promise<void> {

  await fsPromises.mkdir(path.dirname(pidFilePath), { recursive: true });
  await fsPromises.writeFile(pidFilePath, [ String(pid), "\n" ].join(""), "utf-8");
}

/**
 * Removes the PID file. A missing file is not an error.
 * @param pidFilePath - The PID file.
 */
export async function removePidFile(pidFilePath: string): Promise<void> {

  await fsPromises.rm(pidFilePath, { force: true });
}
