/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * desktop.ts: Desktop notification and alarm sound sink for ChannelWatch.
 */
import { LOG, NotifyError, createAbortError, formatError, quoteName } from "../utils/index.js";
import type { NameChange, Nullable } from "../types/index.js";
import type { NotificationSink } from "./types.js";
import { spawn } from "node:child_process";

/* A change raises one critical desktop notification through notify-send and starts an alarm: the sound file is played with mpv once immediately and then again every
 * alarmRepeatInterval milliseconds, alarmRepeats plays in total. Plays are started on the interval whether or not the previous one has finished. A new change
 * restarts the alarm from the beginning, and stopAlarm() silences it, killing any play that is still sounding.
 *
 * Both commands are resolved through PATH. A missing command or a non-zero exit is a NotifyError.
 */

/**
 * Runs an external command to completion. Aborting the signal kills the command.
 * @param command - The executable name or path.
 * @param args - Command arguments.
 * @param signal - Optional signal that stops the command early.
 * @returns Promise resolving when the command exits successfully.
 */
export type CommandRunner = (command: string, args: string[], signal?: AbortSignal) => Promise<void>;

/**
 * Options for the desktop notifier.
 */
export interface DesktopNotifierOptions {

  // Time between alarm plays in milliseconds.
  alarmRepeatInterval: number;

  // Total number of alarm plays per change.
  alarmRepeats: number;

  // Command runner. Defaults to spawning the command.
  runCommand?: CommandRunner;

  // Path to the alarm sound file.
  soundPath: string;
}

/**
 * Desktop notifier. In addition to the sink contract it can play the alarm sound a single time, which the test command uses.
 */
export interface DesktopNotifier extends NotificationSink {

  /**
   * Plays the alarm sound once and waits for playback to finish.
   */
  playSound(): Promise<void>;

  /**
   * Shows the desktop notification for a name without starting the alarm.
   */
  showNotification(name: string): Promise<void>;
}

/**
 * Builds the notify-send arguments for a change.
 * @param name - The channel's new name.
 * @returns The argument list.
 */
export function buildNotificationArgs(name: string): string[] {

  return [ "-u", "critical", "CHANNEL OPEN", [ "Channel is now: ", name ].join("") ];
}

/**
 * Builds the mpv arguments for one alarm play.
 * @param soundPath - The sound file to play.
 * @returns The argument list.
 */
export function buildSoundArgs(soundPath: string): string[] {

  return [ "--no-video", "--really-quiet", soundPath ];
}

/**
 * Spawns a command with its output discarded and waits for it to exit.
 * @param command - The executable name or path.
 * @param args - Command arguments.
 * @param signal - Aborting it kills the command.
 * @returns Promise resolving on exit code 0, rejecting with NotifyError otherwise, or with an AbortError when the signal was already aborted.
 */
export async function spawnCommand(command: string, args: string[], signal?: AbortSignal): Promise<void> {

  if(signal?.aborted) {

    throw createAbortError();
  }

  return new Promise((resolve, reject) => {

    const child = spawn(command, args, {

      stdio: [ "ignore", "ignore", "ignore" ]
    });

    const onAbort = (): void => {

      child.kill();
    };

    signal?.addEventListener("abort", onAbort, { once: true });
    child.once("close", () => signal?.removeEventListener("abort", onAbort));

    child.on("error", (error: NodeJS.ErrnoException) => {

      if(error.code === "ENOENT") {

        reject(new NotifyError([ command, " is not installed or not on PATH." ].join(""), { cause: error }));

        return;
      }

      reject(new NotifyError([ "Unable to run ", command, ": ", formatError(error), "." ].join(""), { cause: error }));
    });

    child.on("exit", (code, signal) => {

      if(code === 0) {

        resolve();

        return;
      }

      reject(new NotifyError([ command, " exited with ", (code === null) ? [ "signal ", String(signal) ].join("") : [ "code ", String(code) ].join(""), "." ].join("")));
    });
  });
}

/**
 * Creates the desktop notifier.
 * @param options - Notifier options.
 * @returns The notifier.
 */
export function createDesktopNotifier(options: DesktopNotifierOptions): DesktopNotifier {

  const runCommand = options.runCommand ?? spawnCommand;

  let alarmTimer: Nullable<ReturnType<typeof setInterval>> = null;

  // Aborted by stopAlarm() to kill the current alarm's plays.
  let alarmController: Nullable<AbortController> = null;

  // Incremented whenever the alarm is restarted or stopped, so a failing play from an earlier alarm cannot stop a newer one.
  let alarmGeneration = 0;

  async function playSound(signal?: AbortSignal): Promise<void> {

    LOG.debug("notify", "Playing %s.", options.soundPath);

    await runCommand("mpv", buildSoundArgs(options.soundPath), signal);
  }

  function stopAlarm(): void {

    alarmGeneration++;

    if(alarmTimer) {

      clearInterval(alarmTimer);
      alarmTimer = null;
    }

    alarmController?.abort();
    alarmController = null;
  }

  function startAlarm(): void {

    stopAlarm();

    const controller = new AbortController();
    const generation = alarmGeneration;
    let plays = 0;

    alarmController = controller;

    const play = (): void => {

      plays++;

      if(plays >= options.alarmRepeats) {

        if(alarmTimer) {

          clearInterval(alarmTimer);
          alarmTimer = null;
        }
      }

      void playSound(controller.signal).catch((error: unknown) => {

        if(generation !== alarmGeneration) {

          return;
        }

        LOG.error("Alarm playback failed: %s.", formatError(error));

        stopAlarm();
      });
    };

    if(options.alarmRepeats > 1) {

      alarmTimer = setInterval(play, options.alarmRepeatInterval);
    }

    play();
  }

  async function showNotification(name: string): Promise<void> {

    LOG.debug("notify", "Sending desktop notification for %s.", quoteName(name));

    await runCommand("notify-send", buildNotificationArgs(name));
  }

  async function notify(change: NameChange): Promise<void> {

    startAlarm();

    await showNotification(change.current);
  }

  return { notify, playSound, showNotification, stopAlarm };
}
