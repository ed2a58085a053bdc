/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * desktop.test.ts: Tests for the desktop notifier and the alarm schedule.
 */
import { NotifyError, subscribeToLogs } from "../utils/index.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildNotificationArgs, buildSoundArgs, createDesktopNotifier, createLoggingSink, createNotificationSink, spawnCommand } from "./index.js";
import type { NameChange } from "../types/index.js";
import { mergeConfiguration } from "../config/userConfig.js";

function change(current: string): NameChange {

  return { current, observedAt: new Date(), previous: "general", source: "gateway" };
}

interface Invocation {

  args: string[];
  command: string;
}

function createRunner(fail: Record<string, Error> = {}): { calls: Invocation[], runCommand: (command: string, args: string[]) => Promise<void> } {

  const calls: Invocation[] = [];

  return {

    calls,
    runCommand: async (command: string, args: string[]): Promise<void> => {

      calls.push({ args, command });

      const error = fail[command];

      return error ? Promise.reject(error) : Promise.resolve();
    }
  };
}

function countCalls(calls: Invocation[], command: string): number {

  return calls.filter((call) => call.command === command).length;
}

describe("command arguments", () => {

  it("builds a critical notification naming the new channel", () => {

    expect(buildNotificationArgs("general-renamed")).toEqual([ "-u", "critical", "CHANNEL OPEN", "Channel is now: general-renamed" ]);
  });

  it("plays the sound without video or console output", () => {

    expect(buildSoundArgs("/tmp/boom.mp3")).toEqual([ "--no-video", "--really-quiet", "/tmp/boom.mp3" ]);
  });
});

describe("createDesktopNotifier", () => {

  let messages: string[];
  let unsubscribe: () => void;

  beforeEach(() => {

    vi.useFakeTimers();

    messages = [];
    unsubscribe = subscribeToLogs((entry) => messages.push(entry.message));
  });

  afterEach(() => {

    unsubscribe();
    vi.useRealTimers();
  });

  it("starts the alarm and shows one notification", async () => {

    const runner = createRunner();
    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 3, runCommand: runner.runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.notify(change("general-renamed"));

    expect(runner.calls).toEqual([

      { args: [ "--no-video", "--really-quiet", "/tmp/boom.mp3" ], command: "mpv" },
      { args: [ "-u", "critical", "CHANNEL OPEN", "Channel is now: general-renamed" ], command: "notify-send" }
    ]);

    notifier.stopAlarm();
  });

  it("repeats the sound on its interval until the configured number of plays", async () => {

    const runner = createRunner();
    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 3, runCommand: runner.runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.notify(change("general-renamed"));

    await vi.advanceTimersByTimeAsync(999);

    expect(countCalls(runner.calls, "mpv")).toBe(1);

    await vi.advanceTimersByTimeAsync(1);

    expect(countCalls(runner.calls, "mpv")).toBe(2);

    await vi.advanceTimersByTimeAsync(10000);

    expect(countCalls(runner.calls, "mpv")).toBe(3);
    expect(countCalls(runner.calls, "notify-send")).toBe(1);
  });

  it("silences the alarm on stop", async () => {

    const runner = createRunner();
    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 10, runCommand: runner.runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.notify(change("general-renamed"));

    notifier.stopAlarm();

    await vi.advanceTimersByTimeAsync(10000);

    expect(countCalls(runner.calls, "mpv")).toBe(1);
  });

  it("kills plays that are still sounding when the alarm stops", async () => {

    const signals: AbortSignal[] = [];

    // Plays last until they are killed.
    const runCommand = async (command: string, _args: string[], signal?: AbortSignal): Promise<void> => {

      if((command !== "mpv") || !signal) {

        return Promise.resolve();
      }

      signals.push(signal);

      return new Promise<void>((_resolve, reject) => {

        signal.addEventListener("abort", () => reject(new NotifyError("mpv exited with signal SIGTERM.")), { once: true });
      });
    };

    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 3, runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.notify(change("general-renamed"));
    await vi.advanceTimersByTimeAsync(1000);

    expect(signals).toHaveLength(2);
    expect(signals.some((signal) => signal.aborted)).toBe(false);

    notifier.stopAlarm();
    await vi.advanceTimersByTimeAsync(10000);

    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
    expect(messages).toEqual([]);
  });

  it("kills the previous alarm's plays when a new change restarts it", async () => {

    const signals: AbortSignal[] = [];
    const runCommand = async (command: string, _args: string[], signal?: AbortSignal): Promise<void> => {

      if((command === "mpv") && signal) {

        signals.push(signal);
      }

      return Promise.resolve();
    };

    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 1, runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.notify(change("first"));
    await notifier.notify(change("second"));

    expect(signals.map((signal) => signal.aborted)).toEqual([ true, false ]);
  });

  it("restarts the alarm for a new change", async () => {

    const runner = createRunner();
    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 3, runCommand: runner.runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.notify(change("first"));
    await vi.advanceTimersByTimeAsync(1000);

    expect(countCalls(runner.calls, "mpv")).toBe(2);

    await notifier.notify(change("second"));
    await vi.advanceTimersByTimeAsync(10000);

    expect(countCalls(runner.calls, "mpv")).toBe(5);
  });

  it("stops the alarm and logs when playback fails", async () => {

    const runner = createRunner({ mpv: new NotifyError("mpv is not installed or not on PATH.") });
    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 10, runCommand: runner.runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.notify(change("general-renamed"));
    await vi.advanceTimersByTimeAsync(10000);

    expect(countCalls(runner.calls, "mpv")).toBe(1);
    expect(messages).toEqual([ "Alarm playback failed: mpv is not installed or not on PATH." ]);
  });

  it("rejects when the notification cannot be shown", async () => {

    const runner = createRunner({ "notify-send": new NotifyError("notify-send exited with code 1.") });
    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 1, runCommand: runner.runCommand, soundPath: "/tmp/boom.mp3" });

    await expect(notifier.notify(change("general-renamed"))).rejects.toThrow("notify-send exited with code 1.");
  });

  it("plays the sound a single time on request", async () => {

    const runner = createRunner();
    const notifier = createDesktopNotifier({ alarmRepeatInterval: 1000, alarmRepeats: 10, runCommand: runner.runCommand, soundPath: "/tmp/boom.mp3" });

    await notifier.playSound();
    await vi.advanceTimersByTimeAsync(10000);

    expect(runner.calls).toEqual([ { args: [ "--no-video", "--really-quiet", "/tmp/boom.mp3" ], command: "mpv" } ]);
  });
});

describe("createLoggingSink", () => {

  it("logs the change instead of raising an alert", async () => {

    const messages: string[] = [];
    const unsubscribe = subscribeToLogs((entry) => messages.push(entry.message));

    await createLoggingSink().notify(change("general-renamed"));

    unsubscribe();

    expect(messages).toEqual([ "Notifications are disabled. Channel is now \"general-renamed\"." ]);
  });

  it("is chosen when notifications are disabled", async () => {

    const messages: string[] = [];
    const unsubscribe = subscribeToLogs((entry) => messages.push(entry.message));

    await createNotificationSink(mergeConfiguration({}, { NOTIFY_ENABLED: "false" })).notify(change("general-renamed"));

    unsubscribe();

    expect(messages).toEqual([ "Notifications are disabled. Channel is now \"general-renamed\"." ]);
  });
});

describe("spawnCommand", () => {

  it("does not start a command whose signal is already aborted", async () => {

    const controller = new AbortController();

    controller.abort();

    await expect(spawnCommand("mpv", buildSoundArgs("/tmp/boom.mp3"), controller.signal)).rejects.toMatchObject({ name: "AbortError" });
  });
});
