/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Notification sink selection for ChannelWatch.
 */
import type { Config, NameChange } from "../types/index.js";
import { LOG, quoteName } from "../utils/index.js";
import type { NotificationSink } from "./types.js";
import { createDesktopNotifier } from "./desktop.js";
import { getSoundPath } from "../config/paths.js";

export * from "./desktop.js";
export type { NotificationSink } from "./types.js";

/**
 * Creates a sink that only logs. Used when notifications are disabled.
 * @returns The logging sink.
 */
export function createLoggingSink(): NotificationSink {

  return {

    notify: (change: NameChange): Promise<void> => {

      LOG.info("Notifications are disabled. Channel is now %s.", quoteName(change.current));

      return Promise.resolve();
    },

    stopAlarm: (): void => {

      // No alarm is ever started.
    }
  };
}

/**
 * Creates the sink the configuration asks for.
 * @param config - The application configuration.
 * @returns The desktop notifier, or the logging sink when notifications are disabled.
 */
export function createNotificationSink(config: Config): NotificationSink {

  if(!config.notify.enabled) {

    return createLoggingSink();
  }

  return createDesktopNotifier({

    alarmRepeatInterval: config.notify.alarmRepeatInterval,
    alarmRepeats: config.notify.alarmRepeats,
    soundPath: getSoundPath(config)
  });
}
