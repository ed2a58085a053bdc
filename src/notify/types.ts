/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * types.ts: Notification sink contract for ChannelWatch.
 */
import type { NameChange } from "../types/index.js";

/**
 * Receives genuine name changes from the change detector.
 */
export interface NotificationSink {

  /**
   * Raises an alert for a change. Rejects with NotifyError when the visual or audio mechanism is unavailable.
   */
  notify(change: NameChange): Promise<void>;

  /**
   * Silences any alarm still repeating. Called on shutdown.
   */
  stopAlarm(): void;
}
