/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for ChannelWatch.
 */

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m 5s"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m ", String(seconds), "s" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Quotes a channel name for log output so that empty names and names with surrounding whitespace stay visible.
 * @param name - The channel name, or null when none is known yet.
 * @returns The name in double quotes, or "(none)".
 */
export function quoteName(name: string | null): string {

  return (name === null) ? "(none)" : JSON.stringify(name);
}

/**
 * Redacts a credential for display, keeping only enough to tell two tokens apart.
 * @param token - The credential.
 * @returns The redacted form (e.g., "abcd…(24 chars)").
 */
export function redactToken(token: string): string {

  if(token.length <= 8) {

    return "***";
  }

  return [ token.slice(0, 4), "…(", String(token.length), " chars)" ].join("");
}
