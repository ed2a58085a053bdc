/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for ChannelWatch.
 */
import { createAbortError } from "./errors.js";

/**
 * Creates a promise that resolves after the specified delay. When a signal is supplied, aborting it clears the timer and rejects with an AbortError so that loops
 * waiting on a schedule leave their suspension point immediately on shutdown.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional signal that cancels the wait.
 * @returns A promise that resolves after the specified delay.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {

  if(signal?.aborted) {

    throw createAbortError();
  }

  return new Promise<void>((resolve, reject) => {

    const onAbort = (): void => {

      clearTimeout(timer);
      reject(createAbortError());
    };

    const timer = setTimeout(() => {

      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
