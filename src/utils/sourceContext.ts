/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * sourceContext.ts: AsyncLocalStorage-based observation source context for automatic log correlation.
 */
import { AsyncLocalStorage } from "async_hooks";

/* The two observation loops run concurrently and interleave their log output. Each loop runs inside a source context, and every log statement made anywhere in its
 * call chain is prefixed with the source tag ("[gateway]", "[poll]") without functions having to pass a tag around.
 *
 * IMPORTANT: AsyncLocalStorage context is lost when entering a new async context, such as setInterval or setTimeout callbacks. For these cases, re-establish the
 * context by calling runWithSourceContext() at the start of the callback.
 */

/**
 * Context for the currently running observation loop.
 */
export interface SourceContext {

  // Short tag printed in front of every log line (e.g., "gateway").
  source: string;
}

// AsyncLocalStorage instance for the source context.
const sourceContextStorage = new AsyncLocalStorage<SourceContext>();

/**
 * Runs a function within a source context. All async operations started inside the function see the context through getSourceTag().
 * @param context - The source context.
 * @param fn - The function to run within the context.
 * @returns The result of the function.
 */
export function runWithSourceContext<T>(context: SourceContext, fn: () => T): T {

  return sourceContextStorage.run(context, fn);
}

/**
 * Retrieves the source tag of the current async operation.
 * @returns The source tag, or undefined outside any source context.
 */
export function getSourceTag(): string | undefined {

  return sourceContextStorage.getStore()?.source;
}
