/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for ChannelWatch.
 */

/* The debug filter gives category-based control over debug output. Categories use colon-separated namespaces (e.g., "gateway:frames", "heartbeat") and the
 * CHANNELWATCH_DEBUG environment variable accepts comma-separated patterns with wildcard and exclusion support.
 *
 * Pattern syntax:
 *   - "*" enables all categories.
 *   - "category" enables an exact category or any sub-category (prefix match).
 *   - "-category" excludes a category or its sub-categories, even when wildcard is active.
 *
 * Examples:
 *   CHANNELWATCH_DEBUG=gateway            Gateway lifecycle and raw frames.
 *   CHANNELWATCH_DEBUG=*,-gateway:frames  Everything except raw gateway frames.
 */

/**
 * A parsed CHANNELWATCH_DEBUG pattern.
 */
export interface DebugFilter {

  // Categories excluded with a leading "-". Excludes win over wildcard and includes.
  readonly exclude: readonly string[];

  // Categories enabled by name, with their sub-categories.
  readonly include: readonly string[];

  readonly wildcard: boolean;
}

const DISABLED: DebugFilter = { exclude: [], include: [], wildcard: false };

let activeFilter = DISABLED;

/**
 * Parses a comma-separated pattern string. Empty entries are ignored and the last mention of a category decides whether it is included or excluded.
 * @param pattern - Category patterns (e.g., "poll,heartbeat,-gateway:frames").
 * @returns The filter.
 */
export function parseDebugPattern(pattern: string): DebugFilter {

  const exclude = new Set<string>();
  const include = new Set<string>();
  let wildcard = false;

  for(const raw of pattern.split(",")) {

    const part = raw.trim();

    if(!part.length) {

      continue;
    }

    if(part === "*") {

      wildcard = true;

      continue;
    }

    const excluded = part.startsWith("-");
    const category = excluded ? part.slice(1) : part;

    (excluded ? include : exclude).delete(category);
    (excluded ? exclude : include).add(category);
  }

  return { exclude: [ ...exclude ], include: [ ...include ], wildcard };
}

/**
 * Checks whether a category is covered by a list of patterns, either exactly or as a sub-category ("gateway" covers "gateway:frames").
 * @param category - The category.
 * @param patterns - The patterns.
 * @returns True on a match.
 */
function covers(category: string, patterns: readonly string[]): boolean {

  return patterns.some((pattern) => (category === pattern) || category.startsWith(pattern + ":"));
}

/**
 * Checks a category against a filter.
 * @param filter - The filter.
 * @param category - The category (e.g., "gateway:frames").
 * @returns True if debug output should be produced for this category.
 */
export function filterAllows(filter: DebugFilter, category: string): boolean {

  if(covers(category, filter.exclude)) {

    return false;
  }

  return filter.wildcard || covers(category, filter.include);
}

/**
 * Replaces the process-wide debug filter.
 * @param pattern - Category patterns, or "" to turn debug output off.
 */
export function initDebugFilter(pattern: string): void {

  activeFilter = parseDebugPattern(pattern);
}

/**
 * Checks a category against the process-wide filter.
 * @param category - The category.
 * @returns True if debug output should be produced for this category.
 */
export function isCategoryEnabled(category: string): boolean {

  return filterAllows(activeFilter, category);
}

/**
 * Whether the process-wide filter can pass anything at all. Callers check this before building debug messages.
 * @returns True when a wildcard or at least one category is enabled.
 */
export function isAnyDebugEnabled(): boolean {

  return activeFilter.wildcard || (activeFilter.include.length > 0);
}

/**
 * The process-wide filter as a pattern string, for the startup configuration summary.
 * @returns The normalized pattern (e.g., "*,-gateway:frames"), or "" when debug output is off.
 */
export function getCurrentPattern(): string {

  if(!isAnyDebugEnabled()) {

    return "";
  }

  return [ ...(activeFilter.wildcard ? [ "*" ] : []), ...activeFilter.exclude.map((category) => "-" + category), ...activeFilter.include ].join(",");
}

// Debug Category Registry.

/**
 * Metadata for a known debug category. Printed by --list-env so operators know what CHANNELWATCH_DEBUG accepts.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

/**
 * Static registry of all known debug categories with descriptions, sorted alphabetically by category.
 */
export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "config", description: "Configuration loading and merging." },
  { category: "detector", description: "Observations that did not change the name." },
  { category: "gateway", description: "Gateway phases, ignored dispatches, session bookkeeping." },
  { category: "gateway:frames", description: "Every inbound gateway frame." },
  { category: "heartbeat", description: "Heartbeat sends, jitter, state transitions." },
  { category: "notify", description: "Alarm playback and notification commands." },
  { category: "poll", description: "Poll requests, schedule slips, fetch timing." },
  { category: "supervisor", description: "Backoff computation and reconnect waits." }
];

/**
 * Creates a lightweight elapsed-time closure using performance.now(). Call the returned function to get the elapsed milliseconds since creation.
 * @returns A closure that returns elapsed milliseconds as a number.
 */
export function startTimer(): () => number {

  const start = performance.now();

  return (): number => Math.round(performance.now() - start);
}
