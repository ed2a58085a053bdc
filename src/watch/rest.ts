/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * rest.ts: REST access to the watched channel.
 */
import { FetchFailedError, createAbortError, formatError, getUserAgent } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import { isRecord } from "./protocol.js";

/**
 * Options for a channel fetch.
 */
export interface FetchChannelOptions {

  // Base URL of the REST API, without a trailing slash.
  apiBase: string;

  channelId: string;

  // Aborting it cancels the request with an AbortError.
  signal?: AbortSignal;

  // Request timeout in milliseconds.
  timeout: number;

  token: string;
}

/**
 * The fields of a channel resource the watcher uses.
 */
export interface ChannelResource {

  id: string;

  // Null for channel types without a name.
  name: Nullable<string>;
}

/**
 * Builds the channel resource URL.
 * @param apiBase - Base URL of the REST API.
 * @param channelId - The channel ID.
 * @returns The URL.
 */
export function buildChannelUrl(apiBase: string, channelId: string): string {

  return [ apiBase.replace(/\/+$/, ""), "/channels/", encodeURIComponent(channelId) ].join("");
}

/**
 * Fetches the channel resource once. Every failure other than cancellation is a FetchFailedError: a network error, the request timing out, a non-2xx status (which
 * is kept on the error), or a body that is not a channel object.
 * @param options - Fetch options.
 * @returns The channel resource.
 */
export async function fetchChannel(options: FetchChannelOptions): Promise<ChannelResource> {

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  const timer = setTimeout(() => controller.abort(), options.timeout);

  options.signal?.addEventListener("abort", onAbort, { once: true });

  try {

    let response: Response;

    try {

      response = await fetch(buildChannelUrl(options.apiBase, options.channelId), {

        headers: { "Authorization": options.token, "User-Agent": getUserAgent() },
        signal: controller.signal
      });
    } catch(error) {

      if(options.signal?.aborted) {

        throw createAbortError();
      }

      if(controller.signal.aborted) {

        throw new FetchFailedError([ "Request timed out after ", String(options.timeout), "ms." ].join(""), undefined, { cause: error });
      }

      throw new FetchFailedError([ "Request failed: ", formatError(error), "." ].join(""), undefined, { cause: error });
    }

    if(!response.ok) {

      throw new FetchFailedError([ "Request failed with HTTP status ", String(response.status), "." ].join(""), response.status);
    }

    let body: unknown;

    try {

      body = await response.json();
    } catch(error) {

      if(options.signal?.aborted) {

        throw createAbortError();
      }

      throw new FetchFailedError("Response body is not valid JSON.", response.status, { cause: error });
    }

    if(!isRecord(body)) {

      throw new FetchFailedError("Response body is not a channel object.", response.status);
    }

    return {

      id: (typeof body.id === "string") ? body.id : options.channelId,
      name: (typeof body.name === "string") ? body.name : null
    };
  } finally {

    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onAbort);
  }
}
