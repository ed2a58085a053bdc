/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup.
 */
import type { Nullable } from "../types/index.js";
import { fileURLToPath } from "url";
import { readFileSync } from "fs";
import { resolve } from "path";

// Cached package version.
let cachedPackageVersion: Nullable<string> = null;

/**
 * Gets the current package version from package.json.
 * @returns The current version string (e.g., "1.0.0"), or "0.0.0" when package.json cannot be read.
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    // This file is in src/utils/ or dist/utils/, and package.json is in the project root.
    const currentDir = fileURLToPath(new URL(".", import.meta.url));
    const packageJson = JSON.parse(readFileSync(resolve(currentDir, "../../package.json"), "utf-8")) as { version?: unknown };

    cachedPackageVersion = (typeof packageJson.version === "string") ? packageJson.version : "0.0.0";

    return cachedPackageVersion;
  } catch {

    return "0.0.0";
  }
}

/**
 * Builds the User-Agent header sent with REST requests.
 * @returns The User-Agent string (e.g., "ChannelWatch/1.0.0 (+node v20.11.0)").
 */
export function getUserAgent(): string {

  return [ "ChannelWatch/", getPackageVersion(), " (+node ", process.version, ")" ].join("");
}
