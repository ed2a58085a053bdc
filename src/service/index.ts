/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Process control exports for ChannelWatch.
 */
export * from "./commands.js";
export * from "./pidFile.js";
