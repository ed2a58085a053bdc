/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.test.ts: Tests for debug category filtering.
 */
import { afterEach, describe, expect, it } from "vitest";
import { filterAllows, getCurrentPattern, initDebugFilter, isAnyDebugEnabled, parseDebugPattern } from "./debugFilter.js";

describe("parseDebugPattern", () => {

  it("splits wildcard, includes and excludes", () => {

    expect(parseDebugPattern(" *, poll ,-gateway:frames,,")).toEqual({ exclude: [ "gateway:frames" ], include: [ "poll" ], wildcard: true });
  });

  it("lets the last mention of a category win", () => {

    expect(parseDebugPattern("-poll,poll")).toEqual({ exclude: [], include: [ "poll" ], wildcard: false });
  });
});

describe("filterAllows", () => {

  it("matches sub-categories of an included category", () => {

    const filter = parseDebugPattern("gateway");

    expect(filterAllows(filter, "gateway")).toBe(true);
    expect(filterAllows(filter, "gateway:frames")).toBe(true);
    expect(filterAllows(filter, "gatewayish")).toBe(false);
    expect(filterAllows(filter, "poll")).toBe(false);
  });

  it("lets excludes win over the wildcard", () => {

    const filter = parseDebugPattern("*,-gateway:frames");

    expect(filterAllows(filter, "heartbeat")).toBe(true);
    expect(filterAllows(filter, "gateway")).toBe(true);
    expect(filterAllows(filter, "gateway:frames")).toBe(false);
  });
});

describe("process-wide filter", () => {

  afterEach(() => {

    initDebugFilter("");
  });

  it("reports the normalized pattern", () => {

    initDebugFilter("poll, *,-gateway:frames");

    expect(isAnyDebugEnabled()).toBe(true);
    expect(getCurrentPattern()).toBe("*,-gateway:frames,poll");
  });

  it("is off for an empty or exclude-only pattern", () => {

    initDebugFilter("-poll");

    expect(isAnyDebugEnabled()).toBe(false);
    expect(getCurrentPattern()).toBe("");
  });
});
