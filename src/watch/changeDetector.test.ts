/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * changeDetector.test.ts: Tests for change detection and notification ordering.
 */
import type { LogEntry } from "../utils/index.js";
import type { NameChange, ObservationSource, ObservedName } from "../types/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { NotificationSink } from "../notify/types.js";
import { createChangeDetector } from "./changeDetector.js";
import { subscribeToLogs } from "../utils/index.js";

function observe(name: string, source: ObservationSource): ObservedName {

  return { name, observedAt: new Date(), source };
}

interface RecordingSink extends NotificationSink {

  changes: NameChange[];
}

function createRecordingSink(): RecordingSink {

  const changes: NameChange[] = [];

  return {

    changes,
    notify: async (change: NameChange): Promise<void> => {

      changes.push(change);

      return Promise.resolve();
    },
    stopAlarm: (): void => undefined
  };
}

describe("createChangeDetector", () => {

  let messages: string[];
  let unsubscribe: () => void;

  beforeEach(() => {

    messages = [];
    unsubscribe = subscribeToLogs((entry: LogEntry) => messages.push(entry.message));
  });

  afterEach(() => {

    unsubscribe();
  });

  it("seeds the state from the first observation without notifying", async () => {

    const sink = createRecordingSink();
    const detector = createChangeDetector(sink);

    expect(detector.apply(observe("general", "poll"))).toBe(false);

    await detector.drain();

    expect(detector.getState().name).toBe("general");
    expect(sink.changes).toEqual([]);
    expect(messages).toEqual([ "Initial name: \"general\" (source: poll)." ]);
  });

  it("raises exactly one notification per genuine change", async () => {

    const sink = createRecordingSink();
    const detector = createChangeDetector(sink);

    detector.apply(observe("general", "gateway"));

    expect(detector.apply(observe("general-renamed", "gateway"))).toBe(true);
    expect(detector.apply(observe("general-renamed", "poll"))).toBe(false);
    expect(detector.apply(observe("general-renamed", "gateway"))).toBe(false);

    await detector.drain();

    expect(sink.changes.map((change) => [ change.previous, change.current, change.source ])).toEqual([ [ "general", "general-renamed", "gateway" ] ]);
    expect(detector.getStats()).toEqual({ gatewayObservations: 3, notifications: 1, pollObservations: 1 });
    expect(messages).toContain("Name change detected: \"general\" -> \"general-renamed\" (source: gateway).");
  });

  it("takes the last arrival when both sources report different names", async () => {

    const sink = createRecordingSink();
    const detector = createChangeDetector(sink);

    detector.apply(observe("a", "poll"));
    detector.apply(observe("b", "gateway"));
    detector.apply(observe("c", "poll"));

    await detector.drain();

    expect(detector.getState().name).toBe("c");
    expect(sink.changes.map((change) => change.current)).toEqual([ "b", "c" ]);
  });

  it("notifies in detection order even when the sink is slow", async () => {

    const delivered: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const sink: NotificationSink = {

      notify: async (change: NameChange): Promise<void> => {

        if(change.current === "first") {

          await new Promise<void>((resolve) => {

            releaseFirst = resolve;
          });
        }

        delivered.push(change.current);
      },
      stopAlarm: (): void => undefined
    };

    const detector = createChangeDetector(sink);

    detector.apply(observe("seed", "poll"));
    detector.apply(observe("first", "gateway"));
    detector.apply(observe("second", "poll"));

    // Let the first notification start and block.
    await Promise.resolve();
    await Promise.resolve();

    expect(delivered).toEqual([]);

    releaseFirst();

    await detector.drain();

    expect(delivered).toEqual([ "first", "second" ]);
  });

  it("logs a sink failure and keeps going", async () => {

    const sink: NotificationSink = {

      notify: async (): Promise<void> => Promise.reject(new Error("notify-send is not installed or not on PATH.")),
      stopAlarm: (): void => undefined
    };

    const detector = createChangeDetector(sink);

    detector.apply(observe("a", "poll"));
    detector.apply(observe("b", "poll"));

    await detector.drain();

    expect(messages).toContain("Unable to raise the alert for \"b\": notify-send is not installed or not on PATH.");
    expect(detector.apply(observe("c", "poll"))).toBe(true);
  });

  it("ignores observations after close", async () => {

    const sink = createRecordingSink();
    const detector = createChangeDetector(sink);

    detector.apply(observe("a", "poll"));
    detector.close();

    expect(detector.apply(observe("b", "poll"))).toBe(false);

    await detector.drain();

    expect(detector.getState().name).toBe("a");
    expect(detector.getStats().pollObservations).toBe(1);
    expect(sink.changes).toEqual([]);
  });

  it("drops notifications that have not started when closed", async () => {

    const sink = createRecordingSink();
    const detector = createChangeDetector(sink);

    detector.apply(observe("a", "poll"));
    detector.apply(observe("b", "poll"));
    detector.close();

    await detector.drain();

    expect(sink.changes).toEqual([]);
  });

  it("returns copies of its state", () => {

    const detector = createChangeDetector(createRecordingSink());

    detector.apply(observe("a", "poll"));

    const state = detector.getState();

    state.name = "tampered";

    expect(detector.getState().name).toBe("a");
  });
});
