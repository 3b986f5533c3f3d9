import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../core/errors.js";
import { Logger } from "../../logger.js";
import { EventLog, type LogEntry } from "../eventLog.js";

const DAY = 86_400_000;

function entry(key: string, frequency: number, lastSeen: number, text = key): LogEntry {
  return { key, text, frequency, firstSeen: 0, lastSeen, sources: [] };
}

describe("EventLog.record", () => {
  it("merges repeats of a key", () => {
    const log = new EventLog({ capacity: 10 });
    log.record({ key: "TypeError", text: "x is undefined", source: "proj-a" }, 1_000);
    const merged = log.record({ key: "TypeError", text: "cannot read property", source: "proj-b" }, 2_000);

    expect(merged).toEqual({
      key: "TypeError",
      text: "cannot read property",
      frequency: 2,
      firstSeen: 1_000,
      lastSeen: 2_000,
      sources: ["proj-a", "proj-b"],
    });
    expect(log.size).toBe(1);
  });

  it("keeps the previous text when a repeat has none", () => {
    const log = new EventLog({ capacity: 10 });
    log.record({ key: "E", text: "first text" }, 0);
    log.record({ key: "E", text: "", source: "proj-a" }, 0);
    log.record({ key: "E", text: "", source: "proj-a" }, 0);
    expect(log.get("E")).toMatchObject({ text: "first text", frequency: 3, sources: ["proj-a"] });
  });

  it("compacts by relevance once over capacity", () => {
    const debug: Array<Record<string, unknown> | undefined> = [];
    const logger = new Logger({
      enabled: true,
      level: "debug",
      handler: (_level, message, meta) => {
        if (message === "event log compacted") debug.push(meta);
      },
    });
    const log = new EventLog({ capacity: 2, halfLifeDays: 10, logger });

    for (let i = 0; i < 3; i++) log.record({ key: "A", text: "recurring failure" }, 0);
    log.record({ key: "B", text: "one-off" }, 9 * DAY);
    log.record({ key: "C", text: "latest" }, 10 * DAY);

    // A: 0.5 * (1 + 3) = 2, B: 0.5^0.1 * 2 ~ 1.87, C: 1 * 2 = 2
    expect(log.entries().map((e) => e.key)).toEqual(["A", "C"]);
    expect(debug).toEqual([{ kept: 2, evicted: ["B"] }]);
  });

  it("returns nothing from compact when within capacity", () => {
    const log = new EventLog({ capacity: 5 }, [entry("A", 1, 0)]);
    expect(log.compact(DAY)).toEqual([]);
    expect(log.size).toBe(1);
  });

  it("rejects an invalid capacity or half-life", () => {
    expect(() => new EventLog({ capacity: -1 })).toThrow(InvalidInputError);
    expect(() => new EventLog({ capacity: 5, halfLifeDays: 0 })).toThrow(InvalidInputError);
  });
});

describe("EventLog.findSimilar", () => {
  it("finds the entry with the closest text", () => {
    const log = new EventLog({ capacity: 10 });
    log.record({ key: "ModuleNotFound", text: "cannot find module lodash" }, 0);
    log.record({ key: "TypeError", text: "undefined is not a function" }, 0);
    log.record({ key: "SyntaxError", text: "unexpected token in JSON" }, 0);

    const found = log.findSimilar("cannot find module react");
    expect(found.map((f) => f.entry.key)).toEqual(["ModuleNotFound"]);
    expect(found[0]?.score).toBeGreaterThan(0);
  });

  it("sees entries recorded after a previous search", () => {
    const log = new EventLog({ capacity: 10 });
    log.record({ key: "ModuleNotFound", text: "cannot find module lodash" }, 0);
    expect(log.findSimilar("timeout")).toEqual([]);

    log.record({ key: "Timeout", text: "request timeout exceeded" }, 0);
    expect(log.findSimilar("timeout").map((f) => f.entry.key)).toEqual(["Timeout"]);
  });
});

describe("EventLog.recurring", () => {
  it("lists repeated entries by frequency, then recency", () => {
    const log = new EventLog({ capacity: 10 }, [entry("W", 1, 10), entry("Z", 2, 7), entry("X", 3, 5), entry("Y", 2, 9)]);
    expect(log.recurring().map((e) => e.key)).toEqual(["X", "Y", "Z"]);
    expect(log.recurring(3).map((e) => e.key)).toEqual(["X"]);
  });
});

describe("EventLog snapshots", () => {
  it("hands out copies", () => {
    const log = new EventLog({ capacity: 10 }, [entry("X", 1, 0)]);
    const e = log.get("X");
    e?.sources.push("mutated");
    expect(log.get("X")?.sources).toEqual([]);
    expect(log.get("missing")).toBeUndefined();
  });

  it("restores from saved entries", () => {
    const saved = new EventLog({ capacity: 10 });
    saved.record({ key: "A", text: "alpha" }, 5);
    const restored = new EventLog({ capacity: 10 }, saved.entries());
    expect(restored.entries()).toEqual(saved.entries());
  });
});
