import { afterEach, describe, expect, it, vi } from "vitest";
import { parseScanLog, summarizeScans, topLevelKeyOrder } from "../scan-log.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("topLevelKeyOrder", () => {
  it("returns keys in text order, ignoring nested objects and string values", () => {
    expect(topLevelKeyOrder('{"b": {"z": 1, "a": "x:y"}, "10": "v", "2": [{"k": 1}]}')).toEqual(["b", "10", "2"]);
  });

  it("handles escaped quotes inside keys", () => {
    expect(topLevelKeyOrder('{"a\\"b": 1, "c": 2}')).toEqual(['a"b', "c"]);
  });
});

describe("parseScanLog", () => {
  it("decodes every serial key into a scan event", () => {
    const events = parseScanLog(
      JSON.stringify({
        "BOX-1": { username: "ana", timestamp: "2024-03-05 08:00:00", manual: 1, latitude: 33.4, longitude: -112.1 },
        "BOX-2": { timestamp: "2024-03-05 08:05:00", manual: "0" },
        "BOX-3": { username: "cy", manual: true }
      })
    );

    expect(events).toEqual([
      {
        serial_number: "BOX-1",
        username: "ana",
        timestamp: "2024-03-05 08:00:00",
        manual: true,
        latitude: "33.4",
        longitude: "-112.1"
      },
      {
        serial_number: "BOX-2",
        username: "Unknown",
        timestamp: "2024-03-05 08:05:00",
        manual: false,
        latitude: "",
        longitude: ""
      },
      { serial_number: "BOX-3", username: "cy", timestamp: "", manual: true, latitude: "", longitude: "" }
    ]);
  });

  it("keeps the source order of numeric serial keys", () => {
    const raw = '{"ABC-1": {"username": "first"}, "300": {"username": "second"}, "25": {"username": "third"}}';

    const events = parseScanLog(raw);

    expect(events.map((event) => event.serial_number)).toEqual(["ABC-1", "300", "25"]);
    expect(summarizeScans(events).lastUser).toBe("third");
  });

  it("skips entries whose value is not an object", () => {
    const events = parseScanLog('{"1": "oops", "2": {"username": "kim"}}');

    expect(events).toHaveLength(1);
    expect(events[0]?.serial_number).toBe("2");
  });

  it("returns no events for malformed or absent logs and warns once", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(parseScanLog("{not json")).toEqual([]);
    expect(parseScanLog("[1, 2]")).toEqual([]);
    expect(parseScanLog(null)).toEqual([]);
    expect(parseScanLog("nan")).toEqual([]);
    expect(parseScanLog(42)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("accepts an already decoded object", () => {
    const events = parseScanLog({ "BOX-9": { username: "lee" } });

    expect(events.map((event) => event.username)).toEqual(["lee"]);
  });
});

describe("summarizeScans", () => {
  it("reports N keys and the final entry's user and time", () => {
    const summary = summarizeScans(
      parseScanLog(
        JSON.stringify({
          a: { username: "u1", timestamp: "2024-03-05 09:00:00" },
          b: { username: "u2", timestamp: "2024-03-05 07:00:00" },
          c: { username: "u3", timestamp: "3/5/2024 6:30 AM" }
        })
      )
    );

    expect(summary.count).toBe(3);
    expect(summary.lastUser).toBe("u3");
    expect(summary.lastTime).toBe("2024-03-05T06:30:00");
  });

  it("is empty for no events", () => {
    expect(summarizeScans([])).toEqual({ events: [], count: 0, lastUser: "", lastTime: null });
  });
});
