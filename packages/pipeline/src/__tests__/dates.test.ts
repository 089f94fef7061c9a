import { afterEach, describe, expect, it, vi } from "vitest";
import {
  addDaysIso,
  combineDateAndTime,
  daysBetween,
  parseCalendarDate,
  parseClockTime,
  minutesBetween,
  parseTimestamp
} from "../dates.js";

describe("parseCalendarDate", () => {
  it("accepts the export's date layouts", () => {
    expect(parseCalendarDate("2024-03-05")).toBe("2024-03-05");
    expect(parseCalendarDate("3/5/2024")).toBe("2024-03-05");
    expect(parseCalendarDate("03/05/24")).toBe("2024-03-05");
    expect(parseCalendarDate("2024-03-05 14:15:00")).toBe("2024-03-05");
  });

  it("returns null for impossible or free-form dates", () => {
    expect(parseCalendarDate("2024-02-30")).toBeNull();
    expect(parseCalendarDate("next tuesday")).toBeNull();
    expect(parseCalendarDate(null)).toBeNull();
  });
});

describe("parseTimestamp", () => {
  it("normalizes to a zone-less timestamp", () => {
    expect(parseTimestamp("2024-03-05T07:00:00.250")).toBe("2024-03-05T07:00:00");
    expect(parseTimestamp("3/5/2024 6:30 p.m.")).toBe("2024-03-05T18:30:00");
    expect(parseTimestamp("2024-03-05")).toBe("2024-03-05T00:00:00");
  });
});

describe("parseClockTime", () => {
  it("reads 12 and 24 hour clocks", () => {
    expect(parseClockTime("2:15 pm")).toBe("14:15:00");
    expect(parseClockTime("12:05 AM")).toBe("00:05:00");
    expect(parseClockTime("9:07")).toBe("09:07:00");
  });
});

describe("combineDateAndTime", () => {
  it("takes the clock part of a full timestamp", () => {
    expect(combineDateAndTime("2024-03-05", "2024-03-01 14:15:00")).toBe("2024-03-05T14:15:00");
  });

  it("needs both parts", () => {
    expect(combineDateAndTime("2024-03-05", "")).toBeNull();
    expect(combineDateAndTime("", "14:15")).toBeNull();
  });
});

describe("daysBetween", () => {
  it("floors partial days", () => {
    expect(daysBetween("2024-03-10T01:00:00", "2024-03-09T23:00:00")).toBe(0);
    expect(daysBetween("2024-03-12T23:59:00", "2024-03-10")).toBe(2);
    expect(daysBetween("2024-03-08", "2024-03-10")).toBe(-2);
  });
});

describe("addDaysIso", () => {
  it("crosses month ends", () => {
    expect(addDaysIso("2024-03-01", -1)).toBe("2024-02-29");
    expect(addDaysIso("2024-12-31", 1)).toBe("2025-01-01");
  });
});

describe("outside UTC", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("drops a zone designator instead of shifting the wall clock", () => {
    vi.stubEnv("TZ", "America/Chicago");

    expect(parseCalendarDate("2024-03-01T00:00:00.000Z")).toBe("2024-03-01");
    expect(parseTimestamp("2024-03-01T23:30:00-05:00")).toBe("2024-03-01T23:30:00");
    expect(parseTimestamp("2024-03-01T06:15+0130")).toBe("2024-03-01T06:15:00");
  });

  it("counts whole days and minutes across a daylight-saving change", () => {
    vi.stubEnv("TZ", "America/Chicago");

    expect(daysBetween("2024-03-11", "2024-03-10")).toBe(1);
    expect(daysBetween("2024-03-10T23:00:00", "2024-03-10T01:00:00")).toBe(0);
    expect(minutesBetween("2024-03-10T04:00:00", "2024-03-10T01:00:00")).toBe(180);
    expect(addDaysIso("2024-11-02", 1)).toBe("2024-11-03");
  });
});
