import { describe, it, expect } from "vitest";

import {
  dayBounds,
  describeReferenceTime,
  formatDailyTime,
  formatDueAt,
  isValidTimezone,
  parseDailyTime,
  parseDueAt,
} from "../src/time/index.js";

const VIENNA = "Europe/Vienna";

describe("dayBounds", () => {
  it("returns the local calendar day as UTC instants", () => {
    const { start, end } = dayBounds(new Date("2025-06-01T08:00:00Z"), VIENNA);

    expect(start.toISOString()).toBe("2025-05-31T22:00:00.000Z");
    expect(end.toISOString()).toBe("2025-06-01T22:00:00.000Z");
  });

  it("uses the local day, not the UTC day, just after local midnight", () => {
    const { start } = dayBounds(new Date("2025-06-01T22:30:00Z"), VIENNA);

    expect(start.toISOString()).toBe("2025-06-01T22:00:00.000Z");
  });

  it("handles the 23 hour day when clocks go forward", () => {
    const { start, end } = dayBounds(new Date("2025-03-30T10:00:00Z"), VIENNA);

    expect(start.toISOString()).toBe("2025-03-29T23:00:00.000Z");
    expect(end.toISOString()).toBe("2025-03-30T22:00:00.000Z");
  });
});

describe("parseDueAt", () => {
  it("reads a time without offset as local time", () => {
    expect(parseDueAt("2025-06-02T17:00", VIENNA)?.toISOString()).toBe("2025-06-02T15:00:00.000Z");
  });

  it("keeps an explicit offset", () => {
    expect(parseDueAt("2025-06-02T17:00:00Z", VIENNA)?.toISOString()).toBe("2025-06-02T17:00:00.000Z");
  });

  it("returns null for missing or unparseable values", () => {
    expect(parseDueAt(null, VIENNA)).toBeNull();
    expect(parseDueAt("null", VIENNA)).toBeNull();
    expect(parseDueAt("", VIENNA)).toBeNull();
    expect(parseDueAt("tomorrow", VIENNA)).toBeNull();
    expect(parseDueAt(42, VIENNA)).toBeNull();
  });
});

describe("formatting", () => {
  it("formats due dates in the given timezone", () => {
    expect(formatDueAt(new Date("2025-06-02T15:00:00Z"), VIENNA)).toBe("2025-06-02 17:00");
  });

  it("describes the reference time with weekday and offset", () => {
    expect(describeReferenceTime(new Date("2025-06-01T08:00:00Z"), VIENNA)).toBe(
      "Sunday, 2025-06-01 10:00 (2025-06-01T10:00:00+02:00, Europe/Vienna)"
    );
  });
});

describe("daily time", () => {
  it("parses HH:mm", () => {
    expect(parseDailyTime("07:00")).toEqual({ hour: 7, minute: 0 });
    expect(parseDailyTime("7:05")).toEqual({ hour: 7, minute: 5 });
  });

  it("rejects out of range or malformed values", () => {
    expect(parseDailyTime("24:00")).toBeNull();
    expect(parseDailyTime("12:60")).toBeNull();
    expect(parseDailyTime("7am")).toBeNull();
  });

  it("formats with zero padding", () => {
    expect(formatDailyTime({ hour: 7, minute: 5 })).toBe("07:05");
  });
});

describe("isValidTimezone", () => {
  it("accepts IANA zones only", () => {
    expect(isValidTimezone(VIENNA)).toBe(true);
    expect(isValidTimezone("Mars/Olympus")).toBe(false);
  });
});
