/**
 * Export Period Tests
 */

import { describe, it, expect } from "vitest";
import { isWithinPeriod, previousMonthPeriod, toEpochSeconds } from "../period.js";

describe("previousMonthPeriod", () => {
  it("crosses the year boundary in January", () => {
    const period = previousMonthPeriod(new Date("2026-01-15T03:00:00Z"), "UTC");

    expect(period.start.toISOString()).toBe("2025-12-01T00:00:00.000Z");
    expect(period.end.toISOString()).toBe("2025-12-31T23:59:59.000Z");
    expect(period.label).toBe("2025-12");
    expect(period.timeZone).toBe("UTC");
  });

  it("ends on the 29th of February in a leap year", () => {
    const period = previousMonthPeriod(new Date("2024-03-10T12:00:00Z"), "UTC");

    expect(period.start.toISOString()).toBe("2024-02-01T00:00:00.000Z");
    expect(period.end.toISOString()).toBe("2024-02-29T23:59:59.000Z");
  });

  it("ends on the 30th for a 30-day month", () => {
    const period = previousMonthPeriod(new Date("2026-05-01T00:00:00Z"), "UTC");

    expect(period.start.toISOString()).toBe("2026-04-01T00:00:00.000Z");
    expect(period.end.toISOString()).toBe("2026-04-30T23:59:59.000Z");
    expect(period.label).toBe("2026-04");
  });

  it("ends on the 31st for a 31-day month", () => {
    const period = previousMonthPeriod(new Date("2026-08-31T23:59:59Z"), "UTC");

    expect(period.start.toISOString()).toBe("2026-07-01T00:00:00.000Z");
    expect(period.end.toISOString()).toBe("2026-07-31T23:59:59.000Z");
  });

  it("uses the wall clock of the given time zone", () => {
    // 2026-03-01 01:00 in Tokyo, still February in UTC
    const now = new Date("2026-02-28T16:00:00Z");

    const tokyo = previousMonthPeriod(now, "Asia/Tokyo");
    expect(tokyo.label).toBe("2026-02");
    expect(tokyo.start.toISOString()).toBe("2026-01-31T15:00:00.000Z");
    expect(tokyo.end.toISOString()).toBe("2026-02-28T14:59:59.000Z");

    const utc = previousMonthPeriod(now, "UTC");
    expect(utc.label).toBe("2026-01");
    expect(utc.start.toISOString()).toBe("2026-01-01T00:00:00.000Z");
    expect(utc.end.toISOString()).toBe("2026-01-31T23:59:59.000Z");
  });
});

describe("toEpochSeconds", () => {
  it("truncates milliseconds", () => {
    expect(toEpochSeconds(new Date("2026-01-31T15:00:00.999Z"))).toBe(1769871600);
  });
});

describe("isWithinPeriod", () => {
  const period = previousMonthPeriod(new Date("2026-03-05T00:00:00Z"), "Asia/Tokyo");

  it("includes the first second", () => {
    expect(isWithinPeriod(1769871600, period)).toBe(true);
  });

  it("includes the last second", () => {
    expect(isWithinPeriod(1772290799, period)).toBe(true);
  });

  it("excludes the second before the start", () => {
    expect(isWithinPeriod(1769871599, period)).toBe(false);
  });

  it("excludes the first second of the next month", () => {
    expect(isWithinPeriod(1772290800, period)).toBe(false);
  });
});
