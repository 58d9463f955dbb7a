/**
 * Export Period Tests, non-UTC host
 *
 * America/Asuncion skipped local midnight on 2023-10-01 (DST began at 00:00),
 * so any use of host local time shows up as an hour of drift.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { previousMonthPeriod } from "../period.js";

describe("previousMonthPeriod on a host without local midnight on the 1st", () => {
  const originalTZ = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = "America/Asuncion";
  });

  afterAll(() => {
    if (originalTZ === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = originalTZ;
    }
  });

  it("runs under the host zone", () => {
    expect(new Date("2023-10-01T04:00:00Z").getTimezoneOffset()).toBe(180);
  });

  it("computes a UTC window independent of the host zone", () => {
    const period = previousMonthPeriod(new Date("2023-11-05T12:00:00Z"), "UTC");

    expect(period.start.toISOString()).toBe("2023-10-01T00:00:00.000Z");
    expect(period.end.toISOString()).toBe("2023-10-31T23:59:59.000Z");
    expect(period.label).toBe("2023-10");
  });

  it("computes a Tokyo window independent of the host zone", () => {
    const period = previousMonthPeriod(new Date("2023-11-05T12:00:00Z"), "Asia/Tokyo");

    expect(period.start.toISOString()).toBe("2023-09-30T15:00:00.000Z");
    expect(period.end.toISOString()).toBe("2023-10-31T14:59:59.000Z");
  });

  it("crosses the year boundary", () => {
    const period = previousMonthPeriod(new Date("2024-01-10T00:00:00Z"), "UTC");

    expect(period.start.toISOString()).toBe("2023-12-01T00:00:00.000Z");
    expect(period.label).toBe("2023-12");
  });
});
