/**
 * Export window computation.
 *
 * The window is the calendar month before the one containing `now`, as seen
 * on a wall clock in the configured time zone.
 */

import { subSeconds } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

/**
 * A closed time window, second precision
 */
export interface ExportPeriod {
  /** First instant of the month */
  start: Date;
  /** Last whole second of the month */
  end: Date;
  /** IANA zone the month boundaries were computed in */
  timeZone: string;
  /** Month in yyyy-MM form */
  label: string;
}

/**
 * Compute the previous calendar month relative to `now`
 */
export function previousMonthPeriod(now: Date, timeZone: string): ExportPeriod {
  const [year, month] = formatInTimeZone(now, timeZone, "yyyy-MM").split("-").map(Number);
  const lastYear = month === 1 ? year - 1 : year;
  const lastMonth = month === 1 ? 12 : month - 1;

  return {
    start: fromZonedTime(monthStart(lastYear, lastMonth), timeZone),
    end: subSeconds(fromZonedTime(monthStart(year, month), timeZone), 1),
    timeZone,
    label: `${lastYear}-${pad(lastMonth)}`,
  };
}

// Wall-clock midnight on the 1st, without an offset, so the host zone never applies
function monthStart(year: number, month: number): string {
  return `${year}-${pad(month)}-01T00:00:00`;
}

function pad(month: number): string {
  return String(month).padStart(2, "0");
}

/**
 * Epoch seconds, as the API expects them
 */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Whether an epoch-seconds timestamp falls inside the period
 */
export function isWithinPeriod(epochSeconds: number, period: ExportPeriod): boolean {
  return (
    epochSeconds >= toEpochSeconds(period.start) &&
    epochSeconds <= toEpochSeconds(period.end)
  );
}
