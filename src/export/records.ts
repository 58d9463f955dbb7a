/**
 * Alert projection
 *
 * Turns raw alerts plus the monitor list into flat CSV rows.
 */

import { formatInTimeZone } from "date-fns-tz";
import type { Alert, Monitor } from "../mackerel/types.js";
import { isWithinPeriod, type ExportPeriod } from "../period.js";

/** Alert type of external (URL) monitors */
export const EXTERNAL_ALERT_TYPE = "external";

/** Format of the local-time columns */
export const LOCAL_TIME_FORMAT = "yyyy-MM-dd HH:mm:ss XXX";

/**
 * CSV columns, in output order
 */
export const EXPORT_COLUMNS = [
  "id",
  "status",
  "monitorId",
  "monitorName",
  "url",
  "service",
  "openedAt",
  "closedAt",
  "duration",
  "openedAtLocal",
  "closedAtLocal",
  "message",
  "reason",
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

/** One flat row; absent values are empty strings */
export type ExportRow = Record<ExportColumn, string>;

/**
 * Result of projecting a run's alerts
 */
export interface ProjectionResult {
  rows: ExportRow[];
  /** Ids seen more than once; only the first occurrence is kept */
  duplicateIds: string[];
}

/**
 * Format an epoch-seconds timestamp in the given zone
 */
export function formatLocalTime(epochSeconds: number, timeZone: string): string {
  return formatInTimeZone(new Date(epochSeconds * 1000), timeZone, LOCAL_TIME_FORMAT);
}

/**
 * Build a row from an alert and its monitor (if still defined)
 */
export function toExportRow(
  alert: Alert,
  monitor: Monitor | undefined,
  timeZone: string
): ExportRow {
  const closedAt = alert.closedAt ?? null;

  return {
    id: alert.id,
    status: alert.status,
    monitorId: alert.monitorId ?? "",
    monitorName: monitor?.name ?? "",
    url: monitor?.url ?? "",
    service: monitor?.service ?? "",
    openedAt: String(alert.openedAt),
    closedAt: closedAt === null ? "" : String(closedAt),
    duration: closedAt === null ? "" : String(closedAt - alert.openedAt),
    openedAtLocal: formatLocalTime(alert.openedAt, timeZone),
    closedAtLocal: closedAt === null ? "" : formatLocalTime(closedAt, timeZone),
    message: alert.message ?? "",
    reason: alert.reason ?? "",
  };
}

/**
 * Keep external alerts opened inside the period, in arrival order
 */
export function toExportRows(
  alerts: Iterable<Alert>,
  monitors: Monitor[],
  period: ExportPeriod
): ProjectionResult {
  const monitorsById = new Map(monitors.map((m) => [m.id, m]));
  const seen = new Set<string>();
  const rows: ExportRow[] = [];
  const duplicateIds: string[] = [];

  for (const alert of alerts) {
    if (alert.type !== EXTERNAL_ALERT_TYPE || !isWithinPeriod(alert.openedAt, period)) {
      continue;
    }
    if (seen.has(alert.id)) {
      duplicateIds.push(alert.id);
      continue;
    }
    seen.add(alert.id);

    const monitor = alert.monitorId ? monitorsById.get(alert.monitorId) : undefined;
    rows.push(toExportRow(alert, monitor, period.timeZone));
  }

  return { rows, duplicateIds };
}
