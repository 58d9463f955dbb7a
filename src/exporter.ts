/**
 * External alert exporter
 *
 * One run: compute last month's window, fetch monitors and alert pages,
 * project to rows and write the CSV. The file is written only after every
 * page has been fetched.
 */

import path from "node:path";
import type { ExporterConfig } from "./config.js";
import { PAGE_SIZE } from "./config.js";
import { createLogger, logger as rootLogger, type Logger } from "./logger.js";
import { MackerelClient, type AlertSource } from "./mackerel/client.js";
import type { Alert } from "./mackerel/types.js";
import { previousMonthPeriod, toEpochSeconds, type ExportPeriod } from "./period.js";
import { EXPORT_COLUMNS, toExportRows } from "./export/records.js";
import { toCSV } from "./export/csv.js";
import { writeFileAtomic } from "./export/writer.js";

/**
 * Injectable collaborators of a run
 */
export interface ExportDependencies {
  /** Defaults to a MackerelClient built from the config */
  client?: AlertSource;
  /** Reference time for the window; defaults to the current time */
  now?: Date;
  /** Directory the output path is resolved against */
  cwd?: string;
  logger?: Logger;
}

/**
 * What a run produced
 */
export interface ExportSummary {
  period: ExportPeriod;
  /** Alert pages fetched */
  pages: number;
  /** Alerts received, of any type */
  fetched: number;
  /** Rows written */
  exported: number;
  /** Absolute path of the CSV */
  outputPath: string;
}

/**
 * Export last month's external alerts to CSV
 */
export async function exportExternalAlerts(
  config: ExporterConfig,
  deps: ExportDependencies = {}
): Promise<ExportSummary> {
  const client =
    deps.client ??
    new MackerelClient({ apiUrl: config.apiUrl, apiKey: config.apiKey, timeout: config.timeoutMs });
  const period = previousMonthPeriod(deps.now ?? new Date(), config.timeZone);
  const outputPath = path.resolve(deps.cwd ?? process.cwd(), config.outputPath);
  const log = createLogger(
    { period: period.label, timeZone: period.timeZone, outputPath },
    deps.logger ?? rootLogger
  );

  log.info(
    { from: period.start.toISOString(), to: period.end.toISOString() },
    "export period"
  );

  log.info("fetch monitors");
  const monitors = await client.listMonitors();
  log.debug({ count: monitors.length }, "fetched monitors");

  log.info("fetch alerts");
  const alerts: Alert[] = [];
  let pages = 0;
  for await (const page of client.listAlerts({
    from: toEpochSeconds(period.start),
    to: toEpochSeconds(period.end),
    pageSize: PAGE_SIZE,
  })) {
    pages++;
    alerts.push(...page.alerts);
    log.info({ page: pages, count: page.alerts.length }, "fetched alerts");
  }

  const { rows, duplicateIds } = toExportRows(alerts, monitors, period);
  if (duplicateIds.length > 0) {
    log.warn({ duplicateIds }, "dropped repeated alert ids");
  }
  log.info({ fetched: alerts.length, exported: rows.length }, "total alerts");

  await writeFileAtomic(outputPath, toCSV(EXPORT_COLUMNS, rows));
  log.info("CSV file has been written");

  return {
    period,
    pages,
    fetched: alerts.length,
    exported: rows.length,
    outputPath,
  };
}
