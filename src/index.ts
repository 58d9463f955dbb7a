/**
 * mackerel-alert-export
 *
 * Export last month's Mackerel external monitoring alerts to CSV.
 */

export {
  loadConfig,
  DEFAULT_API_URL,
  DEFAULT_TIMEZONE,
  DEFAULT_TIMEOUT_MS,
  OUTPUT_PATH,
  PAGE_SIZE,
  type ExporterConfig,
} from "./config.js";

export {
  ExportError,
  ConfigurationError,
  UpstreamError,
  ResponseFormatError,
  OutputError,
  EXIT_CODES,
  exitCodeFor,
  type ExitCode,
} from "./errors.js";

export { logger, createLogger, type Logger, type LoggerContext } from "./logger.js";

export {
  previousMonthPeriod,
  toEpochSeconds,
  isWithinPeriod,
  type ExportPeriod,
} from "./period.js";

export * from "./mackerel/index.js";
export * from "./export/index.js";

export {
  exportExternalAlerts,
  type ExportDependencies,
  type ExportSummary,
} from "./exporter.js";

export { runExport, type ExportOptions } from "./cli/commands/export.js";
