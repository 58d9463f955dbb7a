/**
 * Export Module
 *
 * Row projection, CSV serialization and file output.
 */

export {
  EXPORT_COLUMNS,
  EXTERNAL_ALERT_TYPE,
  LOCAL_TIME_FORMAT,
  formatLocalTime,
  toExportRow,
  toExportRows,
  type ExportColumn,
  type ExportRow,
  type ProjectionResult,
} from "./records.js";

export { escapeCSVField, toCSV } from "./csv.js";

export { writeFileAtomic } from "./writer.js";
