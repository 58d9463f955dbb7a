/**
 * CSV serialization (RFC 4180)
 */

const LINE_END = "\r\n";
const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field when it contains a delimiter, a quote or a line break
 */
export function escapeCSVField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Serialize rows under a header line.
 *
 * Every line, the last included, ends with CRLF. No rows yields the header only.
 */
export function toCSV<K extends string>(
  columns: readonly K[],
  rows: ReadonlyArray<Record<K, string>>
): string {
  const lines = [columns.map(escapeCSVField).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCSVField(row[column])).join(","));
  }
  return lines.map((line) => line + LINE_END).join("");
}
