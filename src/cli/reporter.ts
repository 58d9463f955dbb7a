/**
 * CLI Reporter
 *
 * Human-readable status lines for an export run.
 */

import pc from "picocolors";
import type { ExportSummary } from "../exporter.js";

/**
 * Print the outcome of a successful run
 */
export function printSummary(summary: ExportSummary, durationMs: number): void {
  const { period } = summary;

  console.log();
  console.log(pc.bold("Summary"));
  console.log(pc.dim("─".repeat(40)));
  console.log(`  Period:    ${period.label} ${pc.dim(`(${period.timeZone})`)}`);
  console.log(`  Pages:     ${summary.pages}`);
  console.log(`  Alerts:    ${summary.fetched} fetched, ${pc.green(`${summary.exported} exported`)}`);
  console.log(`  Output:    ${summary.outputPath}`);
  console.log(`  Duration:  ${pc.dim(`${(durationMs / 1000).toFixed(2)}s`)}`);
  console.log();
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(pc.red(`Error: ${message}`));
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(pc.cyan(message));
}
