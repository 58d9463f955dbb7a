/**
 * Export Command
 *
 * Loads configuration from the environment and runs one export.
 */

import pc from "picocolors";
import { loadConfig, type ExporterConfig } from "../../config.js";
import { EXIT_CODES, exitCodeFor, ConfigurationError, type ExitCode } from "../../errors.js";
import { exportExternalAlerts, type ExportDependencies } from "../../exporter.js";
import { printError, printInfo, printSummary } from "../reporter.js";

/**
 * Export command options
 */
export interface ExportOptions extends ExportDependencies {
  /** Environment to read configuration from */
  env?: Record<string, string | undefined>;
}

/**
 * Run the export command and return the process exit code
 */
export async function runExport(options: ExportOptions = {}): Promise<ExitCode> {
  const { env = process.env, ...deps } = options;
  const startTime = Date.now();

  let config: ExporterConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(error.message);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  printInfo("Exporting external alerts for last month...");

  try {
    const summary = await exportExternalAlerts(config, deps);
    printSummary(summary, Date.now() - startTime);
    console.log(pc.green(pc.bold(`Wrote ${summary.exported} alert(s)`)));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    printError(error instanceof Error ? error.message : "Unknown error");
    return exitCodeFor(error);
  }
}
