#!/usr/bin/env node
/**
 * mackerel-alert-export CLI
 *
 * Writes last month's external monitoring alerts to output/external_alerts.csv.
 * Configured through MACKEREL_API_KEY and friends; takes no arguments.
 */

import { Command } from "commander";
import pc from "picocolors";
import { runExport } from "./commands/export.js";
import { printError } from "./reporter.js";

const VERSION = "0.1.0";

/**
 * Create the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name("mackerel-alert-export")
    .description("Export last month's Mackerel external monitoring alerts to CSV")
    .version(VERSION, "-v, --version", "Show version number")
    .action(async () => {
      const exitCode = await runExport();
      process.exit(exitCode);
    });

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      printError(error.message);
      if (process.env.DEBUG) {
        console.error(pc.dim(error.stack));
      }
    } else {
      printError("An unexpected error occurred");
    }
    process.exit(1);
  }
}

void main();
