/**
 * Exporter configuration
 *
 * The process environment is read once at startup into an explicit
 * ExporterConfig that is passed to the exporter.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_API_URL = "https://api.mackerelio.com";
export const DEFAULT_TIMEZONE = "Asia/Tokyo";
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Longest delay setTimeout honours; larger values fire immediately */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Output location, relative to the working directory */
export const OUTPUT_PATH = "output/external_alerts.csv";

/** Alerts requested per page; the API caps this at 100 */
export const PAGE_SIZE = 100;

/**
 * Resolved configuration for one run
 */
export interface ExporterConfig {
  /** API key sent as X-Api-Key */
  apiKey: string;
  /** API base URL without trailing slash */
  apiUrl: string;
  /** Per-request timeout in ms */
  timeoutMs: number;
  /** IANA time zone the month window is computed in */
  timeZone: string;
  /** Path of the CSV file */
  outputPath: string;
}

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  MACKEREL_API_KEY: z
    .string({ required_error: "MACKEREL_API_KEY is not set" })
    .trim()
    .min(1, "MACKEREL_API_KEY is not set"),
  MACKEREL_API_URL: z
    .string()
    .url("MACKEREL_API_URL must be a URL")
    .default(DEFAULT_API_URL),
  MACKEREL_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive("MACKEREL_TIMEOUT_MS must be a positive integer")
    .max(MAX_TIMEOUT_MS, `MACKEREL_TIMEOUT_MS must be at most ${MAX_TIMEOUT_MS}`)
    .default(DEFAULT_TIMEOUT_MS),
  EXPORT_TIMEZONE: z
    .string()
    .refine(isTimeZone, (value) => ({ message: `Unknown time zone: ${value}` }))
    .default(DEFAULT_TIMEZONE),
});

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const logLevelSchema = z.enum(LOG_LEVELS).catch("info");

/**
 * Read LOG_LEVEL; unknown or missing values fall back to info
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return logLevelSchema.parse(value?.trim().toLowerCase());
}

/**
 * Build the configuration from environment variables.
 *
 * Empty strings count as unset.
 *
 * @throws ConfigurationError naming the offending variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ExporterConfig {
  const input = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = envSchema.safeParse(input);

  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = String(issue?.path[0] ?? "environment");
    throw new ConfigurationError(issue?.message ?? "Invalid configuration", variable);
  }

  const parsed = result.data;
  return Object.freeze({
    apiKey: parsed.MACKEREL_API_KEY,
    apiUrl: parsed.MACKEREL_API_URL.replace(/\/$/, ""),
    timeoutMs: parsed.MACKEREL_TIMEOUT_MS,
    timeZone: parsed.EXPORT_TIMEZONE,
    outputPath: OUTPUT_PATH,
  });
}
