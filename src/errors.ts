/**
 * Error taxonomy for an export run.
 *
 * Every failure is fatal to the run. The CLI maps these onto exit codes.
 */

import type { ZodIssue } from "zod";

/**
 * Base class for all export errors
 */
export class ExportError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "ExportError";
  }
}

/**
 * A required setting is missing or invalid
 */
export class ConfigurationError extends ExportError {
  constructor(message: string, public readonly variable: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The API call failed: non-2xx status, network error or timeout
 */
export class UpstreamError extends ExportError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly statusCode?: number,
    cause?: Error
  ) {
    super(message, cause);
    this.name = "UpstreamError";
  }
}

/**
 * The API answered, but not with the shape we expect
 */
export class ResponseFormatError extends ExportError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message);
    this.name = "ResponseFormatError";
  }
}

/**
 * The output directory or file could not be written
 */
export class OutputError extends ExportError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, cause);
    this.name = "OutputError";
  }
}

/**
 * Exit codes for the CLI
 */
export const EXIT_CODES = {
  /** CSV written */
  SUCCESS: 0,
  /** API, response or output failure */
  FAILURE: 1,
  /** Missing or invalid configuration */
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error thrown during a run to an exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ConfigurationError
    ? EXIT_CODES.CONFIG_ERROR
    : EXIT_CODES.FAILURE;
}
