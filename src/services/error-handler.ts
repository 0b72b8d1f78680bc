/**
 * Error Handler Service
 *
 * Turns any error reaching the CLI boundary into one message on stderr and
 * an exit code.
 */

import { EXIT_CODES, exitCodeFor } from "../constants.ts";
import type { ExitCode } from "../constants.ts";
import { isStructuredError } from "../models/structured-error.ts";
import { isDebug } from "../utils/logger.ts";

/**
 * Format error for display
 * @param error - StructuredError or anything else thrown
 */
export function formatError(error: unknown): string {
  if (isStructuredError(error)) {
    return error.format();
  }

  if (error instanceof Error) {
    const base = `✗ Error: ${error.message}`;
    return isDebug() && error.stack ? `${base}\n\nStack trace:\n${error.stack}` : base;
  }

  return `✗ Unknown error: ${String(error)}`;
}

/**
 * Machine-readable form for `--json`
 */
export function errorToJSON(error: unknown): Record<string, unknown> {
  if (isStructuredError(error)) {
    return { error: error.toJSON() };
  }
  return { error: { message: error instanceof Error ? error.message : String(error) } };
}

/**
 * Exit code for an error
 */
export function exitCodeForError(error: unknown): ExitCode {
  return isStructuredError(error) ? exitCodeFor(error.type) : EXIT_CODES.FAILURE;
}

/**
 * Report error on stderr and return the exit code to use
 */
export function handleError(error: unknown, options: { json?: boolean } = {}): ExitCode {
  if (options.json) {
    console.error(JSON.stringify(errorToJSON(error), null, 2));
  } else {
    console.error(formatError(error));
  }
  return exitCodeForError(error);
}
