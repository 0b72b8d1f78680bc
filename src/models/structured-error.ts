/**
 * Structured Error Model
 *
 * Errors carrying the failing component, a root cause and remediation steps,
 * so the CLI can print one actionable message and pick an exit code.
 */

import { z } from "zod";

/**
 * Error type enumeration
 */
export enum ErrorType {
  /** Config file missing, unreadable or failing schema validation */
  CONFIG_ERROR = "CONFIG_ERROR",

  /** App name not present in the config */
  APP_NOT_FOUND = "APP_NOT_FOUND",

  /** swaymsg could not run, timed out, or reported failure */
  SWAY_ERROR = "SWAY_ERROR",

  /** Bad command-line usage */
  USAGE_ERROR = "USAGE_ERROR",
}

/**
 * Structured error class with diagnostic context
 */
export class StructuredError extends Error {
  /** Error category for exit codes and reporting */
  public readonly type: ErrorType;

  /** Component that raised the error (e.g. "Config Loader", "Sway Client") */
  public readonly component: string;

  /** Root cause description */
  public readonly reason: string;

  /** Ordered list of remediation steps */
  public readonly remediation: string[];

  /** Additional diagnostic context (paths, commands, stderr, ...) */
  public readonly context?: Record<string, unknown>;

  constructor(
    type: ErrorType,
    component: string,
    reason: string,
    remediation: string[],
    context?: Record<string, unknown>,
  ) {
    super(`${component}: ${reason}`);

    this.name = "StructuredError";
    this.type = type;
    this.component = component;
    this.reason = reason;
    this.remediation = remediation;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StructuredError);
    }
  }

  /**
   * Format error as human-readable message
   */
  format(): string {
    const lines = [
      `✗ ${this.type}: ${this.message}`,
    ];

    if (this.context && Object.keys(this.context).length > 0) {
      lines.push("", "Context:");
      for (const [key, value] of Object.entries(this.context)) {
        const valueStr = typeof value === "string" ? value : JSON.stringify(value);
        lines.push(`  ${key}: ${valueStr}`);
      }
    }

    if (this.remediation.length > 0) {
      lines.push("", "Suggested fixes:");
      this.remediation.forEach((fix, i) => {
        lines.push(`  ${i + 1}. ${fix}`);
      });
    }

    return lines.join("\n");
  }

  /**
   * Convert error to JSON for machine-readable output
   */
  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      component: this.component,
      reason: this.reason,
      remediation: this.remediation,
      context: this.context || {},
    };
  }
}

/**
 * Zod schema for serialized StructuredError (`--json` error output)
 */
export const StructuredErrorSchema = z.object({
  type: z.nativeEnum(ErrorType),
  component: z.string().min(1, "Component must be non-empty"),
  reason: z.string().min(1, "Reason must be non-empty"),
  remediation: z.array(z.string().min(1)),
  context: z.record(z.unknown()).optional(),
});

export function isStructuredError(error: unknown): error is StructuredError {
  return error instanceof StructuredError;
}
