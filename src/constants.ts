/**
 * CLI Constants
 */

import { ErrorType } from "./models/structured-error.ts";

export const VERSION = "1.0.0";

/**
 * Default config location; `--config` and $SPAWN_CONFIG override it
 */
export const DEFAULT_CONFIG_PATH = "~/.config/spawn/spawn.json";

export const CONFIG_PATH_ENV = "SPAWN_CONFIG";

/**
 * Default timeouts (milliseconds)
 */
export const TIMEOUTS = {
  /** Per swaymsg invocation */
  SWAYMSG: 5000,
} as const;

/**
 * Tree traversal limits
 */
export const TREE_LIMITS = {
  /** Nodes deeper than this are not visited */
  MAX_DEPTH: 256,
} as const;

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,

  /** Unclassified failure */
  FAILURE: 1,

  /** Config missing/invalid or unknown app */
  CONFIG_ERROR: 2,

  /** swaymsg failure */
  SWAY_ERROR: 3,

  /** Bad invocation */
  USAGE_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for each structured error type
 */
export function exitCodeFor(type: ErrorType): ExitCode {
  switch (type) {
    case ErrorType.CONFIG_ERROR:
    case ErrorType.APP_NOT_FOUND:
      return EXIT_CODES.CONFIG_ERROR;
    case ErrorType.SWAY_ERROR:
      return EXIT_CODES.SWAY_ERROR;
    case ErrorType.USAGE_ERROR:
      return EXIT_CODES.USAGE_ERROR;
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}
