/**
 * Logger Utility
 *
 * Verbose and debug logging for the CLI. Everything goes to stderr so stdout
 * stays clean for `--json` output.
 */

import { cyan, dim } from "./ansi.ts";

let verboseEnabled = false;
let debugEnabled = false;

/**
 * Enable verbose logging
 */
export function enableVerbose(): void {
  verboseEnabled = true;
}

/**
 * Enable debug logging (includes verbose)
 */
export function enableDebug(): void {
  debugEnabled = true;
  verboseEnabled = true;
}

/**
 * Reset to quiet (used by tests)
 */
export function resetLogging(): void {
  verboseEnabled = false;
  debugEnabled = false;
}

export function isDebug(): boolean {
  return debugEnabled;
}

export function verbose(message: string, ...args: unknown[]): void {
  if (verboseEnabled) {
    console.error(`${dim("[VERBOSE]")} ${message}`, ...args);
  }
}

export function debug(message: string, ...args: unknown[]): void {
  if (debugEnabled) {
    console.error(`${cyan("[DEBUG]")} ${message}`, ...args);
  }
}

/**
 * Log an IPC command about to be sent to Sway
 */
export function debugIpc(args: readonly string[]): void {
  if (debugEnabled) {
    console.error(`${cyan("[DEBUG]")} IPC: swaymsg ${args.join(" ")}`);
  }
}
