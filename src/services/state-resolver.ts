/**
 * State Resolver
 *
 * Classifies an application as absent, unfocused or focused from the windows
 * of one tree snapshot.
 */

import type { WindowIdentifier } from "../models/identifier.ts";
import type { AggregateState } from "../models/toggle.ts";
import type { WindowRecord } from "../models/window-record.ts";
import { matchesIdentifier } from "./matcher.ts";

/**
 * All windows matching the identifier, in snapshot order
 */
export function findMatches(
  windows: readonly WindowRecord[],
  identifier: WindowIdentifier,
): WindowRecord[] {
  return windows.filter((w) => matchesIdentifier(w, identifier));
}

export function isRunning(windows: readonly WindowRecord[], identifier: WindowIdentifier): boolean {
  return windows.some((w) => matchesIdentifier(w, identifier));
}

/**
 * True if a matching window holds focus. Focus on unrelated windows is ignored.
 */
export function isFocused(windows: readonly WindowRecord[], identifier: WindowIdentifier): boolean {
  return windows.some((w) => w.focused && matchesIdentifier(w, identifier));
}

/**
 * Resolve the aggregate state
 *
 * absent if nothing matches; otherwise focused if any match is focused;
 * otherwise unfocused.
 */
export function resolveState(
  windows: readonly WindowRecord[],
  identifier: WindowIdentifier,
): AggregateState {
  const matches = findMatches(windows, identifier);
  if (matches.length === 0) {
    return "absent";
  }
  return matches.some((w) => w.focused) ? "focused" : "unfocused";
}
