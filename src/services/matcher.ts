/**
 * Window Matcher
 *
 * Decides whether a window satisfies an identifier. Comparison is exact
 * equality after folding ASCII A-Z only; there is no substring or
 * locale-aware matching.
 */

import type { WindowIdentifier } from "../models/identifier.ts";
import type { WindowRecord } from "../models/window-record.ts";

const UPPER_A = 0x41;
const UPPER_Z = 0x5a;
const CASE_OFFSET = 0x20;

function foldAscii(code: number): number {
  return code >= UPPER_A && code <= UPPER_Z ? code + CASE_OFFSET : code;
}

/**
 * Compare two strings ignoring ASCII case (non-ASCII compared as-is)
 */
export function equalsIgnoreAsciiCase(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (foldAscii(a.charCodeAt(i)) !== foldAscii(b.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}

function fieldMatches(field: string | undefined, expected: string): boolean {
  return field !== undefined && equalsIgnoreAsciiCase(field, expected);
}

/**
 * Check whether a window matches an identifier
 *
 * Absent fields never match.
 */
export function matchesIdentifier(window: WindowRecord, identifier: WindowIdentifier): boolean {
  switch (identifier.kind) {
    case "title":
      return fieldMatches(window.title, identifier.value);
    case "app_id":
      return fieldMatches(window.app_id, identifier.value);
    case "class":
      return fieldMatches(window.window_properties?.class, identifier.value);
    default: {
      const unreachable: never = identifier;
      throw new Error(`Unhandled identifier: ${JSON.stringify(unreachable)}`);
    }
  }
}
