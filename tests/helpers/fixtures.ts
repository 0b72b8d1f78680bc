/**
 * Shared test fixtures
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { WindowRecord } from "../../src/models/window-record.ts";

export const FIXTURE_CONFIG_PATH = fileURLToPath(new URL("../fixtures/spawn.json", import.meta.url));

/**
 * Sample `swaymsg -t get_tree` output:
 *   scratchpad: fish-term (floating, Alacritty)
 *   workspace 1: split[ obsidian (focused), KeePassXC (xwayland) ], Calculator (floating)
 */
export function loadSwayTree(): unknown {
  const path = fileURLToPath(new URL("../fixtures/sway-tree.json", import.meta.url));
  return JSON.parse(readFileSync(path, "utf8"));
}

/**
 * Build a WindowRecord with defaults
 */
export function windowRecord(overrides: Partial<WindowRecord> = {}): WindowRecord {
  return { focused: false, type: "con", ...overrides };
}
