/**
 * Toggle Model
 *
 * Aggregate window state and the single action chosen for it.
 */

import type { WindowIdentifier } from "./identifier.ts";

/**
 * Aggregate state of an application, derived fresh from each tree snapshot
 */
export type AggregateState = "absent" | "unfocused" | "focused";

/** Start the application (`swaymsg exec`) */
export interface LaunchAction {
  type: "launch";
  command: string;
}

/** Bring an existing window to focus */
export interface FocusAction {
  type: "focus";
  criteria: string;
}

/** Send the focused window to the scratchpad */
export interface HideAction {
  type: "hide";
  criteria: string;
}

export type ToggleAction = LaunchAction | FocusAction | HideAction;

/**
 * Outcome of one toggle invocation
 */
export interface ToggleResult {
  /** Application name as given on the command line */
  app: string;

  identifier: WindowIdentifier;

  state: AggregateState;

  action: ToggleAction;

  /** Number of windows matching the identifier */
  matched: number;

  /** Sway IPC command that was (or, in dry-run, would have been) sent */
  ipcCommand: string;

  /** False when running with --dry-run */
  dispatched: boolean;
}
