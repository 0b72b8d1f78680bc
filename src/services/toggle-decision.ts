/**
 * Toggle Decision
 *
 * Maps an aggregate state to the one action that advances the
 * launch → focus → hide cycle, and builds the strings those actions carry.
 */

import type { AppConfig, SpawnConfig } from "../models/app-config.ts";
import type { WindowIdentifier } from "../models/identifier.ts";
import type { AggregateState, ToggleAction } from "../models/toggle.ts";

/**
 * Build the startup command for an application
 *
 * A `startup_override` wins outright. Terminal apps identified by title are
 * wrapped in the configured terminal with that title, since the terminal owns
 * the window; everything else runs `command` as-is.
 */
export function buildStartupCommand(app: AppConfig, terminal: string): string {
  if (app.startup_override !== undefined) {
    return app.startup_override;
  }

  if (app.is_terminal && app.identifier.kind === "title") {
    return `${terminal} --title ${app.identifier.value} --command ${app.command}`;
  }

  return app.command;
}

function quoteCriteriaValue(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Build Sway criteria for window selection, e.g. `[app_id="obsidian"]`
 */
export function buildCriteria(identifier: WindowIdentifier): string {
  switch (identifier.kind) {
    case "title":
      return `[title=${quoteCriteriaValue(identifier.value)}]`;
    case "app_id":
      return `[app_id=${quoteCriteriaValue(identifier.value)}]`;
    case "class":
      return `[class=${quoteCriteriaValue(identifier.value)}]`;
    default: {
      const unreachable: never = identifier;
      throw new Error(`Unhandled identifier: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Pick the action for the current state
 *
 * | state     | action                     |
 * |-----------|----------------------------|
 * | absent    | launch startup command     |
 * | unfocused | focus matching windows     |
 * | focused   | move them to the scratchpad|
 */
export function decide(
  state: AggregateState,
  app: AppConfig,
  config: Pick<SpawnConfig, "terminal">,
): ToggleAction {
  switch (state) {
    case "absent":
      return { type: "launch", command: buildStartupCommand(app, config.terminal) };
    case "unfocused":
      return { type: "focus", criteria: buildCriteria(app.identifier) };
    case "focused":
      return { type: "hide", criteria: buildCriteria(app.identifier) };
    default: {
      const unreachable: never = state;
      throw new Error(`Unhandled state: ${String(unreachable)}`);
    }
  }
}
