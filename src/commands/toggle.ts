/**
 * Toggle Command
 *
 * One invocation, one transition: launch an absent app, focus an unfocused
 * one, or send a focused one to the scratchpad.
 */

import type { SpawnConfig } from "../models/app-config.ts";
import { describeIdentifier } from "../models/identifier.ts";
import type { ToggleResult } from "../models/toggle.ts";
import { findApp, loadConfig, resolveConfigPath } from "../services/config-loader.ts";
import { formatIpcArgs, SwayClient } from "../services/sway-client.ts";
import { findMatches, resolveState } from "../services/state-resolver.ts";
import { decide } from "../services/toggle-decision.ts";
import { TreeExtractor } from "../services/tree-extractor.ts";
import { palette } from "../utils/ansi.ts";
import * as logger from "../utils/logger.ts";

/**
 * Toggle command options
 */
export interface ToggleOptions {
  /** Application name from the config */
  app: string;

  /** Config file path (default: $SPAWN_CONFIG or ~/.config/spawn/spawn.json) */
  configPath?: string;

  /** Decide but do not dispatch */
  dryRun?: boolean;

  /** Print the ToggleResult as JSON */
  json?: boolean;

  /** Client to use instead of spawning swaymsg from PATH */
  swayClient?: SwayClient;
}

const SAFE_SHELL_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

function shellQuote(arg: string): string {
  return SAFE_SHELL_ARG.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Render swaymsg arguments as a copy-pasteable shell command
 */
export function formatIpcCommand(args: readonly string[]): string {
  return ["swaymsg", ...args.map(shellQuote)].join(" ");
}

/**
 * Run the toggle decision for one app against the live tree
 *
 * Nothing is dispatched unless every earlier step succeeded.
 */
export async function toggleApp(
  appName: string,
  config: SpawnConfig,
  client: SwayClient,
  options: { dryRun?: boolean } = {},
): Promise<ToggleResult> {
  const app = findApp(config, appName);
  logger.verbose(`Resolving ${appName} by ${describeIdentifier(app.identifier)}`);

  const tree = await client.getTree();

  const extractor = new TreeExtractor();
  const windows = extractor.extract(tree);
  const stats = extractor.getStats();
  if (stats.malformed > 0 || stats.truncated > 0 || stats.revisited > 0) {
    logger.verbose(
      `Tree had ${stats.malformed} malformed, ${stats.truncated} too-deep and ${stats.revisited} repeated nodes (skipped)`,
    );
  }

  const matched = findMatches(windows, app.identifier).length;
  const state = resolveState(windows, app.identifier);
  logger.verbose(`${windows.length} windows, ${matched} matching; state: ${state}`);

  const action = decide(state, app, config);
  const ipcCommand = formatIpcCommand(formatIpcArgs(action));

  if (options.dryRun) {
    logger.verbose(`Dry run, not sending: ${ipcCommand}`);
  } else {
    await client.dispatch(action);
  }

  return {
    app: appName,
    identifier: app.identifier,
    state,
    action,
    matched,
    ipcCommand,
    dispatched: !options.dryRun,
  };
}

/**
 * Human-readable summary line for a toggle result
 */
export function formatToggleResult(result: ToggleResult): string {
  const { cyan, dim, green, yellow } = palette("stdout");

  if (!result.dispatched) {
    return `${dim("[dry-run]")} ${result.ipcCommand}`;
  }

  switch (result.action.type) {
    case "launch":
      return `${green("✓")} Launched ${cyan(result.app)} ${dim(`(${result.action.command})`)}`;
    case "focus":
      return `${green("✓")} Focused ${cyan(result.app)}`;
    case "hide":
      return `${yellow("●")} Hid ${cyan(result.app)} in scratchpad`;
    default: {
      const unreachable: never = result.action;
      throw new Error(`Unhandled action: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Toggle command entry point
 *
 * @returns Exit code (errors are thrown to the CLI boundary)
 */
export async function toggleCommand(options: ToggleOptions): Promise<number> {
  const configPath = resolveConfigPath(options.configPath);
  const config = await loadConfig(configPath);
  const client = options.swayClient ?? new SwayClient();

  const result = await toggleApp(options.app, config, client, { dryRun: options.dryRun });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(formatToggleResult(result));
  }

  return 0;
}
