/**
 * List Apps Command
 *
 * Prints the configured applications with their identifier and the command
 * a launch would run.
 */

import type { SpawnConfig } from "../models/app-config.ts";
import { describeIdentifier } from "../models/identifier.ts";
import { loadConfig, resolveConfigPath } from "../services/config-loader.ts";
import { buildCriteria, buildStartupCommand } from "../services/toggle-decision.ts";
import { formatTable } from "../ui/table-formatter.ts";

/**
 * List apps command options
 */
export interface ListAppsOptions {
  configPath?: string;

  /** Output JSON instead of a table */
  json?: boolean;
}

/**
 * One row of list output
 */
export type AppListEntry = {
  name: string;
  identifier: string;
  criteria: string;
  startup: string;
  terminal: string;
};

/**
 * Build list entries sorted by app name
 */
export function listEntries(config: SpawnConfig): AppListEntry[] {
  return Object.entries(config.apps)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, app]) => ({
      name,
      identifier: describeIdentifier(app.identifier),
      criteria: buildCriteria(app.identifier),
      startup: buildStartupCommand(app, config.terminal),
      terminal: app.is_terminal ? "yes" : "no",
    }));
}

/**
 * Format entries as table
 */
export function formatAppsTable(entries: readonly AppListEntry[]): string {
  if (entries.length === 0) {
    return "No apps configured.";
  }

  return formatTable(entries, [
    { header: "Name", key: "name" },
    { header: "Identifier", key: "identifier", maxWidth: 30 },
    { header: "Terminal", key: "terminal" },
    { header: "Startup", key: "startup", maxWidth: 60 },
  ]);
}

export async function listAppsCommand(options: ListAppsOptions): Promise<number> {
  const config = await loadConfig(resolveConfigPath(options.configPath));
  const entries = listEntries(config);

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
  } else {
    console.log(formatAppsTable(entries));
  }

  return 0;
}
