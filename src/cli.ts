/**
 * Command-line interface
 *
 * Parses argv, dispatches to the toggle or list command and converts every
 * error into a single stderr message plus exit code.
 */

import minimist from "minimist";
import { listAppsCommand } from "./commands/list-apps.ts";
import { toggleCommand } from "./commands/toggle.ts";
import { DEFAULT_CONFIG_PATH, CONFIG_PATH_ENV, EXIT_CODES, VERSION } from "./constants.ts";
import { ErrorType, StructuredError } from "./models/structured-error.ts";
import { handleError } from "./services/error-handler.ts";
import type { SwayClient } from "./services/sway-client.ts";
import { setColorEnabled } from "./utils/ansi.ts";
import { enableDebug, enableVerbose } from "./utils/logger.ts";

const BOOLEAN_FLAGS = ["help", "version", "verbose", "debug", "dry-run", "json", "list", "color"];

export const HELP_TEXT = `
spawn v${VERSION} - toggle Sway applications between launched, focused and scratchpad

USAGE:
  spawn <APP> [OPTIONS]
  spawn --list [OPTIONS]

Each invocation performs exactly one step:
  not running        -> launch it
  running, unfocused -> focus it
  focused            -> move it to the scratchpad

OPTIONS:
  -c, --config <path>  Config file (default: $${CONFIG_PATH_ENV} or ${DEFAULT_CONFIG_PATH})
  -n, --dry-run        Print the swaymsg command instead of sending it
      --json           Machine-readable output
  -l, --list           List configured applications
  -v, --verbose        Explain the decision on stderr
      --debug          Also log IPC traffic and tree statistics
      --no-color       Disable colored output
  -h, --help           Show this help message
  -V, --version        Show version information

EXAMPLES:
  bindsym $mod+Return exec spawn fish
  spawn obsidian --dry-run --verbose
  spawn --list
`;

/**
 * Collaborators the CLI can be given (tests inject a fake Sway client)
 */
export interface CliDeps {
  swayClient?: SwayClient;
}

/**
 * Run the CLI
 *
 * @param argv - Arguments after the program name
 * @returns Process exit code
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const unknownFlags: string[] = [];
  const args = minimist(argv, {
    // "_" keeps positionals such as "007" from being coerced to numbers
    string: ["config", "_"],
    boolean: BOOLEAN_FLAGS,
    alias: { h: "help", V: "version", c: "config", v: "verbose", n: "dry-run", l: "list" },
    default: { color: true },
    unknown: (arg) => {
      if (arg.startsWith("-")) {
        unknownFlags.push(arg);
        return false;
      }
      return true;
    },
  });

  const json = args.json === true;

  if (args.color === false) {
    setColorEnabled(false);
  }
  if (args.debug === true) {
    enableDebug();
  } else if (args.verbose === true) {
    enableVerbose();
  }

  if (args.help === true) {
    console.log(HELP_TEXT);
    return EXIT_CODES.SUCCESS;
  }

  if (args.version === true) {
    console.log(`spawn v${VERSION}`);
    return EXIT_CODES.SUCCESS;
  }

  const configPath = typeof args.config === "string" && args.config !== ""
    ? args.config
    : undefined;
  const positional = args._.map(String);

  try {
    if (unknownFlags.length > 0) {
      throw usageError(`Unknown option: ${unknownFlags.join(", ")}`);
    }
    if (Array.isArray(args.config)) {
      throw usageError(`Option --config given ${args.config.length} times; pass it once`);
    }

    if (args.list === true) {
      return await listAppsCommand({ configPath, json });
    }

    if (positional.length === 0) {
      throw usageError("Missing application name");
    }
    if (positional.length > 1) {
      throw usageError(`Expected one application name, got ${positional.length}: ${positional.join(" ")}`);
    }

    return await toggleCommand({
      app: positional[0],
      configPath,
      dryRun: args["dry-run"] === true,
      json,
      swayClient: deps.swayClient,
    });
  } catch (error) {
    return handleError(error, { json });
  }
}

function usageError(reason: string): StructuredError {
  return new StructuredError(
    ErrorType.USAGE_ERROR,
    "CLI",
    reason,
    ["Usage: spawn <APP> [OPTIONS]", "Run 'spawn --help' for all options"],
  );
}
