/**
 * sway-spawn - Public API
 */

// Models
export type { WindowRecord, WindowProperties, WindowNodeType } from "./src/models/window-record.ts";
export { WindowRecordSchema, WINDOW_NODE_TYPES, isWindowNodeType } from "./src/models/window-record.ts";
export type {
  AppIdIdentifier,
  ClassIdentifier,
  IdentifierKind,
  TitleIdentifier,
  WindowIdentifier,
} from "./src/models/identifier.ts";
export { byAppId, byClass, byTitle, describeIdentifier, WindowIdentifierSchema } from "./src/models/identifier.ts";
export type { AppConfig, SpawnConfig, SpawnConfigInput } from "./src/models/app-config.ts";
export { AppConfigSchema, SpawnConfigSchema } from "./src/models/app-config.ts";
export type { AggregateState, ToggleAction, ToggleResult } from "./src/models/toggle.ts";
export { ErrorType, StructuredError, isStructuredError } from "./src/models/structured-error.ts";

// Engine
export { TreeExtractor, extractWindows } from "./src/services/tree-extractor.ts";
export type { ExtractionStats, TreeExtractorOptions } from "./src/services/tree-extractor.ts";
export { equalsIgnoreAsciiCase, matchesIdentifier } from "./src/services/matcher.ts";
export { findMatches, isFocused, isRunning, resolveState } from "./src/services/state-resolver.ts";
export { buildCriteria, buildStartupCommand, decide } from "./src/services/toggle-decision.ts";

// Collaborators
export { SwayClient, execFileRunner, formatIpcArgs } from "./src/services/sway-client.ts";
export type { CommandOutput, CommandRunner, SwayClientOptions } from "./src/services/sway-client.ts";
export { findApp, loadConfig, parseConfig, resolveConfigPath } from "./src/services/config-loader.ts";

// Commands
export { toggleApp, toggleCommand, formatIpcCommand } from "./src/commands/toggle.ts";
export type { ToggleOptions } from "./src/commands/toggle.ts";
export { listAppsCommand } from "./src/commands/list-apps.ts";
export { run } from "./src/cli.ts";
