/**
 * Application Configuration Model
 *
 * Data structures loaded from ~/.config/spawn/spawn.json. Maps the
 * application name given on the command line to how it is launched and how
 * its windows are recognised.
 */

import { z } from "zod";
import { WindowIdentifierSchema } from "./identifier.ts";
import type { WindowIdentifier } from "./identifier.ts";

/**
 * Per-application entry
 */
export interface AppConfig {
  /** Command to launch the app (payload of the terminal for terminal apps) */
  command: string;

  /** Whether the app runs inside the configured terminal */
  is_terminal: boolean;

  /** How the app's windows are recognised */
  identifier: WindowIdentifier;

  /** Replaces the computed startup command entirely */
  startup_override?: string;
}

/**
 * Top-level configuration
 */
export interface SpawnConfig {
  /** Terminal emulator used to host terminal apps (e.g. "alacritty") */
  terminal: string;

  /** Apps by name */
  apps: Record<string, AppConfig>;
}

/**
 * Zod schema for AppConfig
 */
export const AppConfigSchema = z.object({
  command: z.string().min(1),
  is_terminal: z.boolean().default(false),
  identifier: WindowIdentifierSchema,
  startup_override: z.string().optional(),
});

/**
 * Zod schema for SpawnConfig
 *
 * `terminal` may only be left empty when no app would be wrapped in it.
 */
export const SpawnConfigSchema = z.object({
  terminal: z.string().default(""),
  apps: z.record(z.string().min(1), AppConfigSchema),
}).superRefine((config, ctx) => {
  if (config.terminal.trim() !== "") {
    return;
  }
  for (const [name, app] of Object.entries(config.apps)) {
    if (app.is_terminal && app.identifier.kind === "title" && app.startup_override === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["terminal"],
        message: `required by terminal app "${name}"`,
      });
    }
  }
});

/**
 * Input shape accepted in the JSON file (before defaults are applied)
 */
export type SpawnConfigInput = z.input<typeof SpawnConfigSchema>;
