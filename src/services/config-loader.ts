/**
 * Config Loader Service
 *
 * Loads and validates the spawn configuration from JSON and looks up app
 * entries. The config is read once per invocation and passed explicitly to
 * whatever needs it.
 */

import { readFile } from "node:fs/promises";
import { CONFIG_PATH_ENV, DEFAULT_CONFIG_PATH } from "../constants.ts";
import { SpawnConfigSchema } from "../models/app-config.ts";
import type { AppConfig, SpawnConfig } from "../models/app-config.ts";
import { ErrorType, StructuredError } from "../models/structured-error.ts";
import * as logger from "../utils/logger.ts";
import { expandPath } from "../utils/path-utils.ts";

const COMPONENT = "Config Loader";

/**
 * Pick the config path: explicit flag, then $SPAWN_CONFIG, then the default
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return expandPath(explicitPath || env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Validate raw (already parsed) config data
 *
 * @throws StructuredError (CONFIG_ERROR) listing every schema issue
 */
export function parseConfig(data: unknown, source = "<inline>"): SpawnConfig {
  const result = SpawnConfigSchema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const validationErrors = result.error.issues.map((issue) =>
    `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
  );

  throw new StructuredError(
    ErrorType.CONFIG_ERROR,
    COMPONENT,
    "Invalid configuration - schema validation failed",
    [
      `Fix the following validation errors in ${source}:`,
      ...validationErrors.map((err) => `  - ${err}`),
      `Each app needs "command" and an "identifier" with exactly one of title, app_id, class`,
    ],
    {
      config_path: source,
      validation_errors: validationErrors,
    },
  );
}

/**
 * Load and validate the configuration file
 *
 * @param path - Absolute path (see resolveConfigPath)
 * @throws StructuredError (CONFIG_ERROR) if missing, unreadable or invalid
 */
export async function loadConfig(path: string): Promise<SpawnConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new StructuredError(
        ErrorType.CONFIG_ERROR,
        COMPONENT,
        `Config file not found at: ${path}`,
        [
          `Create the config file at ${DEFAULT_CONFIG_PATH}`,
          `Or point to one with --config <path> or $${CONFIG_PATH_ENV}`,
        ],
        { config_path: path },
      );
    }

    throw new StructuredError(
      ErrorType.CONFIG_ERROR,
      COMPONENT,
      `Failed to read config: ${error instanceof Error ? error.message : String(error)}`,
      [
        `Check file permissions for ${path}`,
        `Ensure file is readable by current user`,
      ],
      { config_path: path },
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StructuredError(
      ErrorType.CONFIG_ERROR,
      COMPONENT,
      `Invalid JSON in config file: ${error instanceof Error ? error.message : String(error)}`,
      [`Verify JSON syntax of ${path}`],
      { config_path: path },
    );
  }

  const config = parseConfig(raw, path);
  logger.verbose(`Loaded ${Object.keys(config.apps).length} apps from ${path}`);
  return config;
}

/**
 * Look up an application by name
 *
 * @throws StructuredError (APP_NOT_FOUND) listing the configured names
 */
export function findApp(config: SpawnConfig, name: string): AppConfig {
  if (Object.hasOwn(config.apps, name)) {
    return config.apps[name];
  }

  const available = Object.keys(config.apps).sort();
  throw new StructuredError(
    ErrorType.APP_NOT_FOUND,
    COMPONENT,
    `Unknown application: ${name}`,
    available.length > 0
      ? [
        `Use one of the configured apps: ${available.join(", ")}`,
        `Or add "${name}" under "apps" in the config file`,
      ]
      : [`Add "${name}" under "apps" in the config file`],
    { app_name: name },
  );
}

