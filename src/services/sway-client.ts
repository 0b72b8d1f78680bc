/**
 * Sway Client Service
 *
 * Wraps `swaymsg` subprocess calls: one tree query per invocation and one
 * command dispatch. Every failure surfaces as a SWAY_ERROR StructuredError.
 */

import { execFile } from "node:child_process";
import { z } from "zod";
import { TIMEOUTS } from "../constants.ts";
import { ErrorType, StructuredError } from "../models/structured-error.ts";
import type { ToggleAction } from "../models/toggle.ts";
import * as logger from "../utils/logger.ts";

/**
 * Result of running an external command to completion
 */
export interface CommandOutput {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external command. Rejects only when the process could not be
 * started or was killed; a non-zero exit resolves with its code.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  timeoutMs: number,
) => Promise<CommandOutput>;

/**
 * Default runner backed by child_process.execFile
 */
export const execFileRunner: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { timeout: timeoutMs, maxBuffer: 64 * 1024 * 1024, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (error) {
          if (typeof error.code === "number" && !error.killed) {
            resolve({ code: error.code, stdout, stderr });
          } else {
            reject(error);
          }
          return;
        }
        resolve({ code: 0, stdout, stderr });
      },
    );
  });

/**
 * One entry of the swaymsg reply to a command
 */
const CommandReplySchema = z.array(
  z.object({
    success: z.boolean(),
    parse_error: z.boolean().optional(),
    error: z.string().optional(),
  }).passthrough(),
);

export interface SwayClientOptions {
  /** swaymsg executable (default: "swaymsg" from PATH) */
  binary?: string;

  /** Per-call timeout in milliseconds */
  timeoutMs?: number;

  runner?: CommandRunner;
}

/**
 * swaymsg arguments for an action
 *
 * Launch passes `exec` and the command as separate arguments (swaymsg joins
 * them); focus and hide are a single criteria command.
 */
export function formatIpcArgs(action: ToggleAction): string[] {
  switch (action.type) {
    case "launch":
      return ["exec", action.command];
    case "focus":
      return [`${action.criteria} focus`];
    case "hide":
      return [`${action.criteria} move scratchpad`];
    default: {
      const unreachable: never = action;
      throw new Error(`Unhandled action: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Sway IPC client
 */
export class SwayClient {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: SwayClientOptions = {}) {
    this.binary = options.binary ?? "swaymsg";
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.SWAYMSG;
    this.runner = options.runner ?? execFileRunner;
  }

  /**
   * Get the complete window tree from Sway (`swaymsg -t get_tree`)
   *
   * @returns Parsed JSON document, unvalidated
   */
  async getTree(): Promise<unknown> {
    const args = ["-t", "get_tree"];
    const startTime = performance.now();
    const { code, stdout, stderr } = await this.run(args);

    if (code !== 0) {
      throw this.failure(`get_tree exited with code ${code}`, args, {
        stderr: stderr.trim(),
      });
    }

    let tree: unknown;
    try {
      tree = JSON.parse(stdout);
    } catch (error) {
      throw this.failure(
        `get_tree returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        args,
        { output_bytes: stdout.length },
      );
    }

    logger.debug(`Tree captured in ${Math.round(performance.now() - startTime)}ms`);
    return tree;
  }

  /**
   * Send an IPC command to Sway
   *
   * @returns success, or the first error Sway reported
   */
  async sendCommand(args: readonly string[]): Promise<{ success: boolean; error?: string }> {
    const { code, stdout, stderr } = await this.run(args);

    let reply: z.infer<typeof CommandReplySchema> | undefined;
    try {
      const parsed = CommandReplySchema.safeParse(JSON.parse(stdout));
      reply = parsed.success ? parsed.data : undefined;
    } catch {
      reply = undefined;
    }

    const failed = reply?.find((r) => !r.success);
    if (failed) {
      return { success: false, error: failed.error || "Command failed" };
    }

    if (code !== 0) {
      return { success: false, error: stderr.trim() || `swaymsg exited with code ${code}` };
    }

    if (!reply) {
      return { success: false, error: "Unrecognized reply from swaymsg" };
    }

    return { success: true };
  }

  /**
   * Dispatch a toggle action, throwing if Sway rejects it
   */
  async dispatch(action: ToggleAction): Promise<void> {
    const args = formatIpcArgs(action);
    const result = await this.sendCommand(args);
    if (!result.success) {
      throw this.failure(`${action.type} command failed: ${result.error}`, args);
    }
  }

  private async run(args: readonly string[]): Promise<CommandOutput> {
    logger.debugIpc(args);
    try {
      return await this.runner(this.binary, args, this.timeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw this.failure(`Failed to run ${this.binary}: ${message}`, args);
    }
  }

  private failure(
    reason: string,
    args: readonly string[],
    context: Record<string, unknown> = {},
  ): StructuredError {
    return new StructuredError(
      ErrorType.SWAY_ERROR,
      "Sway Client",
      reason,
      [
        "Check that Sway is running: swaymsg -t get_version",
        "Verify SWAYSOCK is set in this environment",
        `Ensure ${this.binary} is on PATH`,
      ],
      { command: [this.binary, ...args].join(" "), ...context },
    );
  }
}
