/**
 * Unit tests for SwayClient, driven through a fake command runner
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { ErrorType, StructuredError } from "../../src/models/structured-error.ts";
import { formatIpcArgs, SwayClient } from "../../src/services/sway-client.ts";
import type { CommandOutput, CommandRunner } from "../../src/services/sway-client.ts";

interface RecordedCall {
  command: string;
  args: readonly string[];
  timeoutMs: number;
}

function fakeRunner(output: CommandOutput | Error): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = (command, args, timeoutMs) => {
    calls.push({ command, args, timeoutMs });
    return output instanceof Error ? Promise.reject(output) : Promise.resolve(output);
  };
  return { runner, calls };
}

function swayError(reason: string) {
  return (error: unknown): boolean => {
    assert.ok(error instanceof StructuredError);
    assert.equal(error.type, ErrorType.SWAY_ERROR);
    assert.equal(error.reason, reason);
    return true;
  };
}

test("SwayClient.getTree - runs get_tree and parses stdout", async () => {
  const { runner, calls } = fakeRunner({ code: 0, stdout: '{"type":"root","nodes":[]}', stderr: "" });
  const client = new SwayClient({ runner });

  const tree = await client.getTree();

  assert.deepEqual(tree, { type: "root", nodes: [] });
  assert.deepEqual(calls, [{ command: "swaymsg", args: ["-t", "get_tree"], timeoutMs: 5000 }]);
});

test("SwayClient.getTree - honours binary and timeout options", async () => {
  const { runner, calls } = fakeRunner({ code: 0, stdout: "{}", stderr: "" });
  const client = new SwayClient({ runner, binary: "/run/current-system/sw/bin/swaymsg", timeoutMs: 250 });

  await client.getTree();

  assert.equal(calls[0].command, "/run/current-system/sw/bin/swaymsg");
  assert.equal(calls[0].timeoutMs, 250);
});

test("SwayClient.getTree - non-zero exit is a sway error", async () => {
  const { runner } = fakeRunner({ code: 1, stdout: "", stderr: "Unable to retrieve socket path\n" });
  const client = new SwayClient({ runner });

  await assert.rejects(client.getTree(), (error: unknown) => {
    assert.ok(error instanceof StructuredError);
    assert.equal(error.type, ErrorType.SWAY_ERROR);
    assert.equal(error.reason, "get_tree exited with code 1");
    assert.equal(error.context?.stderr, "Unable to retrieve socket path");
    assert.equal(error.context?.command, "swaymsg -t get_tree");
    return true;
  });
});

test("SwayClient.getTree - unparsable output is a sway error", async () => {
  const { runner } = fakeRunner({ code: 0, stdout: "not json", stderr: "" });
  const client = new SwayClient({ runner });

  await assert.rejects(client.getTree(), (error: unknown) => {
    assert.ok(error instanceof StructuredError);
    assert.equal(error.type, ErrorType.SWAY_ERROR);
    assert.ok(error.reason.startsWith("get_tree returned invalid JSON: "));
    return true;
  });
});

test("SwayClient.getTree - spawn failure is a sway error", async () => {
  const { runner } = fakeRunner(new Error("spawn swaymsg ENOENT"));
  const client = new SwayClient({ runner });

  await assert.rejects(client.getTree(), swayError("Failed to run swaymsg: spawn swaymsg ENOENT"));
});

test("SwayClient.sendCommand - successful reply", async () => {
  const { runner, calls } = fakeRunner({ code: 0, stdout: '[{"success":true}]', stderr: "" });
  const client = new SwayClient({ runner });

  const result = await client.sendCommand(['[app_id="obsidian"] focus']);

  assert.deepEqual(result, { success: true });
  assert.deepEqual(calls[0].args, ['[app_id="obsidian"] focus']);
});

test("SwayClient.sendCommand - reports the first failed reply entry", async () => {
  const { runner } = fakeRunner({
    code: 2,
    stdout: '[{"success":false,"parse_error":false,"error":"No matching node."}]',
    stderr: "",
  });
  const client = new SwayClient({ runner });

  assert.deepEqual(await client.sendCommand(['[title="gone"] focus']), {
    success: false,
    error: "No matching node.",
  });
});

test("SwayClient.sendCommand - non-zero exit without reply uses stderr", async () => {
  const { runner } = fakeRunner({ code: 1, stdout: "", stderr: "Unable to connect to /run/user/1000/sway-ipc.sock\n" });
  const client = new SwayClient({ runner });

  assert.deepEqual(await client.sendCommand(["exec", "fish"]), {
    success: false,
    error: "Unable to connect to /run/user/1000/sway-ipc.sock",
  });
});

test("SwayClient.sendCommand - unrecognized reply is a failure", async () => {
  const { runner } = fakeRunner({ code: 0, stdout: '{"success":true}', stderr: "" });
  const client = new SwayClient({ runner });

  assert.deepEqual(await client.sendCommand(["exec", "fish"]), {
    success: false,
    error: "Unrecognized reply from swaymsg",
  });
});

test("SwayClient.dispatch - sends the action and throws on failure", async () => {
  const ok = fakeRunner({ code: 0, stdout: '[{"success":true}]', stderr: "" });
  await new SwayClient({ runner: ok.runner }).dispatch({ type: "launch", command: "obsidian" });
  assert.deepEqual(ok.calls[0].args, ["exec", "obsidian"]);

  const failing = fakeRunner({ code: 2, stdout: '[{"success":false,"error":"No matching node."}]', stderr: "" });
  await assert.rejects(
    new SwayClient({ runner: failing.runner }).dispatch({ type: "hide", criteria: '[title="x"]' }),
    swayError("hide command failed: No matching node."),
  );
});

test("formatIpcArgs - one command shape per action", () => {
  assert.deepEqual(
    formatIpcArgs({ type: "launch", command: "alacritty --title fish-term --command fish" }),
    ["exec", "alacritty --title fish-term --command fish"],
  );
  assert.deepEqual(formatIpcArgs({ type: "focus", criteria: '[class="KeePassXC"]' }), ['[class="KeePassXC"] focus']);
  assert.deepEqual(
    formatIpcArgs({ type: "hide", criteria: '[class="KeePassXC"]' }),
    ['[class="KeePassXC"] move scratchpad'],
  );
});
