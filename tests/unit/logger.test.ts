/**
 * Unit tests for the stderr logger
 */

import assert from "node:assert/strict";
import { afterEach, mock, test } from "node:test";
import { setColorEnabled } from "../../src/utils/ansi.ts";
import * as logger from "../../src/utils/logger.ts";

setColorEnabled(false);

afterEach(() => {
  mock.restoreAll();
  logger.resetLogging();
});

function captureStderr(): () => string[] {
  const stderr = mock.method(console, "error", () => {});
  return () => stderr.mock.calls.map((call) => String(call.arguments[0]));
}

test("logger - quiet by default", () => {
  const lines = captureStderr();

  logger.verbose("resolving fish");
  logger.debug("tree captured");
  logger.debugIpc(["-t", "get_tree"]);

  assert.deepEqual(lines(), []);
  assert.equal(logger.isDebug(), false);
});

test("logger - verbose does not enable debug", () => {
  const lines = captureStderr();
  logger.enableVerbose();

  logger.verbose("resolving fish");
  logger.debug("tree captured");

  assert.deepEqual(lines(), ["[VERBOSE] resolving fish"]);
});

test("logger - debug implies verbose and logs IPC", () => {
  const lines = captureStderr();
  logger.enableDebug();

  logger.verbose("resolving fish");
  logger.debugIpc(["-t", "get_tree"]);

  assert.deepEqual(lines(), ["[VERBOSE] resolving fish", "[DEBUG] IPC: swaymsg -t get_tree"]);
  assert.equal(logger.isDebug(), true);
});
