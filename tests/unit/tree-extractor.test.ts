/**
 * Unit tests for TreeExtractor
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { extractWindows, TreeExtractor } from "../../src/services/tree-extractor.ts";
import { loadSwayTree } from "../helpers/fixtures.ts";

test("TreeExtractor - extracts tiled and floating windows in pre-order", () => {
  const windows = extractWindows(loadSwayTree());

  assert.equal(windows.length, 5);
  assert.deepEqual(
    windows.map((w) => w.title),
    ["fish-term", undefined, "Obsidian - notes", "Passwords.kdbx - KeePassXC", "Calculator"],
  );
  assert.deepEqual(
    windows.map((w) => w.type),
    ["floating_con", "con", "con", "con", "floating_con"],
  );
});

test("TreeExtractor - decodes only the fields the engine reads", () => {
  const windows = extractWindows(loadSwayTree());

  assert.deepEqual(windows[2], {
    title: "Obsidian - notes",
    app_id: "obsidian",
    focused: true,
    type: "con",
  });
  assert.deepEqual(windows[3], {
    title: "Passwords.kdbx - KeePassXC",
    window_properties: { class: "KeePassXC" },
    focused: false,
    type: "con",
  });
});

test("TreeExtractor - null name and app_id decode as absent", () => {
  const windows = extractWindows({ type: "con", name: null, app_id: null, focused: false });

  assert.deepEqual(windows, [{ focused: false, type: "con" }]);
});

test("TreeExtractor - empty and non-object input yields nothing", () => {
  assert.deepEqual(extractWindows({}), []);
  assert.deepEqual(extractWindows(null), []);
  assert.deepEqual(extractWindows("tree"), []);
  assert.deepEqual(extractWindows([{ type: "con", focused: true }]), []);
  assert.deepEqual(extractWindows({ type: "root", nodes: [], floating_nodes: [] }), []);
});

test("TreeExtractor - non-window node types contribute nothing", () => {
  const tree = {
    type: "root",
    focused: false,
    nodes: [
      { type: "output", name: "obsidian", app_id: "obsidian", focused: true },
      { type: "workspace", name: "obsidian", app_id: "obsidian", focused: true },
      { type: "dockarea", name: "bar", focused: false },
    ],
  };

  assert.deepEqual(extractWindows(tree), []);
});

test("TreeExtractor - counts windows across both child lists at every depth", () => {
  const leaf = (name: string, type = "con") => ({ type, name, focused: false });
  const tree = {
    type: "root",
    nodes: [
      {
        type: "workspace",
        nodes: [leaf("a")],
        floating_nodes: [
          {
            ...leaf("b", "floating_con"),
            nodes: [{ ...leaf("c"), floating_nodes: [leaf("d", "floating_con")] }],
          },
        ],
      },
    ],
    floating_nodes: [leaf("e", "floating_con")],
  };

  const titles = extractWindows(tree).map((w) => w.title);

  assert.deepEqual(titles, ["a", "b", "c", "d", "e"]);
});

test("TreeExtractor - missing or non-array child lists are skipped", () => {
  const tree = {
    type: "workspace",
    nodes: { type: "con", name: "not-a-list", focused: false },
    floating_nodes: [{ type: "floating_con", name: "kept", focused: false }],
  };

  assert.deepEqual(extractWindows(tree).map((w) => w.title), ["kept"]);
});

test("TreeExtractor - malformed window node is skipped, siblings and children kept", () => {
  const tree = {
    type: "workspace",
    nodes: [
      { type: "con", name: "good", focused: false },
      {
        type: "con",
        name: 42,
        focused: "yes",
        nodes: [{ type: "con", name: "child-of-bad", focused: false }],
      },
    ],
  };

  const extractor = new TreeExtractor();
  const windows = extractor.extract(tree);

  assert.deepEqual(windows.map((w) => w.title), ["good", "child-of-bad"]);
  assert.equal(extractor.getStats().malformed, 1);
});

test("TreeExtractor - one good and one malformed window yields exactly one record", () => {
  const tree = {
    type: "root",
    nodes: [
      { type: "con", app_id: "obsidian", focused: true },
      { type: "floating_con", app_id: "obsidian" },
    ],
  };

  const windows = extractWindows(tree);

  assert.equal(windows.length, 1);
  assert.equal(windows[0].app_id, "obsidian");
});

test("TreeExtractor - cyclic input terminates", () => {
  const children: unknown[] = [];
  const node = { type: "con", name: "loop", focused: false, nodes: children };
  children.push(node);

  const extractor = new TreeExtractor();
  const windows = extractor.extract({ type: "root", nodes: [node], floating_nodes: [node] });

  assert.equal(windows.length, 1);
  assert.equal(extractor.getStats().revisited, 2);
});

test("TreeExtractor - depth bound cuts off deeper subtrees", () => {
  const tree = {
    type: "root",
    nodes: [{
      type: "workspace",
      nodes: [{
        type: "con",
        name: "depth-2",
        focused: false,
        nodes: [{ type: "con", name: "depth-3", focused: false }],
      }],
    }],
  };

  const extractor = new TreeExtractor({ maxDepth: 2 });
  const windows = extractor.extract(tree);

  assert.deepEqual(windows.map((w) => w.title), ["depth-2"]);
  assert.equal(extractor.getStats().truncated, 1);
});

test("TreeExtractor - stats reset between extractions", () => {
  const extractor = new TreeExtractor();
  extractor.extract({ type: "con", focused: "no" });
  assert.equal(extractor.getStats().malformed, 1);

  extractor.extract({ type: "con", focused: false });
  assert.deepEqual(extractor.getStats(), { visited: 1, malformed: 0, truncated: 0, revisited: 0 });
});
