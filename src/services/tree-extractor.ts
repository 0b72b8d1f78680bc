/**
 * Tree Extractor Service
 *
 * Walks the raw `swaymsg -t get_tree` document and collects every
 * window-bearing container as a WindowRecord. Only `con` and `floating_con`
 * nodes are decoded; roots, outputs and workspaces are traversal-only.
 *
 * Children are read from `nodes` (tiled) and `floating_nodes` (floating)
 * separately, in that order, so records come out in pre-order:
 *
 *   root
 *   └─ output
 *      └─ workspace
 *         ├─ con (A)          → A
 *         │  └─ con (B)       → B
 *         └─ floating_con (C) → C
 *
 *   extract(root) = [A, B, C]
 */

import { TREE_LIMITS } from "../constants.ts";
import { isWindowNodeType, WindowRecordSchema } from "../models/window-record.ts";
import type { WindowRecord } from "../models/window-record.ts";
import * as logger from "../utils/logger.ts";

type TreeNode = Record<string, unknown>;

function isTreeNode(value: unknown): value is TreeNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface TreeExtractorOptions {
  /** Nodes deeper than this (root = 0) are not visited */
  maxDepth?: number;
}

/**
 * Counters from the last extraction, for diagnostics
 */
export interface ExtractionStats {
  /** Object nodes visited */
  visited: number;

  /** Window-bearing nodes that failed to decode */
  malformed: number;

  /** Subtrees cut off by the depth bound */
  truncated: number;

  /** Nodes reached a second time (shared or cyclic references) */
  revisited: number;
}

/**
 * Tree Extractor Service
 */
export class TreeExtractor {
  private readonly maxDepth: number;
  private stats: ExtractionStats = TreeExtractor.emptyStats();

  constructor(options: TreeExtractorOptions = {}) {
    this.maxDepth = options.maxDepth ?? TREE_LIMITS.MAX_DEPTH;
  }

  private static emptyStats(): ExtractionStats {
    return { visited: 0, malformed: 0, truncated: 0, revisited: 0 };
  }

  /**
   * Extract all window records from a tree snapshot
   *
   * @param root - Parsed JSON document; any shape is accepted
   * @returns Window records in pre-order
   */
  extract(root: unknown): WindowRecord[] {
    this.stats = TreeExtractor.emptyStats();
    const windows: WindowRecord[] = [];
    this.walk(root, 0, new WeakSet<object>(), windows);

    logger.debug(
      `Extracted ${windows.length} windows from ${this.stats.visited} nodes`,
      this.stats,
    );
    return windows;
  }

  /**
   * Counters from the most recent `extract()` call
   */
  getStats(): ExtractionStats {
    return { ...this.stats };
  }

  private walk(
    node: unknown,
    depth: number,
    seen: WeakSet<object>,
    windows: WindowRecord[],
  ): void {
    if (!isTreeNode(node)) {
      return;
    }

    if (depth > this.maxDepth) {
      this.stats.truncated++;
      return;
    }

    if (seen.has(node)) {
      this.stats.revisited++;
      return;
    }
    seen.add(node);
    this.stats.visited++;

    if (isWindowNodeType(node.type)) {
      const decoded = WindowRecordSchema.safeParse(node);
      if (decoded.success) {
        windows.push(decoded.data);
      } else {
        this.stats.malformed++;
        logger.debug(
          `Skipping malformed ${node.type} node (id ${String(node.id)}): ${
            decoded.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
          }`,
        );
      }
    }

    this.walkChildren(node.nodes, depth + 1, seen, windows);
    this.walkChildren(node.floating_nodes, depth + 1, seen, windows);
  }

  private walkChildren(
    children: unknown,
    depth: number,
    seen: WeakSet<object>,
    windows: WindowRecord[],
  ): void {
    if (!Array.isArray(children)) {
      return;
    }
    for (const child of children) {
      this.walk(child, depth, seen, windows);
    }
  }
}

/**
 * Extract window records with default options
 */
export function extractWindows(root: unknown, options?: TreeExtractorOptions): WindowRecord[] {
  return new TreeExtractor(options).extract(root);
}
