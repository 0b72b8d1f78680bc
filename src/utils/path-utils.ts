/**
 * Path utility functions for expanding home directory paths
 */

import { homedir } from "node:os";

/**
 * Expands ~ in paths to the user's home directory
 * @param path - Path that may contain ~
 * @returns Expanded absolute path
 */
export function expandPath(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/")) {
    if (!home) {
      throw new Error("Cannot expand ~: home directory unknown");
    }
    return home + path.slice(1);
  }
  return path;
}
