/**
 * Centralized constants for linekit
 *
 * @module
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

export const NAME = "linekit";

export const VERSION = "0.1.0";

/**
 * Whether the module at `moduleUrl` is the process entry point
 *
 * Symlinks (such as an npm bin link) are resolved before comparing.
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return pathToFileURL(realpathSync(entry)).href === moduleUrl;
  } catch {
    // Entry point no longer on disk: not this module
    return false;
  }
}
