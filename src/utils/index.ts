/**
 * Shared utilities
 */

import * as path from "node:path";

export * from "./logger.js";
export * from "./fs.js";
export * from "./async.js";

// =============================================================================
// Cache Paths
// =============================================================================

export const DEFAULT_CACHE_DIR = ".cache/assets";
export const RESOLVER_CACHE_SUBDIR = "resolver";

/**
 * Absolute cache base directory; relative paths resolve against the working directory
 */
export function resolveCacheBaseDir(cacheDir: string = DEFAULT_CACHE_DIR, cwd: string = process.cwd()): string {
  return path.isAbsolute(cacheDir) ? cacheDir : path.join(cwd, cacheDir);
}

/**
 * Lower-cases, trims and joins whitespace with underscores so that
 * "Serial Number", "serial number" and "serial_number" name the same field.
 */
export function normalizeFieldName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_]+/g, "_");
}
