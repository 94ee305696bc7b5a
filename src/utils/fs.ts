/**
 * File System Utilities
 * Directory creation, atomic replacement and content fingerprints
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * SHA-256 hex digest of string content
 */
export function calculateContentHash(content: string): string {
  return crypto.createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Temp file name beside the target, unique per process and call
 */
export function tempPathFor(filePath: string): string {
  const suffix = `${process.pid}.${crypto.randomUUID()}.tmp`;
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${suffix}`);
}

/**
 * Replace a file atomically: write a temp file in the same directory, then
 * rename it over the target. Readers see the old content or the new content,
 * never a partial write. The temp file is removed if either step fails.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  const tempPath = tempPathFor(filePath);

  try {
    await fsPromises.writeFile(tempPath, content);
    await fsPromises.rename(tempPath, filePath);
  } catch (error) {
    await fsPromises.rm(tempPath, { force: true });
    throw error;
  }
}
