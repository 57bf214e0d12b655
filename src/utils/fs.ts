/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, readdir, stat } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a directory has no entries at all (hidden files included)
 */
export async function isEmptyDirectory(path: string): Promise<boolean> {
  const entries = await readdir(path);
  return entries.length === 0;
}
