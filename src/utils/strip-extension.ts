import path from "node:path";

/**
 * Remove the extension of the last path segment, keeping any directories
 *
 * @example
 * stripExtension("Fetch/Download.pod") // "Fetch/Download"
 * stripExtension("FreeIPA::Client") // "FreeIPA::Client"
 * stripExtension(".profile") // ".profile"
 */
export function stripExtension(filename: string): string {
  const ext = path.posix.extname(filename);
  return ext ? filename.slice(0, -ext.length) : filename;
}
