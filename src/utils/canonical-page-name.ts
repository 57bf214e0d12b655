/**
 * Canonical Page Name
 * Maps a raw source path onto the page name used inside a site section
 */

import { stripExtension } from "./strip-extension";

/** Separator between scopes of a canonical page name (e.g. "Fetch::Download") */
export const SCOPE_SEPARATOR = "::";

/**
 * Derive the canonical page name of a source file
 *
 * The first target marker (in list order) found in the path wins. The part of
 * the path after that marker loses its extension, path separators become "::"
 * and ".md" is appended.
 *
 * @returns The page name, or null when no target marker occurs in the path
 *
 * @example
 * canonicalPageName(
 *   "/src/CCM/target/doc/pod/EDG/WP4/CCM/Fetch/Download.pod",
 *   ["EDG/WP4/CCM/"],
 * ) // "Fetch::Download.md"
 */
export function canonicalPageName(
  sourcePath: string,
  targets: readonly string[],
): string | null {
  const target = targets.find((t) => sourcePath.includes(t));
  if (target === undefined) {
    return null;
  }

  // Suffix after the last occurrence of the marker
  const suffix = sourcePath.slice(
    sourcePath.lastIndexOf(target) + target.length,
  );

  return `${stripExtension(suffix).split("/").join(SCOPE_SEPARATOR)}.md`;
}
