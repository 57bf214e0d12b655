import type { SitePages, TableOfContents } from "../types";

/**
 * Order strings ignoring case; strings equal ignoring case fall back to
 * code point order so the result never depends on input order
 */
export function compareIgnoreCase(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Deduplicate and sort page names ignoring case
 */
export function sortPageNames(names: Iterable<string>): string[] {
  return [...new Set(names)].sort(compareIgnoreCase);
}

/**
 * Build the table of contents of the final site pages
 */
export function buildTableOfContents(pages: SitePages): TableOfContents {
  const toc: TableOfContents = new Map();
  for (const [section, sectionPages] of pages) {
    toc.set(section, sortPageNames(sectionPages.keys()));
  }
  return toc;
}
