/**
 * Site Writer
 * Persists site pages to disk, one directory per section
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import { buildTableOfContents } from "./build-table-of-contents";
import type { SitePages, TableOfContents } from "../types";

/**
 * Write every page to `location/docsDir/<section>/<page>` and return the
 * table of contents of what was written
 *
 * Existing files are overwritten. Write failures propagate; pages written
 * before the failure stay on disk.
 */
export async function writeSite(
  pages: SitePages,
  location: string,
  docsDir: string,
  onWritten?: (path: string) => void,
): Promise<TableOfContents> {
  for (const [section, sectionPages] of pages) {
    const directory = join(location, docsDir, section);
    await mkdir(directory, { recursive: true });

    for (const [pageName, content] of sectionPages) {
      const path = join(directory, pageName);
      await writeFile(path, content, "utf-8");
      onWritten?.(path);
    }
  }

  return buildTableOfContents(pages);
}
