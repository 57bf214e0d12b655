/**
 * Structure Module
 * Maps the page catalog onto website sections
 */

import { buildSiteStructure } from "../utils/build-site-structure";
import type { BuildContext } from "../types";

/**
 * Reads from context:
 * - catalog (from scanner)
 * - repositories (from preflight)
 *
 * Writes to context:
 * - sitePages: section -> canonical page name -> markdown
 */
export async function structure(ctx: BuildContext): Promise<void> {
  if (!ctx.catalog || !ctx.repositories) {
    throw new Error("Scanner must run before structure");
  }

  const { logger, tracker } = ctx;

  const sitePages = buildSiteStructure(
    ctx.catalog,
    ctx.repositories,
    ({ repository, sourcePath, targets }) => {
      logger.error(
        `No suitable target found for ${sourcePath} in ${targets.join(", ")}.`,
      );
      tracker.trackUnmatchedTarget(sourcePath, repository, targets);
    },
  );

  let pages = 0;
  for (const sectionPages of sitePages.values()) {
    pages += sectionPages.size;
  }
  tracker.setPages(pages);

  ctx.sitePages = sitePages;
}
