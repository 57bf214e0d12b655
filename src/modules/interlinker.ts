/**
 * Interlinker Module
 * Turns references to known pages into relative links
 */

import { makeInterlinks } from "../utils/make-interlinks";
import type { BuildContext } from "../types";

/**
 * Reads from context:
 * - sitePages (from structure)
 *
 * Writes to context:
 * - sitePages: replaced by the linked copy; the previous value is not modified
 */
export async function interlink(ctx: BuildContext): Promise<void> {
  if (!ctx.sitePages) {
    throw new Error("Structure must run before interlinker");
  }

  ctx.logger.info("Creating interlinks.");
  const { pages, links } = makeInterlinks(ctx.sitePages);
  ctx.logger.debug(`Created ${links} links.`);

  ctx.tracker.setLinks(links);
  ctx.sitePages = pages;
}
