/**
 * Writer Module
 * Writes the site pages below the output directory
 */

import { writeSite } from "../utils/write-site";
import type { BuildContext } from "../types";

/**
 * Reads from context:
 * - sitePages (from interlinker)
 *
 * Writes to context:
 * - toc: section -> sorted page names
 */
export async function write(ctx: BuildContext): Promise<void> {
  if (!ctx.sitePages) {
    throw new Error("Interlinker must run before writer");
  }

  const { config, tracker, logger } = ctx;

  const toc = await writeSite(
    ctx.sitePages,
    config.output,
    config.site.docsDir,
    (path) => {
      logger.debug(`Wrote ${path}.`);
      tracker.incrementWritten();
    },
  );

  tracker.setSections(toc.size);
  ctx.toc = toc;
}
