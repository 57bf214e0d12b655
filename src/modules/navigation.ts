/**
 * Navigation Module
 * Renders the table of contents into the site generator's configuration
 */

import { renderToc } from "../utils/render-toc";
import type { BuildContext } from "../types";

/**
 * Reads from context:
 * - toc (from writer)
 */
export async function navigation(ctx: BuildContext): Promise<void> {
  if (!ctx.toc) {
    throw new Error("Writer must run before navigation");
  }

  const path = await renderToc(ctx.toc, ctx.config.output, ctx.config.site);
  ctx.logger.info(`Wrote navigation to ${path}.`);
}
