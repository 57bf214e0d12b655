/**
 * Scanner Module
 * Collects the generated markdown of every repository into the page catalog
 */

import path from "node:path";
import { cleanupContent } from "../utils/cleanup-content";
import type { BuildContext, PageCatalog } from "../types";

/**
 * Scans each repository, converts its sources and cleans the markdown
 *
 * Reads from context:
 * - repositories (from preflight)
 *
 * Writes to context:
 * - catalog: repository -> source path -> markdown
 */
export async function scan(ctx: BuildContext): Promise<void> {
  if (!ctx.repositories) {
    throw new Error("Preflight must run before scanner");
  }

  const { config, logger, tracker, collaborators, repositories } = ctx;
  const catalog: PageCatalog = new Map();

  for (const repository of Object.keys(repositories).sort()) {
    const { subdir } = repositories[repository];
    const repositoryPath = subdir
      ? path.join(config.input, repository, subdir)
      : path.join(config.input, repository);

    logger.info(`Building documentation for ${repository}.`);
    logger.info(`Path: ${repositoryPath}.`);

    const sources = await collaborators.scanSources(
      repositoryPath,
      config.compile,
    );
    logger.debug(`Sources: ${sources.join(", ")}`);

    const markdowns = new Map<string, string>();

    for (const source of sources) {
      tracker.incrementSources();

      try {
        const markdown = await collaborators.generateMarkdown(source);
        markdowns.set(source, cleanupContent(markdown, config.cleanup));
      } catch (error) {
        logger.error(`Failed to generate markdown for ${source}.`, error);
        tracker.trackError(source, error, "file", "convert");
      }
    }

    catalog.set(repository, markdowns);
  }

  ctx.catalog = catalog;
}
