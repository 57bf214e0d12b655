/**
 * Table of Contents Renderer
 * Turns the table of contents into the site generator's navigation file
 */

import { writeFile } from "fs/promises";
import { basename, join } from "node:path";
import { loadTemplate } from "./load-template";
import { TemplateRenderError } from "./errors";
import { compareIgnoreCase, sortPageNames } from "./build-table-of-contents";
import { stripExtension } from "./strip-extension";
import {
  DEFAULT_NAVIGATION_TEMPLATE_NAME,
  getDefaultNavigationTemplate,
} from "../templates/defaults";
import type {
  NavigationTemplateContext,
  SiteConfig,
  TableOfContents,
} from "../types";

/**
 * Build the navigation template context
 * Sections and pages are sorted ignoring case; sections without pages are left out.
 */
export function buildNavigationContext(
  toc: ReadonlyMap<string, Iterable<string>>,
  site: Pick<SiteConfig, "name" | "docsDir">,
): NavigationTemplateContext {
  const sections = [...toc.keys()].sort(compareIgnoreCase).map((name) => ({
    name,
    pages: sortPageNames(toc.get(name) ?? []).map((filename) => ({
      title: stripExtension(filename),
      filename,
      path: `${name}/${filename}`,
    })),
  }));

  return {
    siteName: site.name,
    docsDir: site.docsDir,
    sections: sections.filter((section) => section.pages.length > 0),
  };
}

/**
 * Render the navigation file into `location/<site.navFile>`
 *
 * @returns Path of the written file
 * @throws TemplateRenderError when the template cannot be loaded or rendered
 */
export async function renderToc(
  toc: TableOfContents,
  location: string,
  site: SiteConfig,
): Promise<string> {
  const data = buildNavigationContext(toc, site);
  const name = site.navTemplate
    ? basename(site.navTemplate)
    : DEFAULT_NAVIGATION_TEMPLATE_NAME;

  let rendered: string;
  try {
    const template = await loadTemplate(
      site.navTemplate,
      getDefaultNavigationTemplate(),
    );
    rendered = template(data);
  } catch (error) {
    throw new TemplateRenderError(name, data, error);
  }

  const path = join(location, site.navFile);
  await writeFile(path, rendered, "utf-8");
  return path;
}
