/**
 * Site Structure Builder
 * Groups generated markdown into website sections under canonical page names
 */

import { canonicalPageName } from "./canonical-page-name";
import type {
  PageCatalog,
  RepositoryDescriptor,
  RepositoryMap,
  SitePages,
  UnmatchedPage,
} from "../types";

/**
 * Build the section -> page name -> markdown structure of the site
 *
 * Every repository of the catalog contributes to the section its descriptor
 * names. Within a section a later page with the same canonical name replaces
 * the earlier one. Pages without a matching target marker are left out and
 * passed to `onUnmatched`.
 */
export function buildSiteStructure(
  catalog: PageCatalog,
  repositories: RepositoryMap,
  onUnmatched?: (page: UnmatchedPage) => void,
): SitePages {
  const sitePages: SitePages = new Map();

  for (const [repository, markdowns] of catalog) {
    const descriptor: RepositoryDescriptor | undefined =
      repositories[repository];
    if (!descriptor) continue;

    const section =
      sitePages.get(descriptor.sitesection) ?? new Map<string, string>();
    sitePages.set(descriptor.sitesection, section);

    for (const [sourcePath, markdown] of markdowns) {
      const pageName = canonicalPageName(sourcePath, descriptor.targets);

      if (pageName === null) {
        onUnmatched?.({
          repository,
          sourcePath,
          targets: descriptor.targets,
        });
        continue;
      }

      section.set(pageName, markdown);
    }
  }

  return sitePages;
}
