/**
 * Interlink Resolver
 * Rewrites textual references to known pages into relative markdown links
 */

import { buildLinkPatterns } from "./link-patterns";
import { stripExtension } from "./strip-extension";
import type { LinkRule, SitePages } from "../types";

/** Root term that may link to its own page */
export const SELF_LINKABLE = "Quattor";

export interface InterlinkResult {
  pages: SitePages;
  links: number; // Number of references rewritten
}

/**
 * Copy the section and page maps; contents are strings and need no copy
 */
export function clonePages(pages: SitePages): SitePages {
  const copy: SitePages = new Map();
  for (const [section, sectionPages] of pages) {
    copy.set(section, new Map(sectionPages));
  }
  return copy;
}

/**
 * Derive the link rule of every page, in section then page order
 */
export function collectLinkRules(pages: SitePages): LinkRule[] {
  const rules: LinkRule[] = [];

  for (const [section, sectionPages] of pages) {
    for (const pageName of sectionPages.keys()) {
      const basename = stripExtension(pageName);
      rules.push({
        section,
        pageName,
        basename,
        link: `../${section}/${pageName}`,
        patterns: buildLinkPatterns(section, basename),
      });
    }
  }

  return rules;
}

/**
 * Whether a page may receive links for the given basename
 * A page never links to a name contained in its own name, except SELF_LINKABLE.
 */
export function isLinkable(
  pageName: string,
  content: string,
  basename: string,
): boolean {
  if (!content.includes(basename)) return false;
  return !pageName.includes(basename) || basename === SELF_LINKABLE;
}

/**
 * Match a reference pattern as a whole word: after a space, a newline or the
 * start of the content, and before one of ",", ".", " " or "$"
 */
export function referenceRegex(pattern: string): RegExp {
  return new RegExp(`( |^|\\n)${pattern}([,. $])`, "g");
}

/**
 * Rewrite references matching `pattern` in place; returns how many were replaced
 */
function rewriteReferences(
  pages: SitePages,
  pattern: string,
  basename: string,
  link: string,
): number {
  const regex = referenceRegex(pattern);
  const replacement = `[${basename}](${link})`;
  let links = 0;

  for (const sectionPages of pages.values()) {
    for (const [pageName, content] of sectionPages) {
      if (!isLinkable(pageName, content, basename)) continue;

      const rewritten = content.replace(
        regex,
        (_match, before: string, after: string) => {
          links++;
          return `${before}${replacement}${after}`;
        },
      );

      if (rewritten !== content) {
        sectionPages.set(pageName, rewritten);
      }
    }
  }

  return links;
}

/**
 * Replace every reference matching `pattern` by a link to `link`, on the pages
 * allowed to link to `basename`
 *
 * @returns A fresh structure and the number of references replaced
 */
export function replaceLinks(
  pages: SitePages,
  pattern: string,
  basename: string,
  link: string,
): InterlinkResult {
  const result = clonePages(pages);
  const links = rewriteReferences(result, pattern, basename, link);
  return { pages: result, links };
}

/**
 * Rewrite references for every page of the site
 *
 * Rules are applied in section then page order and patterns in their listed
 * order, each on the content left by the previous rewrite. When two pages
 * share a basename, the rule applied first owns a contested reference.
 * The input is copied once and left untouched.
 */
export function makeInterlinks(pages: SitePages): InterlinkResult {
  const result = clonePages(pages);
  let links = 0;

  for (const rule of collectLinkRules(pages)) {
    for (const pattern of rule.patterns) {
      links += rewriteReferences(result, pattern, rule.basename, rule.link);
    }
  }

  return { pages: result, links };
}
