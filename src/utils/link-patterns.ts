/**
 * Reference patterns for interlinking
 *
 * Every page can be referred to by several spellings of its basename. Each
 * entry returned here is a RegExp source matching one spelling literally.
 */

import { escapeRegExp } from "./escape-regexp";

const DOCUMENTATION_URL = "https://metacpan.org/pod/";

// Sections whose pages used to be hyperlinked to external module documentation
const LEGACY_NAMESPACES = new Map<string, string>([
  ["CCM", "EDG::WP4::CCM"],
  ["Unittest", "Test"],
  ["components", "NCM::Component"],
  ["components-grid", "NCM::Component"],
]);

// Sections following the "ncm-<name>" component naming convention
const COMPONENT_SECTIONS = new Set(["components", "components-grid"]);

export const COMPONENT_PREFIX = "ncm-";

/**
 * Build the ordered reference patterns for a page
 *
 * @example
 * buildLinkPatterns("CCM", "Fetch")
 * // ["`Fetch`", "`CCM::Fetch`",
 * //  "\\[EDG::WP4::CCM::Fetch\\]\\(https://metacpan\\.org/pod/EDG::WP4::CCM::Fetch\\)"]
 */
export function buildLinkPatterns(section: string, basename: string): string[] {
  const name = escapeRegExp(basename);
  const patterns = [`\`${name}\``, `\`${escapeRegExp(section)}::${name}\``];

  const namespace = LEGACY_NAMESPACES.get(section);
  if (namespace !== undefined) {
    const qualified = escapeRegExp(`${namespace}::${basename}`);
    const url = escapeRegExp(DOCUMENTATION_URL);
    patterns.push(`\\[${qualified}\\]\\(${url}${qualified}\\)`);
  }

  if (COMPONENT_SECTIONS.has(section)) {
    patterns.push(`\`${COMPONENT_PREFIX}${name}\``, `${COMPONENT_PREFIX}${name}`);
  }

  return patterns;
}
