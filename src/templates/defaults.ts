/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

export const DEFAULT_NAVIGATION_TEMPLATE_NAME = "mkdocs.yml.hbs";

/**
 * Generate default navigation template
 * Generates the MkDocs configuration with one nav entry per section
 */
export function getDefaultNavigationTemplate(): string {
  return `site_name: {{{quote siteName}}}
docs_dir: {{{quote docsDir}}}

nav:
{{#each sections}}
  - {{{quote name}}}:
{{#each pages}}
      - {{{quote title}}}: {{{quote path}}}
{{/each}}
{{/each}}
`;
}
