/**
 * Markdown Cleanup
 * Optional passes applied to generated markdown before it enters the site
 */

import { classifyLines, mapProse } from "./classify-lines";
import { CleanupOptionSchema, type CleanupOption } from "../types";

function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * "# NAME" followed by a one-line summary becomes a single title heading
 *
 * @example
 * removeHeaders("# NAME\n\nncm-icinga - icinga server\n\n# DESCRIPTION\n")
 * // "# ncm-icinga - icinga server\n\n# DESCRIPTION\n"
 */
export function removeHeaders(markdown: string): string {
  return markdown.replace(/^\s*# NAME[ \t]*\n\s*([^\n]+)\n?/, "# $1\n");
}

/**
 * All-caps level-1 headings below the first line become level-3 headings
 *
 * @example
 * smallTitles("# ncm-icinga\n\n# SEE ALSO\n") // "# ncm-icinga\n\n### See Also\n"
 */
export function smallTitles(markdown: string): string {
  return classifyLines(markdown)
    .map(({ text, code }, index) =>
      index === 0 || code
        ? text
        : text.replace(
            /^# ([A-Z][A-Z0-9 _-]*)$/,
            (_match, title: string) => `### ${toTitleCase(title)}`,
          ),
    )
    .join("\n");
}

/**
 * Delete e-mail addresses, including surrounding angle brackets
 * Code blocks are left alone (ssh URLs such as git@host:repo look alike).
 */
export function removeEmails(markdown: string): string {
  return mapProse(markdown, (prose) =>
    prose.replace(/<?[\w.+-]+@[\w-]+(?:\.[\w-]+)+>?/g, ""),
  );
}

/**
 * Wrap absolute paths that start a word in backticks, outside code blocks
 *
 * @example
 * codifyPaths("Edit /etc/icinga/icinga.cfg now.") // "Edit `/etc/icinga/icinga.cfg` now."
 */
export function codifyPaths(markdown: string): string {
  return mapProse(markdown, (prose) =>
    prose.replace(
      /(^|[ \t])(\/[\w-]+(?:[./][\w-]+)*\/?)(?=$|[\s,.;:)])/gm,
      "$1`$2`",
    ),
  );
}

/**
 * Strip trailing spaces, collapse runs of blank lines and end with a single
 * newline. Code blocks are kept byte for byte, and a prose line ending in two
 * or more spaces before another prose line keeps a two-space line break.
 */
export function removeWhitespace(markdown: string): string {
  const lines = classifyLines(markdown);
  const output: string[] = [];
  let blankPending = false;

  lines.forEach(({ text, code }, index) => {
    if (code) {
      if (blankPending && output.length > 0) output.push("");
      blankPending = false;
      output.push(text);
      return;
    }

    const trimmed = text.trimEnd();
    if (trimmed === "") {
      blankPending = true;
      return;
    }

    const next = lines[index + 1];
    const lineBreak =
      text.endsWith("  ") &&
      next !== undefined &&
      !next.code &&
      next.text.trim() !== "";

    if (blankPending && output.length > 0) output.push("");
    blankPending = false;
    output.push(lineBreak ? `${trimmed}  ` : trimmed);
  });

  // An unclosed fence can leave blank code lines at the end
  while (output.length > 0 && output[output.length - 1].trim() === "") {
    output.pop();
  }

  return output.length > 0 ? `${output.join("\n")}\n` : "";
}

const CLEANUPS: Record<CleanupOption, (markdown: string) => string> = {
  "remove-headers": removeHeaders,
  "small-titles": smallTitles,
  "remove-emails": removeEmails,
  "codify-paths": codifyPaths,
  "remove-whitespace": removeWhitespace,
};

/**
 * Apply the selected cleanup options
 * Options always run in schema order, whatever order they are given in.
 */
export function cleanupContent(
  markdown: string,
  options: readonly CleanupOption[],
): string {
  return CleanupOptionSchema.options
    .filter((option) => options.includes(option))
    .reduce((content, option) => CLEANUPS[option](content), markdown);
}
