/**
 * Markdown Line Classifier
 * Tells code block lines apart from prose so cleanup passes leave code alone
 */

import type { MarkdownLine } from "../types";

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})/;
const FENCE_CLOSE = /^ {0,3}(`{3,}|~{3,})\s*$/;
const INDENTED = /^( {4}|\t)/;

function isBlank(line: string): boolean {
  return line.trim() === "";
}

/**
 * Split markdown into lines and flag the ones inside code blocks
 *
 * Fenced blocks run from an opening ``` or ~~~ to a closing fence of the same
 * character that is at least as long, or to the end of the content. Indented
 * blocks start after a blank line (an indented line cannot interrupt a
 * paragraph) and keep inner blank lines that are followed by more code.
 *
 * @example
 * classifyLines("Run:\n\n    make\n")
 * // [{ text: "Run:", code: false }, { text: "", code: false },
 * //  { text: "    make", code: true }, { text: "", code: false }]
 */
export function classifyLines(markdown: string): MarkdownLine[] {
  const lines = markdown.split("\n");
  const result: MarkdownLine[] = [];
  let afterBlank = true;
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];
    const fence = FENCE_OPEN.exec(line);

    if (fence) {
      const marker = fence[1];
      result.push({ text: line, code: true });
      i++;

      while (i < lines.length) {
        const closing = FENCE_CLOSE.exec(lines[i]);
        result.push({ text: lines[i], code: true });
        i++;
        if (
          closing &&
          closing[1][0] === marker[0] &&
          closing[1].length >= marker.length
        ) {
          break;
        }
      }

      afterBlank = false;
      continue;
    }

    if (afterBlank && INDENTED.test(line) && !isBlank(line)) {
      let end = i;
      for (let j = i + 1; j < lines.length; j++) {
        if (isBlank(lines[j])) continue;
        if (!INDENTED.test(lines[j])) break;
        end = j;
      }

      for (; i <= end; i++) {
        result.push({ text: lines[i], code: true });
      }

      afterBlank = false;
      continue;
    }

    result.push({ text: line, code: false });
    afterBlank = isBlank(line);
    i++;
  }

  return result;
}

/**
 * Apply `rewrite` to each run of prose lines, leaving code lines as they are
 */
export function mapProse(
  markdown: string,
  rewrite: (prose: string) => string,
): string {
  const runs: Array<{ code: boolean; lines: string[] }> = [];

  for (const line of classifyLines(markdown)) {
    const last = runs.at(-1);
    if (last && last.code === line.code) {
      last.lines.push(line.text);
    } else {
      runs.push({ code: line.code, lines: [line.text] });
    }
  }

  return runs
    .map((run) => {
      const text = run.lines.join("\n");
      return run.code ? text : rewrite(text);
    })
    .join("\n");
}
