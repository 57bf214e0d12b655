/**
 * Markdown Generator
 * Produces the markdown of one source file
 */

import { readFile } from "fs/promises";
import { extname } from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { CommandsConfig, MarkdownGenerator } from "../types";

const execFileAsync = promisify(execFile);

// Converter output for a large module can exceed the 1 MiB default
const MAX_OUTPUT = 16 * 1024 * 1024;

/**
 * Markdown sources are read as they are; anything else goes through the
 * configured converter (e.g. "pod2markdown <file>"), whose stdout is the page
 */
export function createMarkdownGenerator(
  commands: CommandsConfig,
): MarkdownGenerator {
  return async (sourcePath) => {
    if (extname(sourcePath) === ".md") {
      return readFile(sourcePath, "utf-8");
    }

    const { stdout } = await execFileAsync(commands.markdown, [sourcePath], {
      maxBuffer: MAX_OUTPUT,
    });
    return stdout;
  };
}
