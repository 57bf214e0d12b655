/**
 * Source Scanner
 * Discovers convertible source files inside a repository
 */

import glob from "fast-glob";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type {
  BuildRunner,
  CommandsConfig,
  SourceScanner,
  SourcesConfig,
} from "../types";

const execFileAsync = promisify(execFile);

/**
 * Run the configured build command (e.g. "mvn clean compile") in a repository
 */
export function createBuildRunner(commands: CommandsConfig): BuildRunner {
  return async (repositoryPath) => {
    await execFileAsync(commands.build, commands.buildArgs, {
      cwd: repositoryPath,
    });
  };
}

/**
 * Create a scanner that optionally builds the repository first, then globs
 * for sources. Results are sorted so every run sees the same order.
 */
export function createSourceScanner(
  sources: SourcesConfig,
  runBuild: BuildRunner,
): SourceScanner {
  return async (repositoryPath, compile) => {
    if (compile) {
      await runBuild(repositoryPath);
    }

    const files = await glob(sources.patterns, {
      cwd: repositoryPath,
      absolute: true,
      onlyFiles: true,
      ignore: sources.ignore,
    });

    return files.sort();
  };
}
