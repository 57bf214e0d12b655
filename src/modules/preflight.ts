/**
 * Preflight Module
 * Verifies paths, external commands and repositories before any work is done
 */

import { join } from "node:path";
import { fileExists, isDirectory, isEmptyDirectory } from "../utils/fs";
import { PreconditionError } from "../utils/errors";
import type {
  BuildContext,
  CommandAvailable,
  CommandsConfig,
  PreflightCheck,
  RepositoryMap,
} from "../types";

function pass(name: string, message: string): PreflightCheck {
  return { name, ok: true, message };
}

function fail(name: string, message: string): PreflightCheck {
  return { name, ok: false, message };
}

/**
 * Check the repository and output locations
 * Stops at the first failure since later checks depend on earlier ones.
 */
export async function checkInput(
  input: string,
  output: string,
): Promise<PreflightCheck[]> {
  if (!input) {
    return [fail("input", "Repository location not specified.")];
  }
  if (!output) {
    return [fail("output", "Output location not specified.")];
  }
  if (!(await fileExists(input))) {
    return [fail("input", `Repository location ${input} does not exist.`)];
  }
  if (!(await fileExists(output))) {
    return [fail("output", `Output location ${output} does not exist.`)];
  }
  if (!(await isDirectory(output))) {
    return [fail("output", `Output location ${output} is not a directory.`)];
  }
  if (!(await isEmptyDirectory(output))) {
    return [fail("output", `Output location ${output} is not empty.`)];
  }

  return [
    pass("input", `Repository location ${input} exists.`),
    pass("output", `Output location ${output} is empty.`),
  ];
}

/**
 * Check the external commands the build needs
 * The build tool is only required when the repositories are compiled first.
 */
export async function checkCommands(
  compile: boolean,
  commands: CommandsConfig,
  isAvailable: CommandAvailable,
): Promise<PreflightCheck[]> {
  const required = compile
    ? [commands.build, commands.markdown]
    : [commands.markdown];
  const checks: PreflightCheck[] = [];

  for (const command of required) {
    checks.push(
      (await isAvailable(command))
        ? pass(command, `The command ${command} is available.`)
        : fail(
            command,
            `The command ${command} is not available on this system, please install it.`,
          ),
    );
  }

  return checks;
}

/**
 * Keep the configured repositories that are present under the input location
 */
export async function selectRepositories(
  input: string,
  repositories: RepositoryMap,
): Promise<{ selected: RepositoryMap; missing: string[] }> {
  const selected: RepositoryMap = {};
  const missing: string[] = [];

  for (const [repository, descriptor] of Object.entries(repositories)) {
    const path = descriptor.subdir
      ? join(input, repository, descriptor.subdir)
      : join(input, repository);

    if (await isDirectory(path)) {
      selected[repository] = descriptor;
    } else {
      missing.push(repository);
    }
  }

  return { selected, missing };
}

/**
 * Run every precondition and store the usable repositories on the context
 *
 * Writes to context:
 * - repositories: Configured repositories found on disk
 *
 * @throws PreconditionError listing every failed check
 */
export async function preflight(ctx: BuildContext): Promise<void> {
  const { config, logger, tracker, collaborators } = ctx;

  logger.info("Checking if the given paths exist.");
  const inputChecks = await checkInput(config.input, config.output);
  const failed = inputChecks.filter((check) => !check.ok);

  if (failed.length === 0) {
    const commandChecks = await checkCommands(
      config.compile,
      config.commands,
      collaborators.commandAvailable,
    );
    failed.push(...commandChecks.filter((check) => !check.ok));
  }

  if (failed.length === 0) {
    const { selected, missing } = await selectRepositories(
      config.input,
      config.repositories,
    );

    for (const repository of missing) {
      logger.warn(`Repository ${repository} not found in ${config.input}.`);
      tracker.trackMissingRepository(join(config.input, repository), repository);
    }

    if (Object.keys(selected).length === 0) {
      failed.push(
        fail(
          "repositories",
          `None of the configured repositories exist in ${config.input}.`,
        ),
      );
    }

    ctx.repositories = selected;
    tracker.setRepositories(Object.keys(selected).length);
  }

  if (failed.length > 0) {
    for (const check of failed) {
      logger.error(check.message);
    }
    throw new PreconditionError(failed);
  }
}
