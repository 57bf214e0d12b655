/**
 * Command-line program definition
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { configCommand } from "./commands/config";
import { repositoriesCommand } from "./commands/repositories";

type BuildAction = (opts: unknown) => void | Promise<void>;

export function createProgram(build: BuildAction = buildCommand): Command {
  const program = new Command();

  program
    .name("repodoc")
    .description("Build a static documentation site from source repositories")
    .version("0.1.0");

  // Main build command (default action)
  program
    .option("-i, --input <path>", "Directory containing one subdirectory per repository")
    .option("-o, --output <path>", "Empty output directory for the site")
    .option("-c, --config <path>", "Path to custom config file")
    .option("--compile", "Run the repository build before scanning sources")
    .option("--no-compile", "Skip the repository build, whatever the config says")
    .option("--cleanup <options...>", "Cleanup options applied to generated markdown")
    .option("--log-level <level>", "Log level (debug, info, warn, error)")
    .option("-v, --verbose", "Verbose output")
    .action(build);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location")
    .action(configCommand);

  // Repositories command - show repository map
  program
    .command("repositories")
    .description("Show the repositories, their site sections and target markers")
    .option("-c, --config <path>", "Path to custom config file")
    .action(repositoriesCommand);

  return program;
}
