/**
 * Documentation builder
 * Wires collaborators into a build context and runs the pipeline modules
 */

import * as modules from "./modules";
import { commandAvailable } from "./utils/command-available";
import { createMarkdownGenerator } from "./utils/markdown-generator";
import {
  createBuildRunner,
  createSourceScanner,
} from "./utils/source-scanner";
import { Logger, Tracker } from "./types";
import type { BuildCollaborators, BuildConfig, BuildContext } from "./types";

/**
 * Default collaborators: search $PATH, glob for sources, run the configured converter
 */
export function createCollaborators(config: BuildConfig): BuildCollaborators {
  return {
    commandAvailable: (command) => commandAvailable(command),
    scanSources: createSourceScanner(
      config.sources,
      createBuildRunner(config.commands),
    ),
    generateMarkdown: createMarkdownGenerator(config.commands),
  };
}

interface ContextOptions {
  collaborators?: Partial<BuildCollaborators>;
  tracker?: Tracker;
  verbose?: boolean;
}

export function createContext(
  config: BuildConfig,
  options: ContextOptions = {},
): BuildContext {
  return {
    config,
    tracker: options.tracker ?? new Tracker(),
    logger: new Logger(options.verbose ? "debug" : config.logging.level),
    collaborators: {
      ...createCollaborators(config),
      ...options.collaborators,
    },
    verbose: options.verbose,
  };
}

const STAGES: Array<{ label: string; run: (ctx: BuildContext) => Promise<void> }> = [
  { label: "Checking preconditions...", run: modules.preflight },
  { label: "Generating markdown...", run: modules.scan },
  { label: "Building site structure...", run: modules.structure },
  { label: "Creating interlinks...", run: modules.interlink },
  { label: "Writing pages...", run: modules.write },
  { label: "Writing navigation...", run: modules.navigation },
];

/**
 * Run the whole build; fatal errors propagate to the caller
 */
export async function build(
  ctx: BuildContext,
  onStage?: (label: string) => void,
): Promise<void> {
  for (const stage of STAGES) {
    onStage?.(stage.label);
    await stage.run(ctx);
  }
}
