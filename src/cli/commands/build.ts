/**
 * Build command - Loads config and runs the documentation pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig } from "../../utils/load-config";
import { build, createContext } from "../../builder";
import * as modules from "../../modules";
import { CleanupOptionSchema, LogLevelSchema, Tracker } from "../../types";
import type { BuildConfig } from "../../types";

const BuildOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  compile: z.boolean().optional(),
  cleanup: z.array(CleanupOptionSchema).optional(),
  logLevel: LogLevelSchema.optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof BuildOptionsSchema>;

/**
 * CLI options win over every configuration layer; `--no-compile` turns a
 * configured compile off
 */
export function applyOverrides(config: BuildConfig, options: Options): BuildConfig {
  return {
    ...config,
    input: options.input || config.input,
    output: options.output || config.output,
    compile: options.compile ?? config.compile,
    cleanup: options.cleanup ?? config.cleanup,
    logging: { ...config.logging, level: options.logLevel ?? config.logging.level },
  };
}

export async function buildCommand(opts: unknown): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = BuildOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const loaded = await loadConfig(options.config);
    const config = applyOverrides(loaded.config, options);

    const tracker = new Tracker();

    for (const err of loaded.errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx = createContext(config, { tracker, verbose: options.verbose });

    await build(ctx, (label) => {
      spinner.text = label;
    });

    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);
  } catch (error) {
    spinner.fail("Build failed");
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
