/**
 * Repositories command - Show the effective repository map
 */

import chalk from "chalk";
import { z } from "zod";
import { loadConfig } from "../../utils/load-config";

const RepositoriesOptionsSchema = z.object({
  config: z.string().optional(),
});

type Options = z.infer<typeof RepositoriesOptionsSchema>;

export async function repositoriesCommand(opts: Options): Promise<void> {
  const options = RepositoriesOptionsSchema.parse(opts);
  const { config, errors } = await loadConfig(options.config);

  for (const { path } of errors) {
    console.warn(chalk.yellow(`Ignored invalid config ${path}`));
  }

  const names = Object.keys(config.repositories).sort();
  const width = Math.max(0, ...names.map((name) => name.length));

  for (const name of names) {
    const { sitesection, targets, subdir } = config.repositories[name];
    const location = subdir ? `${name}/${subdir}` : name;
    console.log(
      `  ${chalk.bold(name.padEnd(width))}  ${chalk.cyan(sitesection)}  ${chalk.dim(targets.join(" "))}` +
        (location !== name ? chalk.dim(`  (${location})`) : ""),
    );
  }
}
