/**
 * Build command - Loads config and runs the build pipeline
 */

import ora from "ora";
import path from "node:path";
import { z } from "zod";
import { loadConfig, Tracker, Logger, pathKind } from "../../utils";
import * as modules from "../../modules";
import type { BuildConfig, BuildContext } from "../../types";

const BuildOptionsSchema = z.object({
  config: z.string().optional(),
  stylesheet: z.string().optional(),
  index: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type BuildOptions = z.infer<typeof BuildOptionsSchema>;

/**
 * Output defaults to the directory holding the sources
 */
export async function defaultOutput(input: string): Promise<string> {
  return (await pathKind(input)) === "file" ? path.dirname(input) : input;
}

/**
 * Apply command-line flags on top of the loaded configuration
 */
export function applyCliOptions(
  config: BuildConfig,
  options: BuildOptions,
): void {
  if (options.stylesheet) {
    config.stylesheet.source = options.stylesheet;
  }
  if (options.index === false) {
    config.output.createIndex = false;
  }
  if (options.verbose) {
    config.logging.level = "debug";
  }
}

export async function buildCommand(
  input: string,
  output: string | undefined,
  opts: BuildOptions,
): Promise<void> {
  // Verbose runs log every step, which a spinner would overwrite
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isSilent: opts.verbose === true,
  }).start();

  try {
    // Validate CLI options
    const options = BuildOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    applyCliOptions(config, options);

    const tracker = new Tracker();
    const logger = new Logger(config.logging.level);

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx: BuildContext = {
      config,
      input,
      output: output ?? (await defaultOutput(input)),
      dryRun: options.dryRun,
      verbose: options.verbose,
      tracker,
      logger,
    };

    await modules.build(ctx, (stage) => {
      spinner.text = stage.label;
    });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);

    if (tracker.hasFailures()) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Build failed");
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
