/**
 * Dump command - Loads config and runs the dump pipeline
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import { createDumpOptions, loadConfig, Logger, Tracker } from "../../utils";
import { loadTemplates } from "../../templates";
import { createDefaultCollaborators } from "../../collaborators";
import { run } from "../../runner";
import * as modules from "../../modules";
import { bannerText } from "../banner";
import type { DumpConfig, DumpContext } from "../../types";

const DumpOptionsSchema = z.object({
  bin: z.string().optional(),
  metadata: z.string().optional(),
  csOut: z.string().optional(),
  pyOut: z.string().optional(),
  excludeNamespaces: z.string().optional(),
  layout: z.string().optional(),
  sort: z.string().optional(),
  flatten: z.boolean().optional(),
  suppressMetadata: z.boolean().optional(),
  mustCompile: z.boolean().optional(),
  separateAttributes: z.boolean().optional(),
  project: z.boolean().optional(),
  unityPath: z.string().optional(),
  unityAssemblies: z.string().optional(),
  templates: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof DumpOptionsSchema>;

/**
 * Apply CLI flags over the merged configuration
 */
export function applyCliOptions(config: DumpConfig, options: Options): DumpConfig {
  return {
    ...config,
    input: {
      binary: options.bin ?? config.input.binary,
      metadata: options.metadata ?? config.input.metadata,
    },
    output: {
      source: options.csOut ?? config.output.source,
      script: options.pyOut ?? config.output.script,
    },
    excludedNamespaces:
      options.excludeNamespaces !== undefined
        ? options.excludeNamespaces.split(",")
        : config.excludedNamespaces,
    layout: options.layout ?? config.layout,
    sort: options.sort ?? config.sort,
    flatten: options.flatten ?? config.flatten,
    suppressMetadata: options.suppressMetadata ?? config.suppressMetadata,
    mustCompile: options.mustCompile ?? config.mustCompile,
    separateAttributes: options.separateAttributes ?? config.separateAttributes,
    solution: {
      ...config.solution,
      enabled: options.project ?? config.solution.enabled,
      unityPath: options.unityPath ?? config.solution.unityPath,
      unityAssemblies: options.unityAssemblies ?? config.solution.unityAssemblies,
    },
    templates: options.templates ?? config.templates,
    logging: options.verbose ? { level: "debug" } : config.logging,
  };
}

export async function dumpCommand(opts: Options): Promise<void> {
  console.log(chalk.dim(bannerText()));
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = DumpOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI flags on top
    const { config: loaded, errors } = await loadConfig(options.config);
    const config = applyCliOptions(loaded, options);

    const tracker = new Tracker();
    const logger = new Logger(config.logging.level);

    // Config loading errors are reported but do not stop the run
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const templates = await loadTemplates(config.templates);

    const ctx: DumpContext = {
      options: createDumpOptions(config),
      collaborators: createDefaultCollaborators(templates, logger),
      tracker,
      logger,
      onProgress: (text) => {
        spinner.text = text;
      },
    };

    const exitCode = await run(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats(ctx, options.verbose);
    process.exitCode = exitCode;
  } catch (error) {
    spinner.fail("Dump failed");
    console.error(error);
    process.exitCode = 1;
  }
}
