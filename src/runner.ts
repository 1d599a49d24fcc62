/**
 * Run orchestration
 * Validates inputs, analyzes once and emits every image in order
 */

import { analyze, emit, validate } from "./modules";
import type { DumpContext } from "./types";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Execute one dump run and resolve to the process exit code
 * Every failure is recorded on the tracker before the run stops
 */
export async function run(ctx: DumpContext): Promise<number> {
  try {
    ctx.onProgress?.("Checking inputs...");
    await validate(ctx);

    ctx.onProgress?.("Analyzing IL2CPP data...");
    await analyze(ctx);

    await emit(ctx);
  } catch (error) {
    ctx.tracker.trackError(ctx.options.binaryPath, error, "input");
    return EXIT_FAILURE;
  }

  return ctx.tracker.hasErrors() ? EXIT_FAILURE : EXIT_SUCCESS;
}
