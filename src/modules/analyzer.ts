/**
 * Analyzer Module
 * Runs the analysis collaborator once for the whole run
 */

import { measure } from "../utils";
import { AnalysisFailureError } from "../types";
import type { DumpContext } from "../types";

export const ANALYZE_LABEL = "Analyze IL2CPP data";

/**
 * Loads every image from the inputs
 *
 * Writes to context:
 * - images: Discovered images, in discovery order
 *
 * Throws AnalysisFailureError when nothing could be loaded
 */
export async function analyze(ctx: DumpContext): Promise<void> {
  const { options, collaborators, tracker } = ctx;

  const images = await measure(
    ANALYZE_LABEL,
    () => collaborators.analysis.loadFromFile(options.binaryPath, options.metadataPath),
    (label, duration) => tracker.trackTiming(label, duration),
  );

  if (!images || images.length === 0) {
    throw new AnalysisFailureError(options.binaryPath);
  }

  tracker.setTotalImages(images.length);
  ctx.images = images;
}
