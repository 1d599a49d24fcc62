/**
 * Emitter Module
 * Produces the source and script artifacts of every image, one image at a time
 */

import { measure, planArtifactPath } from "../utils";
import { dispatch } from "./dispatcher";
import type { DispatchError } from "./dispatcher";
import {
  MissingToolchainError,
  UnsupportedCombinationError,
} from "../types";
import type { DumpContext, Image } from "../types";

export const MODEL_LABEL = "Create type model";
export const SOURCE_LABEL = "Generate C# code";
export const SCRIPT_LABEL = "Generate IDA script";

function toError(error: DispatchError): Error {
  switch (error.kind) {
    case "unsupported-combination":
      return new UnsupportedCombinationError(error.layout, error.sort);
    case "missing-toolchain":
      return new MissingToolchainError();
  }
}

/**
 * Emit one image; resolves to false when the image failed and was tracked
 */
async function emitImage(
  ctx: DumpContext,
  image: Image,
  index: number,
  total: number,
): Promise<boolean> {
  const { options, collaborators, tracker, logger } = ctx;
  const sourcePath = planArtifactPath(options.outputBasePath, index);
  const scriptPath = planArtifactPath(options.scriptOutputPath, index);
  const report = (label: string, duration: number) =>
    tracker.trackTiming(label, duration, index);
  const progress = (stage: string) =>
    ctx.onProgress?.(`Image ${index + 1}/${total} (${image.name}): ${stage}...`);

  tracker.startImage(index, image.name, sourcePath, scriptPath);

  try {
    progress(MODEL_LABEL);
    const model = await measure(
      MODEL_LABEL,
      () => collaborators.buildModel(image),
      report,
    );

    progress(SOURCE_LABEL);
    const result = await measure(
      SOURCE_LABEL,
      () =>
        dispatch({
          model,
          options,
          artifactPath: sourcePath,
          toolchain: ctx.toolchain,
          createWriter: collaborators.createSourceWriter,
        }),
      report,
    );

    if (!result.ok) {
      throw toError(result.error);
    }
    tracker.trackArtifacts(index, result.written);
    logger.debug(`${image.name}: ${result.strategy.kind} layout, ${result.written.length} file(s)`);

    progress(SCRIPT_LABEL);
    await measure(
      SCRIPT_LABEL,
      () => collaborators.scriptRenderer.writeScriptToFile(model, scriptPath),
      report,
    );
    tracker.trackArtifacts(index, [scriptPath]);
  } catch (error) {
    tracker.trackError(sourcePath, error);
    return false;
  }

  tracker.completeImage(index);
  return true;
}

/**
 * Emits every analyzed image in discovery order
 * Stops at the first failing image; earlier artifacts stay on disk
 *
 * Reads from context:
 * - images
 * - toolchain (solution mode)
 */
export async function emit(ctx: DumpContext): Promise<void> {
  if (!ctx.images) {
    throw new Error("Analyzer must run before emitter");
  }

  const images = ctx.images;
  for (const [index, image] of images.entries()) {
    if (!(await emitImage(ctx, image, index, images.length))) {
      return;
    }
  }
}
