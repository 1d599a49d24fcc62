/**
 * Validator Module
 * Checks that every input exists before any analysis runs and, in solution
 * mode, resolves the toolchain folders
 */

import path from "node:path";
import { findPath } from "../utils";
import { InputNotFoundError } from "../types";
import type { DumpContext, PathProbe, ToolchainPaths } from "../types";

async function requireFile(probe: PathProbe, filePath: string): Promise<void> {
  if (!(await probe.fileExists(filePath))) {
    throw new InputNotFoundError(filePath);
  }
}

async function requireDirectory(probe: PathProbe, dirPath: string): Promise<void> {
  if (!(await probe.directoryExists(dirPath))) {
    throw new InputNotFoundError(dirPath, `Folder ${dirPath} does not exist`);
  }
}

/**
 * Resolve both toolchain wildcard paths and verify them in a fixed order:
 * root folder, root marker, assemblies folder, assemblies marker
 */
export async function resolveToolchain(ctx: DumpContext): Promise<ToolchainPaths> {
  const { options, collaborators } = ctx;
  const { directoryProbe, pathProbe } = collaborators;

  const unityPath = await findPath(options.toolchainRoot, directoryProbe);
  const unityAssembliesPath = await findPath(
    options.toolchainAssembliesRoot,
    directoryProbe,
  );
  ctx.logger.debug(`Toolchain root: ${unityPath}`);
  ctx.logger.debug(`Toolchain assemblies: ${unityAssembliesPath}`);

  await requireDirectory(pathProbe, unityPath);
  await requireFile(pathProbe, path.join(unityPath, options.toolchainRootMarker));
  await requireDirectory(pathProbe, unityAssembliesPath);
  await requireFile(
    pathProbe,
    path.join(unityAssembliesPath, options.toolchainAssembliesMarker),
  );

  return { unityPath, unityAssembliesPath };
}

/**
 * Validates inputs and populates context
 *
 * Writes to context:
 * - toolchain: Resolved toolchain folders (solution mode only)
 *
 * Throws InputNotFoundError for the first missing input
 */
export async function validate(ctx: DumpContext): Promise<void> {
  const { options, collaborators } = ctx;

  await requireFile(collaborators.pathProbe, options.binaryPath);
  await requireFile(collaborators.pathProbe, options.metadataPath);

  if (options.createSolution) {
    ctx.toolchain = await resolveToolchain(ctx);
  }
}
