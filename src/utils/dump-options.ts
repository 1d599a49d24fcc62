import type { DumpConfig, DumpOptions } from "../types";
import { normalizeExcludedNamespaces } from "./namespaces";

/**
 * Build the immutable run options from a merged configuration
 */
export function createDumpOptions(config: DumpConfig): DumpOptions {
  return Object.freeze({
    binaryPath: config.input.binary,
    metadataPath: config.input.metadata,
    excludedNamespaces: Object.freeze(
      normalizeExcludedNamespaces(config.excludedNamespaces),
    ),
    layoutSchema: config.layout.trim().toLowerCase(),
    sortOrder: config.sort.trim().toLowerCase(),
    flattenHierarchy: config.flatten,
    suppressMetadata: config.suppressMetadata,
    mustCompile: config.mustCompile,
    separateAssemblyAttributesFiles: config.separateAttributes,
    createSolution: config.solution.enabled,
    toolchainRoot: config.solution.unityPath,
    toolchainAssembliesRoot: config.solution.unityAssemblies,
    toolchainRootMarker: config.solution.unityMarker,
    toolchainAssembliesMarker: config.solution.assembliesMarker,
    outputBasePath: config.output.source,
    scriptOutputPath: config.output.script,
  });
}

/**
 * Options as dispatch sees them
 * Solution mode forces tree layout, compilation tidying and separate
 * attribute files; the configured options are left untouched
 */
export function effectiveOptions(options: DumpOptions): DumpOptions {
  if (!options.createSolution) {
    return options;
  }

  return Object.freeze({
    ...options,
    layoutSchema: "tree",
    mustCompile: true,
    separateAssemblyAttributesFiles: true,
  });
}
