/**
 * Dump options - immutable configuration for one run
 */

export interface DumpOptions {
  readonly binaryPath: string;
  readonly metadataPath: string;
  readonly excludedNamespaces: readonly string[];
  // Lower-cased as configured; validated by the dispatcher
  readonly layoutSchema: string;
  readonly sortOrder: string;
  readonly flattenHierarchy: boolean;
  readonly suppressMetadata: boolean;
  readonly mustCompile: boolean;
  readonly separateAssemblyAttributesFiles: boolean;
  readonly createSolution: boolean;
  readonly toolchainRoot: string;
  readonly toolchainAssembliesRoot: string;
  readonly toolchainRootMarker: string;
  readonly toolchainAssembliesMarker: string;
  readonly outputBasePath: string;
  readonly scriptOutputPath: string;
}

/**
 * Toolchain folders resolved from their wildcard paths
 */
export interface ToolchainPaths {
  unityPath: string;
  unityAssembliesPath: string;
}
