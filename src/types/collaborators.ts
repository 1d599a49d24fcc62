/**
 * Collaborator interfaces consumed by the pipeline
 * Default implementations live under src/analysis and src/renderers
 */

import type { Image, TypeEntry, TypeModel } from "./model";
import type { ToolchainPaths } from "./options";

// ============================================================================
// Analysis
// ============================================================================

export interface AnalysisCollaborator {
  /**
   * Load every image found in a binary + metadata pair, in discovery order
   * Returns null when the inputs cannot be analyzed
   */
  loadFromFile(binaryPath: string, metadataPath: string): Promise<Image[] | null>;
}

export type ModelBuilder = (image: Image) => TypeModel;

// ============================================================================
// Source Writer
// ============================================================================

export type SortKey = number | string;
export type SortKeySelector = (type: TypeEntry) => SortKey;

export interface SourceWriterSettings {
  suppressMetadata: boolean;
  mustCompile: boolean;
}

/**
 * Writes C# text for a model, one method per layout
 * Every method resolves to the list of files it wrote
 */
export interface SourceWriter {
  writeSingleFile(outPath: string, sortKey: SortKeySelector): Promise<string[]>;
  writeFilesByNamespace(
    outPath: string,
    sortKey: SortKeySelector,
    flatten: boolean,
  ): Promise<string[]>;
  writeFilesByAssembly(
    outPath: string,
    sortKey: SortKeySelector,
    separateAttributes: boolean,
  ): Promise<string[]>;
  writeFilesByClass(outPath: string, flatten: boolean): Promise<string[]>;
  writeFilesByClassTree(
    outPath: string,
    separateAttributes: boolean,
  ): Promise<string[]>;
  writeSolution(outPath: string, toolchain: ToolchainPaths): Promise<string[]>;
}

export type SourceWriterFactory = (
  model: TypeModel,
  settings: SourceWriterSettings,
) => SourceWriter;

// ============================================================================
// Script Renderer
// ============================================================================

export interface ScriptRenderer {
  writeScriptToFile(model: TypeModel, outPath: string): Promise<void>;
}

// ============================================================================
// Filesystem Probes
// ============================================================================

export interface DirectoryProbe {
  /**
   * Names of the immediate child directories of `parent`
   * Resolves to an empty list when `parent` does not exist
   */
  listDirectories(parent: string): Promise<string[]>;
}

export interface PathProbe {
  fileExists(path: string): Promise<boolean>;
  directoryExists(path: string): Promise<boolean>;
}

export interface Collaborators {
  analysis: AnalysisCollaborator;
  buildModel: ModelBuilder;
  createSourceWriter: SourceWriterFactory;
  scriptRenderer: ScriptRenderer;
  directoryProbe: DirectoryProbe;
  pathProbe: PathProbe;
}
