/**
 * Dispatcher Module
 * Maps the effective layout options of a run onto exactly one source writer
 * operation and invokes it for a single image
 */

import { effectiveOptions, isNamespaceExcluded } from "../utils";
import type {
  DumpOptions,
  SortKeySelector,
  SourceWriter,
  SourceWriterFactory,
  ToolchainPaths,
  TypeModel,
} from "../types";

// ============================================================================
// Types
// ============================================================================

export const LAYOUTS = ["single", "namespace", "assembly", "class", "tree"] as const;
export type Layout = (typeof LAYOUTS)[number];

export const SORT_ORDERS = ["index", "name"] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export type LayoutStrategy =
  | { kind: "single"; sort: SortOrder }
  | { kind: "namespace"; sort: SortOrder; flatten: boolean }
  | { kind: "assembly"; sort: SortOrder; separateAttributes: boolean }
  | { kind: "class"; flatten: boolean }
  | { kind: "tree"; separateAttributes: boolean }
  | { kind: "solution"; toolchain: ToolchainPaths };

export type DispatchError =
  | { kind: "unsupported-combination"; layout: string; sort: string }
  | { kind: "missing-toolchain" };

export type StrategySelection =
  | { ok: true; strategy: LayoutStrategy }
  | { ok: false; error: DispatchError };

export interface DispatchRequest {
  model: TypeModel;
  // Configured options; solution overrides are applied here
  options: DumpOptions;
  artifactPath: string;
  toolchain?: ToolchainPaths;
  createWriter: SourceWriterFactory;
}

export type DispatchResult =
  | { ok: true; strategy: LayoutStrategy; written: string[] }
  | { ok: false; error: DispatchError };

// ============================================================================
// Strategy Selection
// ============================================================================

function isLayout(value: string): value is Layout {
  return LAYOUTS.some((layout) => layout === value);
}

function isSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

export const SORT_KEYS: Record<SortOrder, SortKeySelector> = {
  index: (type) => type.index,
  name: (type) => type.name,
};

/**
 * Pick the writer operation for a set of options
 * Solution mode wins over the configured layout
 */
export function selectStrategy(
  options: DumpOptions,
  toolchain?: ToolchainPaths,
): StrategySelection {
  const effective = effectiveOptions(options);

  if (effective.createSolution) {
    if (!toolchain) {
      return { ok: false, error: { kind: "missing-toolchain" } };
    }
    return { ok: true, strategy: { kind: "solution", toolchain } };
  }

  const layout = effective.layoutSchema;
  const sort = effective.sortOrder;
  const unsupported: StrategySelection = {
    ok: false,
    error: { kind: "unsupported-combination", layout, sort },
  };

  if (!isLayout(layout)) {
    return unsupported;
  }

  switch (layout) {
    case "single":
      return isSortOrder(sort)
        ? { ok: true, strategy: { kind: "single", sort } }
        : unsupported;
    case "namespace":
      return isSortOrder(sort)
        ? {
            ok: true,
            strategy: {
              kind: "namespace",
              sort,
              flatten: effective.flattenHierarchy,
            },
          }
        : unsupported;
    case "assembly":
      return isSortOrder(sort)
        ? {
            ok: true,
            strategy: {
              kind: "assembly",
              sort,
              separateAttributes: effective.separateAssemblyAttributesFiles,
            },
          }
        : unsupported;
    // Per-type layouts ignore the sort order
    case "class":
      return {
        ok: true,
        strategy: { kind: "class", flatten: effective.flattenHierarchy },
      };
    case "tree":
      return {
        ok: true,
        strategy: {
          kind: "tree",
          separateAttributes: effective.separateAssemblyAttributesFiles,
        },
      };
    default: {
      const unreachable: never = layout;
      return unreachable;
    }
  }
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Drop every type in an excluded namespace, in both the flat type list and
 * the per-assembly lists
 */
export function filterModel(
  model: TypeModel,
  excluded: readonly string[],
): TypeModel {
  if (excluded.length === 0) return model;

  const keep = (namespace: string) => !isNamespaceExcluded(namespace, excluded);
  return {
    image: model.image,
    assemblies: model.assemblies.map((assembly) => ({
      ...assembly,
      types: assembly.types.filter((type) => keep(type.namespace)),
    })),
    types: model.types.filter((type) => keep(type.namespace)),
  };
}

async function invoke(
  writer: SourceWriter,
  strategy: LayoutStrategy,
  artifactPath: string,
): Promise<string[]> {
  switch (strategy.kind) {
    case "single":
      return writer.writeSingleFile(artifactPath, SORT_KEYS[strategy.sort]);
    case "namespace":
      return writer.writeFilesByNamespace(
        artifactPath,
        SORT_KEYS[strategy.sort],
        strategy.flatten,
      );
    case "assembly":
      return writer.writeFilesByAssembly(
        artifactPath,
        SORT_KEYS[strategy.sort],
        strategy.separateAttributes,
      );
    case "class":
      return writer.writeFilesByClass(artifactPath, strategy.flatten);
    case "tree":
      return writer.writeFilesByClassTree(
        artifactPath,
        strategy.separateAttributes,
      );
    case "solution":
      return writer.writeSolution(artifactPath, strategy.toolchain);
    default: {
      const unreachable: never = strategy;
      return unreachable;
    }
  }
}

/**
 * Write one image's source artifacts with the strategy its options select
 * Writer failures propagate to the caller
 */
export async function dispatch(request: DispatchRequest): Promise<DispatchResult> {
  const selection = selectStrategy(request.options, request.toolchain);
  if (!selection.ok) {
    return selection;
  }

  const effective = effectiveOptions(request.options);
  const writer = request.createWriter(
    filterModel(request.model, effective.excludedNamespaces),
    {
      suppressMetadata: effective.suppressMetadata,
      mustCompile: effective.mustCompile,
    },
  );

  const written = await invoke(writer, selection.strategy, request.artifactPath);
  return { ok: true, strategy: selection.strategy, written };
}
