/**
 * C# Source Writer
 * Default SourceWriter: renders a type model as C# declaration files in any
 * of the supported layouts, plus the project and solution files for the
 * solution layout
 */

import { mkdir, writeFile } from "node:fs/promises";
import { createHash } from "node:crypto";
import path from "node:path";
import { compareOrdinal } from "../utils";
import { renderDeclaration } from "./declarations";
import type { TemplateSet } from "../templates";
import type {
  AssemblyDefinition,
  SortKey,
  SortKeySelector,
  SourceWriter,
  SourceWriterFactory,
  SourceWriterSettings,
  ToolchainPaths,
  TypeEntry,
  TypeModel,
} from "../types";

const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const GLOBAL_NAMESPACE = "global";

/**
 * Reference assemblies every generated project compiles against
 */
const TOOLCHAIN_REFERENCES = [
  { name: "UnityEngine", relative: "Editor/Data/Managed/UnityEngine.dll" },
  { name: "UnityEditor", relative: "Editor/Data/Managed/UnityEditor.dll" },
];
const ASSEMBLIES_REFERENCES = [
  { name: "UnityEngine.UI", relative: "UnityEngine.UI.dll" },
];

interface AssemblyGroup {
  assembly: AssemblyDefinition;
  name: string; // Sanitized name without the .dll extension
  types: TypeEntry[];
}

// ============================================================================
// Naming Helpers
// ============================================================================

export function sanitizeFileName(name: string): string {
  return name.replace(ILLEGAL_FILENAME_CHARS, "_");
}

export function assemblyBaseName(name: string): string {
  return sanitizeFileName(name.replace(/\.dll$/i, ""));
}

/**
 * Deterministic project GUID derived from the image and assembly names
 */
export function projectGuid(seed: string): string {
  const hex = createHash("md5").update(seed).digest("hex").toUpperCase();
  return `{${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}}`;
}

function namespaceSegments(namespace: string, flatten: boolean): string[] {
  if (namespace === "") return [];
  if (flatten) return [sanitizeFileName(namespace)];
  return namespace.split(".").map(sanitizeFileName);
}

/**
 * Numbers compare numerically, anything else ordinally; ties fall back to the
 * type definition index so the order is total
 */
export function compareTypes(
  a: TypeEntry,
  b: TypeEntry,
  sortKey: SortKeySelector,
): number {
  const ka: SortKey = sortKey(a);
  const kb: SortKey = sortKey(b);
  const primary =
    typeof ka === "number" && typeof kb === "number"
      ? ka - kb
      : compareOrdinal(String(ka), String(kb));
  return primary !== 0 ? primary : a.index - b.index;
}

const byIndex: SortKeySelector = (type) => type.index;

// ============================================================================
// Writer
// ============================================================================

export class CSharpWriter implements SourceWriter {
  constructor(
    private readonly model: TypeModel,
    private readonly settings: SourceWriterSettings,
    private readonly templates: TemplateSet,
  ) {}

  async writeSingleFile(
    outPath: string,
    sortKey: SortKeySelector,
  ): Promise<string[]> {
    const attributes = this.assemblyGroups().flatMap(
      (group) => group.assembly.attributes,
    );
    await this.writeSource(
      outPath,
      this.sorted(this.visibleTypes(), sortKey),
      attributes,
    );
    return [outPath];
  }

  async writeFilesByNamespace(
    outPath: string,
    sortKey: SortKeySelector,
    flatten: boolean,
  ): Promise<string[]> {
    const byNamespace = new Map<string, TypeEntry[]>();
    for (const type of this.sorted(this.visibleTypes(), sortKey)) {
      const group = byNamespace.get(type.namespace) ?? [];
      group.push(type);
      byNamespace.set(type.namespace, group);
    }

    const written: string[] = [];
    const used = new Set<string>();
    const namespaces = [...byNamespace.keys()].sort(compareOrdinal);
    for (const namespace of namespaces) {
      // The unnamed namespace sorts first and keeps the plain global.cs
      const segments =
        namespace === ""
          ? [GLOBAL_NAMESPACE]
          : namespaceSegments(namespace, flatten);
      const directory = path.join(outPath, ...segments.slice(0, -1));
      const filePath = this.uniquePath(directory, segments[segments.length - 1], used);
      await this.writeSource(filePath, byNamespace.get(namespace) ?? [], []);
      written.push(filePath);
    }
    return written;
  }

  async writeFilesByAssembly(
    outPath: string,
    sortKey: SortKeySelector,
    separateAttributes: boolean,
  ): Promise<string[]> {
    const written: string[] = [];
    for (const group of this.assemblyGroups()) {
      const { attributes } = group.assembly;
      const filePath = path.join(outPath, `${group.name}.cs`);

      if (separateAttributes && attributes.length > 0) {
        const infoPath = path.join(outPath, `AssemblyInfo_${group.name}.cs`);
        await this.writeSource(infoPath, [], attributes);
        written.push(infoPath);
      }

      await this.writeSource(
        filePath,
        this.sorted(group.types, sortKey),
        separateAttributes ? [] : attributes,
      );
      written.push(filePath);
    }
    return written;
  }

  async writeFilesByClass(outPath: string, flatten: boolean): Promise<string[]> {
    const written: string[] = [];
    const used = new Set<string>();
    for (const type of this.sorted(this.visibleTypes(), byIndex)) {
      const directory = path.join(
        outPath,
        ...namespaceSegments(type.namespace, flatten),
      );
      const filePath = this.uniquePath(directory, type.name, used);
      await this.writeSource(filePath, [type], []);
      written.push(filePath);
    }
    return written;
  }

  async writeFilesByClassTree(
    outPath: string,
    separateAttributes: boolean,
  ): Promise<string[]> {
    const written: string[] = [];
    const used = new Set<string>();

    for (const group of this.assemblyGroups()) {
      const { attributes } = group.assembly;
      const root = path.join(outPath, group.name);

      if (separateAttributes && attributes.length > 0) {
        const infoPath = path.join(root, "Properties", "AssemblyInfo.cs");
        await this.writeSource(infoPath, [], attributes);
        written.push(infoPath);
      }

      // Without a separate file the attributes go on top of the first type
      let pending = separateAttributes ? [] : attributes;
      for (const type of this.sorted(group.types, byIndex)) {
        const directory = path.join(
          root,
          ...namespaceSegments(type.namespace, false),
        );
        const filePath = this.uniquePath(directory, type.name, used);
        await this.writeSource(filePath, [type], pending);
        pending = [];
        written.push(filePath);
      }
    }
    return written;
  }

  async writeSolution(
    outPath: string,
    toolchain: ToolchainPaths,
  ): Promise<string[]> {
    const written = await this.writeFilesByClassTree(outPath, true);
    const imageName = this.model.image.name;

    const references = [
      ...TOOLCHAIN_REFERENCES.map((ref) => ({
        name: ref.name,
        path: path.join(toolchain.unityPath, ref.relative),
      })),
      ...ASSEMBLIES_REFERENCES.map((ref) => ({
        name: ref.name,
        path: path.join(toolchain.unityAssembliesPath, ref.relative),
      })),
    ];

    const projects: Array<{ name: string; path: string; guid: string }> = [];
    for (const group of this.assemblyGroups()) {
      const guid = projectGuid(`${imageName}/${group.name}`);
      const projectPath = path.join(outPath, group.name, `${group.name}.csproj`);
      await this.writeText(
        projectPath,
        this.templates.project({ name: group.name, guid, references }),
      );
      written.push(projectPath);
      projects.push({
        name: group.name,
        path: `${group.name}\\${group.name}.csproj`,
        guid,
      });
    }

    const solutionName = sanitizeFileName(path.parse(imageName).name);
    const solutionPath = path.join(outPath, `${solutionName}.sln`);
    await this.writeText(solutionPath, this.templates.solution({ projects }));
    written.push(solutionPath);
    return written;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private visibleTypes(): TypeEntry[] {
    if (!this.settings.mustCompile) return this.model.types;
    return this.model.types.filter((type) => !type.compilerGenerated);
  }

  private sorted(types: TypeEntry[], sortKey: SortKeySelector): TypeEntry[] {
    return [...types].sort((a, b) => compareTypes(a, b, sortKey));
  }

  /**
   * Assemblies in model order, skipping those with nothing left to write
   */
  private assemblyGroups(): AssemblyGroup[] {
    const visible = this.visibleTypes();
    const groups: AssemblyGroup[] = [];
    for (const assembly of this.model.assemblies) {
      const types = visible.filter((type) => type.assembly === assembly.name);
      if (types.length === 0) continue;
      groups.push({ assembly, name: assemblyBaseName(assembly.name), types });
    }
    return groups;
  }

  /**
   * `<directory>/<Type>.cs`, suffixed `_<n>` when already taken in this run
   */
  private uniquePath(directory: string, typeName: string, used: Set<string>): string {
    const base = sanitizeFileName(typeName);
    let candidate = path.join(directory, `${base}.cs`);
    for (let n = 1; used.has(candidate.toLowerCase()); n++) {
      candidate = path.join(directory, `${base}_${n}.cs`);
    }
    used.add(candidate.toLowerCase());
    return candidate;
  }

  private async writeSource(
    filePath: string,
    types: TypeEntry[],
    attributes: string[],
  ): Promise<void> {
    const content = this.templates.source({
      image: this.model.image.name,
      attributes,
      declarations: types.map((type) => renderDeclaration(type, this.settings)),
    });
    await this.writeText(filePath, content);
  }

  private async writeText(filePath: string, content: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
  }
}

/**
 * Bind a template set into a SourceWriterFactory
 */
export function createCSharpWriterFactory(
  templates: TemplateSet,
): SourceWriterFactory {
  return (model, settings) => new CSharpWriter(model, settings, templates);
}
