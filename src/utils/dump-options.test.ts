import { describe, it, expect } from "vitest";
import { createDumpOptions, effectiveOptions } from "./dump-options";
import { loadDefaultConfig } from "./load-config";
import type { DumpConfig } from "../types";

async function configWith(overrides: Partial<DumpConfig>): Promise<DumpConfig> {
  return { ...(await loadDefaultConfig()), ...overrides };
}

describe("createDumpOptions", () => {
  it("normalizes layout and sort case", async () => {
    const options = createDumpOptions(
      await configWith({ layout: " Namespace ", sort: "NAME" }),
    );
    expect(options.layoutSchema).toBe("namespace");
    expect(options.sortOrder).toBe("name");
  });

  it("disables exclusion with none", async () => {
    const options = createDumpOptions(
      await configWith({ excludedNamespaces: ["NONE"] }),
    );
    expect(options.excludedNamespaces).toEqual([]);
  });

  it("maps config sections onto run options", async () => {
    const options = createDumpOptions(await loadDefaultConfig());
    expect(options.binaryPath).toBe("libil2cpp.so");
    expect(options.metadataPath).toBe("metadata.json");
    expect(options.outputBasePath).toBe("types.cs");
    expect(options.scriptOutputPath).toBe("ida.py");
    expect(options.toolchainRootMarker).toBe("Editor/Data/Managed/UnityEditor.dll");
    expect(options.excludedNamespaces).toHaveLength(9);
    expect(Object.isFrozen(options)).toBe(true);
  });
});

describe("effectiveOptions", () => {
  it("returns the options untouched outside solution mode", async () => {
    const options = createDumpOptions(await configWith({ layout: "class" }));
    expect(effectiveOptions(options)).toBe(options);
  });

  it("forces tree layout and compile flags in solution mode", async () => {
    const base = await loadDefaultConfig();
    const options = createDumpOptions({
      ...base,
      layout: "single",
      mustCompile: false,
      separateAttributes: false,
      solution: { ...base.solution, enabled: true },
    });

    const effective = effectiveOptions(options);
    expect(effective.layoutSchema).toBe("tree");
    expect(effective.mustCompile).toBe(true);
    expect(effective.separateAssemblyAttributesFiles).toBe(true);

    // Configured options stay as they were
    expect(options.layoutSchema).toBe("single");
    expect(options.mustCompile).toBe(false);
    expect(options.separateAssemblyAttributesFiles).toBe(false);
  });
});
