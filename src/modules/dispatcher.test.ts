import { describe, it, expect } from "vitest";
import { dispatch, filterModel, selectStrategy, SORT_KEYS } from "./dispatcher";
import { buildTypeModel } from "../analysis";
import { createDumpOptions, loadDefaultConfig } from "../utils";
import { sampleImage } from "../testing/fixtures";
import type {
  DumpConfig,
  DumpOptions,
  SourceWriter,
  SourceWriterFactory,
  SourceWriterSettings,
  TypeModel,
} from "../types";

interface WriterCall {
  method: keyof SourceWriter;
  args: unknown[];
  model: TypeModel;
  settings: SourceWriterSettings;
}

/**
 * Writer factory that records every call instead of writing files
 */
function recordingFactory() {
  const calls: WriterCall[] = [];
  const factory: SourceWriterFactory = (model, settings) => {
    const record =
      (method: keyof SourceWriter) =>
      async (...args: unknown[]): Promise<string[]> => {
        calls.push({ method, args, model, settings });
        return [`${method}.out`];
      };
    return {
      writeSingleFile: record("writeSingleFile"),
      writeFilesByNamespace: record("writeFilesByNamespace"),
      writeFilesByAssembly: record("writeFilesByAssembly"),
      writeFilesByClass: record("writeFilesByClass"),
      writeFilesByClassTree: record("writeFilesByClassTree"),
      writeSolution: record("writeSolution"),
    };
  };
  return { factory, calls };
}

async function optionsWith(
  overrides: Partial<DumpConfig>,
  solution = false,
): Promise<DumpOptions> {
  const base = await loadDefaultConfig();
  return createDumpOptions({
    ...base,
    ...overrides,
    solution: { ...base.solution, enabled: solution },
  });
}

const toolchain = { unityPath: "/unity", unityAssembliesPath: "/unity/asm" };

describe("selectStrategy", () => {
  it.each([
    ["single", "index", "single"],
    ["single", "name", "single"],
    ["namespace", "index", "namespace"],
    ["namespace", "name", "namespace"],
    ["assembly", "index", "assembly"],
    ["assembly", "name", "assembly"],
    ["class", "index", "class"],
    ["class", "whatever", "class"],
    ["tree", "name", "tree"],
  ])("maps %s/%s to the %s strategy", async (layout, sort, kind) => {
    const selection = selectStrategy(await optionsWith({ layout, sort }));
    expect(selection.ok && selection.strategy.kind).toBe(kind);
  });

  it("rejects unknown layout/sort pairs", async () => {
    expect(selectStrategy(await optionsWith({ layout: "single", sort: "size" }))).toEqual({
      ok: false,
      error: { kind: "unsupported-combination", layout: "single", sort: "size" },
    });
    expect(selectStrategy(await optionsWith({ layout: "flat", sort: "index" }))).toEqual({
      ok: false,
      error: { kind: "unsupported-combination", layout: "flat", sort: "index" },
    });
  });

  it("requires toolchain paths in solution mode", async () => {
    const options = await optionsWith({}, true);
    expect(selectStrategy(options)).toEqual({
      ok: false,
      error: { kind: "missing-toolchain" },
    });
    expect(selectStrategy(options, toolchain)).toEqual({
      ok: true,
      strategy: { kind: "solution", toolchain },
    });
  });
});

describe("dispatch", () => {
  const model = buildTypeModel(sampleImage());

  it("invokes exactly one writer operation with the planned path", async () => {
    const { factory, calls } = recordingFactory();
    const result = await dispatch({
      model,
      options: await optionsWith({ layout: "namespace", sort: "name", flatten: true }),
      artifactPath: "out-1",
      createWriter: factory,
    });

    expect(result).toEqual({
      ok: true,
      strategy: { kind: "namespace", sort: "name", flatten: true },
      written: ["writeFilesByNamespace.out"],
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].args[0]).toBe("out-1");
    expect(calls[0].args[1]).toBe(SORT_KEYS.name);
    expect(calls[0].args[2]).toBe(true);
  });

  it("drops excluded namespaces before the writer sees the model", async () => {
    const { factory, calls } = recordingFactory();
    await dispatch({
      model,
      options: await optionsWith({ excludedNamespaces: ["Game"] }),
      artifactPath: "types.cs",
      createWriter: factory,
    });

    const seen = calls[0].model;
    expect(seen.types.map((t) => t.name)).toEqual(["Program", "Object"]);
    expect(seen.assemblies[0].types.map((t) => t.name)).toEqual(["Program"]);
  });

  it("forwards metadata settings to the writer", async () => {
    const { factory, calls } = recordingFactory();
    await dispatch({
      model,
      options: await optionsWith({ suppressMetadata: true, mustCompile: false }),
      artifactPath: "types.cs",
      createWriter: factory,
    });
    expect(calls[0].settings).toEqual({ suppressMetadata: true, mustCompile: false });
  });

  it("dispatches solution mode with compile flags forced on", async () => {
    const { factory, calls } = recordingFactory();
    const result = await dispatch({
      model,
      options: await optionsWith({ layout: "single", mustCompile: false }, true),
      artifactPath: "solution",
      toolchain,
      createWriter: factory,
    });

    expect(result.ok).toBe(true);
    expect(calls.map((c) => c.method)).toEqual(["writeSolution"]);
    expect(calls[0].args).toEqual(["solution", toolchain]);
    expect(calls[0].settings.mustCompile).toBe(true);
  });

  it("writes nothing for an unsupported pair", async () => {
    const { factory, calls } = recordingFactory();
    const result = await dispatch({
      model,
      options: await optionsWith({ layout: "assembly", sort: "size" }),
      artifactPath: "types.cs",
      createWriter: factory,
    });
    expect(result.ok).toBe(false);
    expect(calls).toEqual([]);
  });
});

describe("filterModel", () => {
  it("returns the same model when nothing is excluded", () => {
    const model = buildTypeModel(sampleImage());
    expect(filterModel(model, [])).toBe(model);
  });
});
