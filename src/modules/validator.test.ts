import { describe, it, expect } from "vitest";
import { validate } from "./validator";
import { createDumpOptions, loadDefaultConfig, Logger, Tracker } from "../utils";
import { InputNotFoundError } from "../types";
import type { Collaborators, DumpContext, DumpOptions, PathProbe } from "../types";

/**
 * Probe over a fixed set of paths, recording the order of checks
 */
function fakePaths(files: string[], directories: string[]) {
  const checked: string[] = [];
  const probe: PathProbe = {
    async fileExists(p) {
      checked.push(p);
      return files.includes(p);
    },
    async directoryExists(p) {
      checked.push(p);
      return directories.includes(p);
    },
  };
  return { probe, checked };
}

async function solutionOptions(): Promise<DumpOptions> {
  const base = await loadDefaultConfig();
  return createDumpOptions({
    ...base,
    input: { binary: "game.so", metadata: "metadata.json" },
    solution: {
      ...base.solution,
      enabled: true,
      unityPath: "/hub/*",
      unityAssemblies: "/hub/*/templates/3d-*/ScriptAssemblies",
    },
  });
}

function context(options: DumpOptions, pathProbe: PathProbe): DumpContext {
  const unused = async () => {
    throw new Error("not used by the validator");
  };
  const collaborators: Collaborators = {
    analysis: { loadFromFile: unused },
    buildModel: () => {
      throw new Error("not used by the validator");
    },
    createSourceWriter: () => {
      throw new Error("not used by the validator");
    },
    scriptRenderer: { writeScriptToFile: unused },
    directoryProbe: {
      async listDirectories(parent) {
        const tree: Record<string, string[]> = {
          "/hub": ["2021.3", "2022.1"],
          "/hub/2022.1/templates": ["3d-1.0", "3d-1.4"],
        };
        return tree[parent] ?? [];
      },
    },
    pathProbe,
  };
  return { options, collaborators, tracker: new Tracker(), logger: new Logger("error") };
}

const ROOT = "/hub/2022.1";
const ASSEMBLIES = "/hub/2022.1/templates/3d-1.4/ScriptAssemblies";
const ROOT_MARKER = `${ROOT}/Editor/Data/Managed/UnityEditor.dll`;
const ASSEMBLIES_MARKER = `${ASSEMBLIES}/UnityEngine.UI.dll`;

describe("validate", () => {
  it("stops at a missing binary without checking the metadata", async () => {
    const { probe, checked } = fakePaths(["metadata.json"], []);
    const ctx = context(await solutionOptions(), probe);

    await expect(validate(ctx)).rejects.toEqual(new InputNotFoundError("game.so"));
    expect(checked).toEqual(["game.so"]);
  });

  it("reports a missing metadata file", async () => {
    const { probe } = fakePaths(["game.so"], []);
    const error = await validate(context(await solutionOptions(), probe)).catch(
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(InputNotFoundError);
    expect(error instanceof InputNotFoundError && error.path).toBe("metadata.json");
  });

  it("resolves and probes the toolchain in order", async () => {
    const { probe, checked } = fakePaths(
      ["game.so", "metadata.json", ROOT_MARKER, ASSEMBLIES_MARKER],
      [ROOT, ASSEMBLIES],
    );
    const ctx = context(await solutionOptions(), probe);
    await validate(ctx);

    expect(ctx.toolchain).toEqual({ unityPath: ROOT, unityAssembliesPath: ASSEMBLIES });
    expect(checked).toEqual([
      "game.so",
      "metadata.json",
      ROOT,
      ROOT_MARKER,
      ASSEMBLIES,
      ASSEMBLIES_MARKER,
    ]);
  });

  it("fails on the first missing toolchain marker", async () => {
    const { probe, checked } = fakePaths(
      ["game.so", "metadata.json", ASSEMBLIES_MARKER],
      [ROOT, ASSEMBLIES],
    );
    const error = await validate(context(await solutionOptions(), probe)).catch(
      (e: unknown) => e,
    );
    expect(error instanceof InputNotFoundError && error.path).toBe(ROOT_MARKER);
    expect(checked.at(-1)).toBe(ROOT_MARKER);
  });
});
