import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  IdaScriptRenderer,
  escapePythonString,
  qualifiedMethodName,
} from "./ida-script";
import { buildTypeModel } from "../analysis";
import { loadTemplates } from "../templates";
import { sampleImage } from "../testing/fixtures";

describe("IdaScriptRenderer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "ida-script-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("names every method with an address, in model order", async () => {
    const renderer = new IdaScriptRenderer(await loadTemplates());
    const outPath = path.join(dir, "scripts", "ida.py");
    await renderer.writeScriptToFile(buildTypeModel(sampleImage()), outPath);

    const lines = (await readFile(outPath, "utf-8")).split("\n");
    expect(lines).toContain("print('Naming 2 methods...')");
    expect(lines.filter((line) => line.startsWith("set_name("))).toEqual([
      "set_name(0x1A2B, 'Game.Player$$Jump')",
      "set_name(0x2000, 'Game.AI.Enemy$$Think')",
    ]);
    expect(lines.at(-2)).toBe("print('Script finished!')");
  });
});

describe("qualifiedMethodName", () => {
  it("omits the namespace for global types", () => {
    const model = buildTypeModel(sampleImage());
    const program = model.types.find((t) => t.name === "Program");
    if (!program) throw new Error("missing fixture type");
    expect(qualifiedMethodName(program, "Main")).toBe("Program$$Main");
  });
});

describe("escapePythonString", () => {
  it("escapes quotes and backslashes", () => {
    expect(escapePythonString("a'b\\c")).toBe("a\\'b\\\\c");
  });
});
