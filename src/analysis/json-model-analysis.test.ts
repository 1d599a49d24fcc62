import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { JsonModelAnalysis } from "./json-model-analysis";
import { buildTypeModel } from "./build-model";
import { sampleExport, sampleImage } from "../testing/fixtures";

describe("JsonModelAnalysis", () => {
  let dir: string;
  const analysis = new JsonModelAnalysis();

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "json-model-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function exportFile(content: string): Promise<string> {
    const file = path.join(dir, "metadata.json");
    await writeFile(file, content);
    return file;
  }

  it("loads images in export order with defaults applied", async () => {
    const metadata = await exportFile(JSON.stringify(sampleExport(["a.so", "b.so"])));
    const images = await analysis.loadFromFile("bin/game.so", metadata);

    expect(images?.map((i) => i.name)).toEqual(["a.so", "b.so"]);
    expect(images?.[0].binaryPath).toBe("bin/game.so");
    expect(images?.[0].assemblies[1].attributes).toEqual([]);
  });

  it("returns null for an empty export", async () => {
    const metadata = await exportFile(JSON.stringify({ images: [] }));
    expect(await analysis.loadFromFile("game.so", metadata)).toBeNull();
  });

  it("returns null for malformed or invalid exports", async () => {
    expect(await analysis.loadFromFile("game.so", await exportFile("{ not json"))).toBeNull();
    expect(
      await analysis.loadFromFile("game.so", await exportFile('{"images":[{"name":1}]}')),
    ).toBeNull();
    expect(await analysis.loadFromFile("game.so", path.join(dir, "missing.json"))).toBeNull();
  });
});

describe("buildTypeModel", () => {
  it("flattens types in discovery order with their assembly", () => {
    const model = buildTypeModel(sampleImage());
    expect(model.types.map((t) => [t.assembly, t.index])).toEqual([
      ["Assembly-CSharp.dll", 2],
      ["Assembly-CSharp.dll", 0],
      ["Assembly-CSharp.dll", 1],
      ["Assembly-CSharp.dll", 3],
      ["UnityEngine.dll", 4],
    ]);
  });
});
