/**
 * Shared model fixtures for tests
 */

import { ModelExportSchema } from "../types";
import type { Image } from "../types";

export const ASSEMBLY_VERSION = '[assembly: AssemblyVersion("1.0.0.0")]';

/**
 * Raw model export as the analysis collaborator reads it from disk
 */
export function sampleExport(imageNames: string[] = ["game.so"]) {
  return {
    images: imageNames.map((name) => ({
      name,
      assemblies: [
        {
          name: "Assembly-CSharp.dll",
          attributes: [ASSEMBLY_VERSION],
          types: [
            {
              index: 2,
              name: "Player",
              namespace: "Game",
              baseType: "MonoBehaviour",
              fields: [{ name: "health", type: "int", offset: 0x18 }],
              methods: [
                {
                  name: "Jump",
                  returnType: "void",
                  parameters: [{ name: "height", type: "float" }],
                  address: 0x1a2b,
                },
              ],
            },
            {
              index: 0,
              name: "Enemy",
              namespace: "Game.AI",
              methods: [{ name: "Think", returnType: "int", address: 0x2000 }],
            },
            {
              index: 1,
              name: "<>c",
              namespace: "Game",
              compilerGenerated: true,
            },
            {
              index: 3,
              name: "Program",
              methods: [{ name: "Main", returnType: "void", isStatic: true }],
            },
          ],
        },
        {
          name: "UnityEngine.dll",
          types: [{ index: 4, name: "Object", namespace: "UnityEngine" }],
        },
      ],
    })),
  };
}

export function sampleImage(name = "game.so"): Image {
  const [image] = ModelExportSchema.parse(sampleExport([name])).images;
  return { name: image.name, binaryPath: "game.so", assemblies: image.assemblies };
}
