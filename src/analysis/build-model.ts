import type { Image, TypeModel } from "../types";

/**
 * Flatten an image into a type model
 * Types keep discovery order: assemblies in image order, then declaration order
 */
export function buildTypeModel(image: Image): TypeModel {
  return {
    image,
    assemblies: image.assemblies,
    types: image.assemblies.flatMap((assembly) =>
      assembly.types.map((type) => ({ ...type, assembly: assembly.name })),
    ),
  };
}
