import path from "node:path";

export const DEFAULT_ARTIFACT_EXTENSIONS = [".cs", ".py", ".sln"];

/**
 * Derive the output path for the image at `imageIndex`
 *
 * The first image keeps `basePath`. Later images get a `-n` suffix, placed
 * before the extension when the final segment ends in a recognized one.
 *
 * @example
 * planArtifactPath("types.cs", 0) // "types.cs"
 * planArtifactPath("types.cs", 1) // "types-1.cs"
 * planArtifactPath("out/types", 2) // "out/types-2"
 */
export function planArtifactPath(
  basePath: string,
  imageIndex: number,
  extensions: readonly string[] = DEFAULT_ARTIFACT_EXTENSIONS,
): string {
  if (!Number.isInteger(imageIndex) || imageIndex < 0) {
    throw new RangeError(`Invalid image index: ${imageIndex}`);
  }

  if (imageIndex === 0) {
    return basePath;
  }

  // A trailing separator names a directory; the suffix goes on its last segment
  const trimmed = basePath.replace(/[\\/]+$/, "") || basePath;
  const suffix = `-${imageIndex}`;
  const extension = path.extname(trimmed);
  const recognized = extensions.some(
    (e) => e.toLowerCase() === extension.toLowerCase(),
  );

  if (extension && recognized) {
    return trimmed.slice(0, -extension.length) + suffix + extension;
  }

  return trimmed + suffix;
}
