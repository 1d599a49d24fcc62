/**
 * JSON Model Analysis
 * Default analysis collaborator: reads a reconstructed model export
 * (validated with zod) instead of parsing the binary itself
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { ModelExportSchema } from "../types";
import type { AnalysisCollaborator, Image } from "../types";
import type { Logger } from "../utils";

export class JsonModelAnalysis implements AnalysisCollaborator {
  constructor(private readonly logger?: Logger) {}

  async loadFromFile(
    binaryPath: string,
    metadataPath: string,
  ): Promise<Image[] | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(metadataPath, "utf-8"));
    } catch (error) {
      this.logger?.warn(
        `Could not read model export ${metadataPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    const parsed = ModelExportSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((e) => `${e.path.join(".") || "<root>"}: ${e.message}`)
        .join("; ");
      this.logger?.warn(`Invalid model export ${metadataPath}: ${details}`);
      return null;
    }

    if (parsed.data.images.length === 0) {
      return null;
    }

    this.logger?.debug(
      `Loaded ${parsed.data.images.length} image(s) for ${path.basename(binaryPath)}`,
    );

    return parsed.data.images.map((image) => ({
      name: image.name,
      binaryPath,
      assemblies: image.assemblies,
    }));
  }
}
