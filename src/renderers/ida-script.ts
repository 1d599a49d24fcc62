/**
 * IDA Script Renderer
 * Writes a Python script that names every method with a known address
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { TemplateSet } from "../templates";
import type { ScriptRenderer, TypeEntry, TypeModel } from "../types";

/**
 * Escape a name for a single-quoted Python string
 */
export function escapePythonString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export function qualifiedMethodName(type: TypeEntry, method: string): string {
  const owner = type.namespace === "" ? type.name : `${type.namespace}.${type.name}`;
  return `${owner}$$${method}`;
}

export class IdaScriptRenderer implements ScriptRenderer {
  constructor(private readonly templates: TemplateSet) {}

  async writeScriptToFile(model: TypeModel, outPath: string): Promise<void> {
    const methods: Array<{ address: number; name: string }> = [];
    for (const type of model.types) {
      for (const method of type.methods) {
        if (method.address === undefined) continue;
        methods.push({
          address: method.address,
          name: escapePythonString(qualifiedMethodName(type, method.name)),
        });
      }
    }

    const content = this.templates.script({ image: model.image.name, methods });
    await mkdir(path.dirname(outPath), { recursive: true });
    await writeFile(outPath, content, "utf-8");
  }
}
