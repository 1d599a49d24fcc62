import Handlebars from "handlebars";
import { readFile } from "node:fs/promises";

// Register formatting helpers
Handlebars.registerHelper("hex", (value: unknown) => {
  if (typeof value !== "number") return "";
  return `0x${value.toString(16).toUpperCase()}`;
});

Handlebars.registerHelper("xml", (value: unknown) => {
  return String(value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
});

/**
 * Compile a template without HTML escaping (output is source code, not markup)
 */
export function compileTemplate<T>(source: string): Handlebars.TemplateDelegate<T> {
  return Handlebars.compile<T>(source, { noEscape: true });
}

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<Handlebars.TemplateDelegate<T>> {
  if (templatePath === null) {
    return compileTemplate<T>(defaultTemplate);
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return compileTemplate<T>(templateContent);
}
