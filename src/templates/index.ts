/**
 * Template loading
 * A templates directory may override any built-in template by file name
 */

import path from "node:path";
import type Handlebars from "handlebars";
import { fileExists, loadTemplate } from "../utils";
import {
  DEFAULT_PROJECT_TEMPLATE,
  DEFAULT_SCRIPT_TEMPLATE,
  DEFAULT_SOLUTION_TEMPLATE,
  DEFAULT_SOURCE_TEMPLATE,
} from "./defaults";

// ============================================================================
// Template Context Types
// ============================================================================

/**
 * Context passed to source.cs.hbs
 */
export interface SourceTemplateContext {
  image: string;
  attributes: string[]; // Assembly-level attribute lines
  declarations: string[]; // Rendered type declarations, in output order
}

/**
 * Context passed to project.csproj.hbs
 */
export interface ProjectTemplateContext {
  name: string;
  guid: string;
  references: Array<{ name: string; path: string }>;
}

/**
 * Context passed to solution.sln.hbs
 */
export interface SolutionTemplateContext {
  projects: Array<{ name: string; path: string; guid: string }>;
}

/**
 * Context passed to ida.py.hbs
 */
export interface ScriptTemplateContext {
  image: string;
  methods: Array<{ address: number; name: string }>;
}

export interface TemplateSet {
  source: Handlebars.TemplateDelegate<SourceTemplateContext>;
  project: Handlebars.TemplateDelegate<ProjectTemplateContext>;
  solution: Handlebars.TemplateDelegate<SolutionTemplateContext>;
  script: Handlebars.TemplateDelegate<ScriptTemplateContext>;
}

export const TEMPLATE_FILES = {
  source: "source.cs.hbs",
  project: "project.csproj.hbs",
  solution: "solution.sln.hbs",
  script: "ida.py.hbs",
} as const;

/**
 * Detect a template file in a directory
 * Returns null (use built-in default) when absent
 */
async function detectTemplate(
  directory: string | null,
  filename: string,
): Promise<string | null> {
  if (directory === null) return null;
  const templatePath = path.join(directory, filename);
  return (await fileExists(templatePath)) ? templatePath : null;
}

/**
 * Load every template, preferring files from `directory`
 */
export async function loadTemplates(
  directory: string | null = null,
): Promise<TemplateSet> {
  return {
    source: await loadTemplate<SourceTemplateContext>(
      await detectTemplate(directory, TEMPLATE_FILES.source),
      DEFAULT_SOURCE_TEMPLATE,
    ),
    project: await loadTemplate<ProjectTemplateContext>(
      await detectTemplate(directory, TEMPLATE_FILES.project),
      DEFAULT_PROJECT_TEMPLATE,
    ),
    solution: await loadTemplate<SolutionTemplateContext>(
      await detectTemplate(directory, TEMPLATE_FILES.solution),
      DEFAULT_SOLUTION_TEMPLATE,
    ),
    script: await loadTemplate<ScriptTemplateContext>(
      await detectTemplate(directory, TEMPLATE_FILES.script),
      DEFAULT_SCRIPT_TEMPLATE,
    ),
  };
}
