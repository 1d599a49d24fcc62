/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  binary: z.string(),
  metadata: z.string(),
});

export const OutputConfigSchema = z.object({
  source: z.string(),
  script: z.string(),
});

export const SolutionConfigSchema = z.object({
  enabled: z.boolean(),
  // Wildcards select the last matching folder in ordinal order
  unityPath: z.string(),
  unityAssemblies: z.string(),
  // Files that must exist inside the resolved folders, relative to them
  unityMarker: z.string(),
  assembliesMarker: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const DumpConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  excludedNamespaces: z.array(z.string()),
  // Layout and sort stay plain strings: the dispatcher decides which pairs are supported
  layout: z.string(),
  sort: z.string(),
  flatten: z.boolean(),
  suppressMetadata: z.boolean(),
  mustCompile: z.boolean(),
  separateAttributes: z.boolean(),
  solution: SolutionConfigSchema,
  templates: z.string().nullable(),
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialDumpConfigSchema = DumpConfigSchema.partial().extend({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  solution: SolutionConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type SolutionConfig = z.infer<typeof SolutionConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type DumpConfig = z.infer<typeof DumpConfigSchema>;
export type PartialDumpConfig = z.infer<typeof PartialDumpConfigSchema>;

/**
 * Error raised while loading a user or custom config file
 */
export interface ConfigError {
  path: string;
  error: unknown;
}
