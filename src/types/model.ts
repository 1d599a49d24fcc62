/**
 * Type model definitions
 *
 * A model export describes one or more images, each holding the assemblies
 * and type definitions reconstructed from an IL2CPP binary + metadata pair.
 */

import { z } from "zod";

// ============================================================================
// Export Schemas
// ============================================================================

export const ParameterSchema = z.object({
  name: z.string(),
  type: z.string(),
});

export const FieldSchema = z.object({
  name: z.string(),
  type: z.string(),
  visibility: z.string().default("private"),
  isStatic: z.boolean().default(false),
  offset: z.number().int().nonnegative().optional(),
});

export const MethodSchema = z.object({
  name: z.string(),
  returnType: z.string(),
  visibility: z.string().default("public"),
  isStatic: z.boolean().default(false),
  parameters: z.array(ParameterSchema).default([]),
  // Virtual address of the compiled method body (method pointer)
  address: z.number().int().nonnegative().optional(),
});

export const TypeDefinitionSchema = z.object({
  index: z.number().int().nonnegative(),
  name: z.string(),
  namespace: z.string().default(""),
  kind: z.enum(["class", "struct", "interface", "enum"]).default("class"),
  visibility: z.string().default("public"),
  baseType: z.string().optional(),
  compilerGenerated: z.boolean().default(false),
  fields: z.array(FieldSchema).default([]),
  methods: z.array(MethodSchema).default([]),
});

export const AssemblyDefinitionSchema = z.object({
  name: z.string(),
  attributes: z.array(z.string()).default([]),
  types: z.array(TypeDefinitionSchema).default([]),
});

export const ImageExportSchema = z.object({
  name: z.string(),
  assemblies: z.array(AssemblyDefinitionSchema),
});

export const ModelExportSchema = z.object({
  images: z.array(ImageExportSchema),
});

export type ParameterDefinition = z.infer<typeof ParameterSchema>;
export type FieldDefinition = z.infer<typeof FieldSchema>;
export type MethodDefinition = z.infer<typeof MethodSchema>;
export type TypeDefinition = z.infer<typeof TypeDefinitionSchema>;
export type TypeKind = TypeDefinition["kind"];
export type AssemblyDefinition = z.infer<typeof AssemblyDefinitionSchema>;
export type ModelExport = z.infer<typeof ModelExportSchema>;

// ============================================================================
// Runtime Model
// ============================================================================

/**
 * One analyzed module discovered in a binary + metadata pair
 */
export interface Image {
  name: string;
  binaryPath: string;
  assemblies: AssemblyDefinition[];
}

/**
 * Type definition with the assembly it was declared in
 */
export interface TypeEntry extends TypeDefinition {
  assembly: string;
}

/**
 * Per-image reconstruction handed to the writers
 * `types` keeps discovery order across all assemblies
 */
export interface TypeModel {
  image: Image;
  assemblies: AssemblyDefinition[];
  types: TypeEntry[];
}
