/**
 * C# declaration rendering
 * Produces the text of one type declaration from its definition
 */

import type {
  FieldDefinition,
  MethodDefinition,
  SourceWriterSettings,
  TypeEntry,
} from "../types";

const INDENT = "\t";

function hexAddress(value: number, width = 0): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, "0")}`;
}

function modifiers(visibility: string, isStatic: boolean): string {
  return isStatic ? `${visibility} static` : visibility;
}

function renderField(
  field: FieldDefinition,
  settings: SourceWriterSettings,
): string {
  const declaration = `${modifiers(field.visibility, field.isStatic)} ${field.type} ${field.name};`;
  if (settings.suppressMetadata || field.offset === undefined) {
    return declaration;
  }
  return `${declaration} // ${hexAddress(field.offset)}`;
}

function renderMethodBody(
  method: MethodDefinition,
  type: TypeEntry,
  settings: SourceWriterSettings,
): string {
  if (!settings.mustCompile || type.kind === "interface") {
    return ";";
  }
  return method.returnType === "void" ? " {}" : " => default;";
}

function renderMethod(
  method: MethodDefinition,
  type: TypeEntry,
  settings: SourceWriterSettings,
): string {
  const parameters = method.parameters
    .map((p) => `${p.type} ${p.name}`)
    .join(", ");
  const declaration =
    `${modifiers(method.visibility, method.isStatic)} ${method.returnType} ` +
    `${method.name}(${parameters})${renderMethodBody(method, type, settings)}`;

  if (settings.suppressMetadata || method.address === undefined) {
    return declaration;
  }
  return `${declaration} // ${hexAddress(method.address, 8)}`;
}

/**
 * Render a full type declaration (no trailing newline)
 *
 * @example
 * // Namespace: Game
 * public class Player : MonoBehaviour // TypeDefIndex: 42
 * {
 * 	// Fields
 * 	private int health; // 0x18
 * }
 */
export function renderDeclaration(
  type: TypeEntry,
  settings: SourceWriterSettings,
): string {
  const base = type.baseType ? ` : ${type.baseType}` : "";
  const index = settings.suppressMetadata
    ? ""
    : ` // TypeDefIndex: ${type.index}`;

  const lines = [
    `// Namespace: ${type.namespace}`,
    `${type.visibility} ${type.kind} ${type.name}${base}${index}`,
    "{",
  ];

  if (type.fields.length > 0) {
    lines.push(`${INDENT}// Fields`);
    for (const field of type.fields) {
      lines.push(INDENT + renderField(field, settings));
    }
  }

  if (type.methods.length > 0) {
    if (type.fields.length > 0) lines.push("");
    lines.push(`${INDENT}// Methods`);
    for (const method of type.methods) {
      lines.push(INDENT + renderMethod(method, type, settings));
    }
  }

  lines.push("}");
  return lines.join("\n");
}
