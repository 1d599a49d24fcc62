/**
 * Default renderers
 */

export { renderDeclaration } from "./declarations";
export {
  CSharpWriter,
  createCSharpWriterFactory,
  sanitizeFileName,
  assemblyBaseName,
  projectGuid,
  compareTypes,
} from "./csharp-writer";
export { IdaScriptRenderer, escapePythonString, qualifiedMethodName } from "./ida-script";
