/**
 * Central type exports
 */

// Configuration
export type {
  DumpConfig,
  PartialDumpConfig,
  InputConfig,
  OutputConfig,
  SolutionConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { DumpConfigSchema, PartialDumpConfigSchema } from "./config";

// Options
export type { DumpOptions, ToolchainPaths } from "./options";

// Model
export type {
  Image,
  TypeEntry,
  TypeModel,
  TypeKind,
  TypeDefinition,
  AssemblyDefinition,
  FieldDefinition,
  MethodDefinition,
  ParameterDefinition,
  ModelExport,
} from "./model";
export { ModelExportSchema } from "./model";

// Collaborators
export type {
  AnalysisCollaborator,
  ModelBuilder,
  SortKey,
  SortKeySelector,
  SourceWriter,
  SourceWriterSettings,
  SourceWriterFactory,
  ScriptRenderer,
  DirectoryProbe,
  PathProbe,
  Collaborators,
} from "./collaborators";

// Context
export type {
  DumpContext,
  Issue,
  IssueType,
  InputIssue,
  AnalysisIssue,
  DispatchIssue,
  RenderIssue,
  ResourceIssue,
  TimingRecord,
  ImageRecord,
  RunStats,
} from "./context";

// Errors
export {
  DumpError,
  InputNotFoundError,
  AnalysisFailureError,
  UnsupportedCombinationError,
  MissingToolchainError,
  UnsupportedWildcardPathError,
} from "./errors";

// Tracker
export { Tracker } from "../utils/tracker";
