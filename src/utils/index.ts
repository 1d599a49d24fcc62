/**
 * Utility exports
 */

// Path utilities
export { findPath, globDirectoryProbe, compareOrdinal, createSegmentMatcher } from "./find-path";
export { planArtifactPath, DEFAULT_ARTIFACT_EXTENSIONS } from "./plan-artifact-path";

// Namespace utilities
export { isNamespaceExcluded, normalizeExcludedNamespaces } from "./namespaces";

// Filesystem utilities
export { fileExists, directoryExists, regularFileExists, fsPathProbe } from "./file-exists";

// Config utilities
export { loadConfig, getUserConfigPath, loadDefaultConfig, mergeConfig } from "./load-config";
export { createDumpOptions, effectiveOptions } from "./dump-options";

// Template utilities
export { loadTemplate, compileTemplate } from "./load-template";

// Timing utilities
export { measure, formatDuration } from "./measure";
export type { DurationReporter } from "./measure";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
