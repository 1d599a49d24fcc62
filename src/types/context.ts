/**
 * Dump context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { Collaborators } from "./collaborators";
import type { Image } from "./model";
import type { DumpOptions, ToolchainPaths } from "./options";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  InputIssue,
  AnalysisIssue,
  DispatchIssue,
  RenderIssue,
  ResourceIssue,
  InputIssueReason,
  AnalysisIssueReason,
  DispatchIssueReason,
  RenderIssueReason,
  ResourceIssueReason,
  TimingRecord,
  ImageRecord,
  RunStats,
} from "../utils/tracker";

export interface DumpContext {
  // Input - provided at initialization
  options: DumpOptions;
  collaborators: Collaborators;

  // Unified tracking for timings, artifacts and errors
  tracker: Tracker;
  logger: Logger;

  // Stage updates for the CLI spinner
  onProgress?: (text: string) => void;

  toolchain?: ToolchainPaths; // Resolved by the validator in solution mode
  images?: Image[]; // Discovered by the analyzer, in discovery order
}
