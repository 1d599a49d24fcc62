/**
 * Run Tracker
 * Unified tracking for timings, written artifacts and issues
 */

import { ZodError } from "zod";
import {
  AnalysisFailureError,
  InputNotFoundError,
  MissingToolchainError,
  UnsupportedCombinationError,
  UnsupportedWildcardPathError,
} from "../types/errors";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type InputIssueReason = "not-found" | "unsupported-path" | "read-error";
export type AnalysisIssueReason = "no-images";
export type DispatchIssueReason =
  | "unsupported-combination"
  | "missing-toolchain";
export type RenderIssueReason = "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface InputIssue {
  type: "input";
  path: string;
  reason: InputIssueReason;
  details: string;
}

export interface AnalysisIssue {
  type: "analysis";
  path: string;
  reason: AnalysisIssueReason;
  details: string;
}

export interface DispatchIssue {
  type: "dispatch";
  path: string;
  reason: DispatchIssueReason;
  details: string;
}

export interface RenderIssue {
  type: "render";
  path: string;
  reason: RenderIssueReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue =
  | InputIssue
  | AnalysisIssue
  | DispatchIssue
  | RenderIssue
  | ResourceIssue;
export type IssueType = Issue["type"];

export interface TimingRecord {
  label: string;
  // Undefined for run-level steps such as analysis
  image?: number;
  duration: number;
}

export interface ImageRecord {
  index: number;
  name: string;
  sourcePath: string;
  scriptPath: string;
  artifacts: string[];
  completed: boolean;
}

export interface RunStats {
  totalImages: number;
  completedImages: number;
  totalArtifacts: number;
  images: ImageRecord[];
  timings: TimingRecord[];
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function details(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): ResourceIssue["reason"] {
  if (error instanceof ZodError) return "schema-validation";
  if (error instanceof SyntaxError) return "invalid-json";
  return "read-error";
}

function schemaDetails(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((e) => `${e.path.join(".") || "<root>"}: ${e.message}`)
      .join("; ");
  }
  return details(error);
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalImages = 0;
  private images: ImageRecord[] = [];
  private timings: TimingRecord[] = [];
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Images and artifacts
  // ============================================================================

  setTotalImages(count: number): void {
    this.totalImages = count;
  }

  startImage(
    index: number,
    name: string,
    sourcePath: string,
    scriptPath: string,
  ): void {
    this.images.push({
      index,
      name,
      sourcePath,
      scriptPath,
      artifacts: [],
      completed: false,
    });
  }

  trackArtifacts(index: number, paths: string[]): void {
    const record = this.images.find((i) => i.index === index);
    if (!record) {
      throw new Error(`Image ${index} was not started`);
    }
    record.artifacts.push(...paths);
  }

  completeImage(index: number): void {
    const record = this.images.find((i) => i.index === index);
    if (record) {
      record.completed = true;
    }
  }

  trackTiming(label: string, duration: number, image?: number): void {
    this.timings.push({ label, duration, image });
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Record a pipeline failure as an issue, classified by error type
   * Errors of no known type count against the stage they were thrown in
   */
  trackError(
    path: string,
    error: unknown,
    stage: "input" | "render" = "render",
  ): void {
    if (error instanceof InputNotFoundError) {
      this.issues.push({
        type: "input",
        path: error.path,
        reason: "not-found",
        details: error.message,
      });
      return;
    }

    if (error instanceof UnsupportedWildcardPathError) {
      this.issues.push({
        type: "input",
        path: error.path,
        reason: "unsupported-path",
        details: error.message,
      });
      return;
    }

    if (error instanceof AnalysisFailureError) {
      this.issues.push({
        type: "analysis",
        path: error.path,
        reason: "no-images",
        details: error.message,
      });
      return;
    }

    if (error instanceof UnsupportedCombinationError) {
      this.issues.push({
        type: "dispatch",
        path,
        reason: "unsupported-combination",
        details: error.message,
      });
      return;
    }

    if (error instanceof MissingToolchainError) {
      this.issues.push({
        type: "dispatch",
        path,
        reason: "missing-toolchain",
        details: error.message,
      });
      return;
    }

    if (stage === "input") {
      this.issues.push({
        type: "input",
        path,
        reason: "read-error",
        details: details(error),
      });
      return;
    }

    this.issues.push({
      type: "render",
      path,
      reason: "write-error",
      details: details(error),
    });
  }

  trackResourceError(path: string, error: unknown): void {
    this.issues.push({
      type: "resource",
      path,
      reason: mapResourceError(error),
      details: schemaDetails(error),
    });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  hasErrors(): boolean {
    return this.issues.some((i) => i.type !== "resource");
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalImages: this.totalImages,
      completedImages: this.images.filter((i) => i.completed).length,
      totalArtifacts: this.images.reduce(
        (sum, i) => sum + i.artifacts.length,
        0,
      ),
      images: this.images,
      timings: this.timings,
      issues: this.issues,
      duration,
    };
  }
}
