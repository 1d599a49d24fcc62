/**
 * Stats Module
 * Displays run statistics, per-image timings and issues
 */

import chalk from "chalk";
import { formatDuration } from "../utils";
import type { DumpContext, Issue, RunStats, TimingRecord } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

/**
 * Stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(22))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

const ISSUE_LABELS: Record<Issue["type"], string> = {
  input: "Missing inputs",
  analysis: "Analysis failed",
  dispatch: "Layout rejected",
  render: "Write failed",
  resource: "Config skipped",
};
const ISSUE_ORDER: Issue["type"][] = ["input", "analysis", "dispatch", "render", "resource"];

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display run statistics to console
 */
export function stats(ctx: DumpContext, verbose = false): void {
  const stats = ctx.tracker.getStats();
  const hasErrors = ctx.tracker.hasErrors();
  const hasWarnings = stats.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = hasErrors ? "Dump Failed" : "Dump Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayImagesSection(stats);
  displayTimingsSection(stats);
  displayIssuesSection(stats.issues, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayImagesSection(stats: RunStats): void {
  if (stats.totalImages === 0) {
    return;
  }

  console.log(sectionHeader("Images"));
  console.log(`   ${progressBar(stats.completedImages, stats.totalImages)}`);

  for (const image of stats.images) {
    const icon = image.completed ? chalk.green("◉") : chalk.red("◉");
    const color = image.completed ? chalk.green : chalk.red;
    console.log(
      statRow(icon, image.name, `${image.artifacts.length} file(s)`, color),
    );
    console.log(`      ${chalk.dim("·")} ${image.sourcePath}`);
    console.log(`      ${chalk.dim("·")} ${image.scriptPath}`);
  }

  console.log(
    statRow(chalk.cyan("◉"), "Artifacts written", stats.totalArtifacts, chalk.cyan),
  );
}

function timingLabel(timing: TimingRecord): string {
  return timing.image === undefined
    ? timing.label
    : `[${timing.image}] ${timing.label}`;
}

function displayTimingsSection(stats: RunStats): void {
  if (stats.timings.length === 0) {
    return;
  }

  console.log(sectionHeader("Timings"));
  for (const timing of stats.timings) {
    console.log(
      statRow(chalk.dim("◷"), timingLabel(timing), formatDuration(timing.duration)),
    );
  }
}

function displayIssuesSection(issues: Issue[], verbose: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  for (const type of ISSUE_ORDER) {
    const matching = issues.filter((issue) => issue.type === type);
    if (matching.length === 0) continue;

    const color = type === "resource" ? chalk.yellow : chalk.red;
    console.log(statRow(color("✖"), ISSUE_LABELS[type], matching.length, color));
    for (const issue of matching) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose || type !== "resource") {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
