/**
 * Stats Module
 * Displays build statistics and issues
 */

import chalk from "chalk";
import type {
  Tracker,
  Issue,
  ProcessingStats,
  StylesheetStatus,
  BuildContext,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a progress bar with percentage
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

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

const STYLESHEET_LABELS: Record<
  StylesheetStatus,
  { text: string; color: (s: string) => string }
> = {
  unchecked: { text: "not checked", color: chalk.dim },
  copied: { text: "copied", color: chalk.green },
  present: { text: "present", color: chalk.green },
  missing: { text: "missing", color: chalk.yellow },
  failed: { text: "copy failed", color: chalk.red },
};

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display build statistics to console
 */
export async function stats(ctx: BuildContext): Promise<void> {
  const { config, tracker, logger, dryRun } = ctx;
  const verbose = ctx.verbose ?? false;

  if (config.output.stats && !dryRun) {
    try {
      await tracker.exportStats(ctx.output);
    } catch (error) {
      logger.warn(`Could not write stats.json to ${ctx.output}`);
      logger.debug(error instanceof Error ? error.message : String(error));
    }
  }

  const stats = tracker.getStats();
  const hasWarnings =
    stats.skippedFiles > 0 || tracker.getIssues("resource").length > 0;
  const hasErrors = stats.failedFiles > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  const title = dryRun ? "Dry Run Complete" : "Build Complete";
  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayOutputSection(stats, dryRun ?? false);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Posts"));

  const bar = progressBar(stats.successfulFiles, stats.totalFiles);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Rendered", stats.successfulFiles, chalk.green),
  );

  if (stats.skippedFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", stats.skippedFiles, chalk.yellow),
    );
  }

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }
}

function displayOutputSection(stats: ProcessingStats, dryRun: boolean): void {
  console.log(sectionHeader("Output"));

  if (stats.createdIndexes > 0) {
    const label = dryRun ? "would be written" : "written";
    console.log(statRow(chalk.cyan("◉"), "Index", label, chalk.cyan));
  }

  const { text, color } = STYLESHEET_LABELS[stats.stylesheet];
  console.log(statRow(color("◉"), "Stylesheet", text, color));
}

function printDetails(issues: Issue[], verbose: boolean, limit?: number): void {
  if (!verbose) return;

  const shown = limit === undefined ? issues : issues.slice(0, limit);
  for (const issue of shown) {
    console.log(`      ${chalk.dim("·")} ${issue.path}`);
    if (issue.details) {
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }
  if (issues.length > shown.length) {
    console.log(`      ${chalk.dim(`  +${issues.length - shown.length} more`)}`);
  }
}

function displayIssuesSection(tracker: Tracker, verbose: boolean): void {
  const fileIssues = tracker.getIssues("file");
  const skippedIssues = tracker.getIssues("skipped");
  const resourceIssues = tracker.getIssues("resource");

  const hasIssues =
    fileIssues.length > 0 ||
    skippedIssues.length > 0 ||
    resourceIssues.length > 0;

  if (!hasIssues) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    printDetails(fileIssues, verbose);
  }

  if (skippedIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "No front matter",
        skippedIssues.length,
        chalk.yellow,
      ),
    );
    printDetails(skippedIssues, verbose, 5);
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Resources",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    printDetails(resourceIssues, verbose);
  }
}
