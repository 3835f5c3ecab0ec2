/**
 * Stats Module
 * Prints the build summary and issues
 */

import chalk from "chalk";
import type { BuildStats, Issue } from "../utils/tracker";

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

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

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

/**
 * One-line description of an issue for the verbose listing
 */
export function describeIssue(issue: Issue): string {
  switch (issue.type) {
    case "plugin":
      return `${issue.plugin} (${issue.stage}): ${issue.details}`;
    case "file":
    case "resource":
    case "asset":
      return issue.details
        ? `${issue.path} [${issue.reason}]: ${issue.details}`
        : `${issue.path} [${issue.reason}]`;
  }
}

// ============================================================================
// Main Stats Display
// ============================================================================

export interface StatsOptions {
  title?: string;
  verbose?: boolean;
  out?: (line: string) => void;
}

/**
 * Print build statistics to the console
 */
export function stats(buildStats: BuildStats, options: StatsOptions = {}): void {
  const { title = "Build Complete", verbose = false, out = console.log } = options;
  const hasErrors = buildStats.issues.length > 0;
  const hasWarnings = buildStats.skippedDrafts + buildStats.skippedFuture > 0;

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  out("");
  out(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(buildStats.duration))}`,
  );

  displayContentSection(buildStats, out);
  displayOutputSection(buildStats, out);
  displayIssuesSection(buildStats.issues, verbose, out);

  out("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayContentSection(s: BuildStats, out: (line: string) => void): void {
  out(sectionHeader("Content"));
  out(`   ${progressBar(s.posts + s.pages, s.discoveredFiles)}`);

  out(statRow(chalk.green("◉"), "Posts", s.posts, chalk.green));
  out(statRow(chalk.green("◉"), "Pages", s.pages, chalk.green));

  if (s.skippedDrafts > 0) {
    out(statRow(chalk.yellow("◉"), "Drafts skipped", s.skippedDrafts, chalk.yellow));
  }
  if (s.skippedFuture > 0) {
    out(statRow(chalk.yellow("◉"), "Future skipped", s.skippedFuture, chalk.yellow));
  }
  if (s.failedFiles > 0) {
    out(statRow(chalk.red("◉"), "Failed", s.failedFiles, chalk.red));
  }
}

function displayOutputSection(s: BuildStats, out: (line: string) => void): void {
  out(sectionHeader("Output"));
  out(`   ${progressBar(s.renderedItems, s.renderedItems + s.failedRenders)}`);

  out(statRow(chalk.green("◉"), "Rendered", s.renderedItems, chalk.green));
  if (s.failedRenders > 0) {
    out(statRow(chalk.red("◉"), "Render failed", s.failedRenders, chalk.red));
  }
  if (s.listPages > 0) {
    out(statRow(chalk.cyan("◉"), "List pages", s.listPages, chalk.cyan));
  }
  if (s.compiledStylesheets > 0) {
    out(statRow(chalk.cyan("◉"), "Stylesheets", s.compiledStylesheets, chalk.cyan));
  }
  if (s.copiedFiles > 0) {
    out(statRow(chalk.cyan("◉"), "Static files", s.copiedFiles, chalk.cyan));
  }
}

function displayIssuesSection(
  issues: Issue[],
  verbose: boolean,
  out: (line: string) => void,
): void {
  if (issues.length === 0) return;

  out(sectionHeader(chalk.red("Errors")));

  const labels: Record<Issue["type"], string> = {
    file: "Files failed",
    resource: "Config issues",
    asset: "Assets failed",
    plugin: "Plugin errors",
  };

  for (const type of ["file", "resource", "asset", "plugin"] as const) {
    const group = issues.filter((issue) => issue.type === type);
    if (group.length === 0) continue;

    out(statRow(chalk.red("✖"), labels[type], group.length, chalk.red));
    if (verbose) {
      for (const issue of group) {
        out(`      ${chalk.dim("·")} ${describeIssue(issue)}`);
      }
    }
  }
}
