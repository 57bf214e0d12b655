/**
 * Stats Module
 * Displays build statistics and issues
 */

import chalk from "chalk";
import type { BuildContext, BuildStats, Issue, Tracker } from "../types";

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

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display build statistics to console
 */
export async function stats(ctx: BuildContext): Promise<void> {
  const { tracker, verbose } = ctx;
  const stats = tracker.getStats();
  const failed = tracker.getIssues("file").length;
  const warnings = stats.issues.length - failed;

  const statusIcon =
    failed > 0
      ? chalk.red("✖")
      : warnings > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Site Built")} ${chalk.dim("·")} ${chalk.dim(`${stats.writtenPages} pages in ${formatDuration(stats.duration)}`)}`,
  );

  displayPagesSection(stats);
  displayLinksSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPagesSection(stats: BuildStats): void {
  console.log(sectionHeader("Pages"));
  // Share of converted sources that found a place in the site
  console.log(`   ${progressBar(stats.pages, stats.sources)}`);

  console.log(
    statRow(chalk.cyan("◉"), "Repositories", stats.repositories, chalk.cyan),
  );
  console.log(statRow(chalk.white("◉"), "Sources", stats.sources));
  console.log(statRow(chalk.green("◉"), "Pages", stats.pages, chalk.green));
  console.log(
    statRow(chalk.green("◉"), "Written", stats.writtenPages, chalk.green),
  );
  console.log(statRow(chalk.cyan("◉"), "Sections", stats.sections, chalk.cyan));

  if (stats.unmatchedPages > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Unmatched", stats.unmatchedPages, chalk.yellow),
    );
  }
}

function displayLinksSection(stats: BuildStats): void {
  if (stats.links === 0) {
    return;
  }

  console.log(sectionHeader("Links"));
  console.log(statRow(chalk.green("◉"), "Created", stats.links, chalk.green));
}

interface IssueGroup {
  type: Issue["type"];
  label: string;
  color: (s: string) => string;
  limit?: number; // Verbose listing is cut after this many entries
}

// Display order; errors before warnings
const ISSUE_GROUPS: IssueGroup[] = [
  { type: "file", label: "Sources failed", color: chalk.red },
  { type: "target", label: "No target", color: chalk.yellow, limit: 5 },
  { type: "repository", label: "Repos missing", color: chalk.yellow },
  { type: "resource", label: "Configs failed", color: chalk.yellow },
];

function describeIssue(issue: Issue): { subject: string; details?: string } {
  switch (issue.type) {
    case "file":
    case "resource":
      return { subject: issue.path, details: issue.details };
    case "target":
      return { subject: issue.path, details: issue.targets.join(", ") };
    case "repository":
      return { subject: issue.repository };
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  if (tracker.getIssues().length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  for (const group of ISSUE_GROUPS) {
    const issues = tracker.getIssues(group.type);
    if (issues.length === 0) continue;

    console.log(statRow(group.color("✖"), group.label, issues.length, group.color));
    if (!verbose) continue;

    const shown = group.limit === undefined ? issues : issues.slice(0, group.limit);
    for (const issue of shown) {
      const { subject, details } = describeIssue(issue);
      console.log(`      ${chalk.dim("·")} ${subject}`);
      if (details) {
        console.log(`        ${chalk.dim(details)}`);
      }
    }
    if (shown.length < issues.length) {
      console.log(`      ${chalk.dim(`  +${issues.length - shown.length} more`)}`);
    }
  }
}
