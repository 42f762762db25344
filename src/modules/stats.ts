/**
 * Stats Module
 * Displays migration statistics and issues
 */

import chalk from "chalk";
import type {
  Tracker,
  ProcessingStats,
  MigrationContext,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

// 850ms, 12.40s, 3m 05s
function formatElapsed(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = String(totalSeconds % 60).padStart(2, "0");
  return `${minutes}m ${seconds}s`;
}

/**
 * Uploaded share of the batch, e.g. `━━━━━━━━━━━━━━━━━━━━━━ 92% (46/50)`
 */
function uploadBar(uploaded: number, total: number, width = 24): string {
  if (total === 0) return chalk.dim("no records");

  const share = Math.min(uploaded / total, 1);
  const done = Math.round(width * share);
  const bar =
    chalk.green("━".repeat(done)) + chalk.dim("━".repeat(width - done));
  return `${bar} ${chalk.dim(`${Math.round(share * 100)}% (${uploaded}/${total})`)}`;
}

function countLine(
  marker: string,
  label: string,
  count: number,
  paint: (text: string) => string,
): string {
  return `   ${marker} ${chalk.dim(label.padEnd(18))} ${paint(String(count))}`;
}

function heading(title: string): string {
  return `\n  ${chalk.bold(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export async function stats(ctx: MigrationContext): Promise<void> {
  const { tracker, verbose, reportPath } = ctx;
  const stats = tracker.getStats();
  const failed = stats.fetchFailures + stats.uploadFailures;

  console.log("");

  // Partial success is a normal outcome, so failures only warn
  const statusIcon =
    stats.totalRecords > 0 && failed === stats.totalRecords
      ? chalk.red("✖")
      : failed > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Migration Complete")} ${chalk.dim("·")} ${chalk.dim(formatElapsed(stats.duration))}`,
  );

  displayRecordsSection(stats);
  displayIssuesSection(tracker, verbose);

  if (reportPath) {
    console.log(heading("Report"));
    console.log(`   ${chalk.dim(reportPath)}`);
  }

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayRecordsSection(stats: ProcessingStats): void {
  console.log(heading("Records"));

  const bar = uploadBar(stats.uploadedRecords, stats.totalRecords);
  console.log(`   ${bar}`);

  console.log(
    countLine(chalk.green("◉"), "Uploaded", stats.uploadedRecords, chalk.green),
  );

  if (stats.fetchFailures > 0) {
    console.log(
      countLine(chalk.red("◉"), "Fetch failed", stats.fetchFailures, chalk.red),
    );
  }

  if (stats.uploadFailures > 0) {
    console.log(
      countLine(chalk.red("◉"), "Upload failed", stats.uploadFailures, chalk.red),
    );
  }

  console.log(
    countLine(chalk.cyan("◉"), "Upload attempts", stats.uploadAttempts, chalk.cyan),
  );
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const fetchIssues = tracker.getIssuesOfType("fetch");
  const uploadIssues = tracker.getIssuesOfType("upload");
  const resourceIssues = tracker.getIssuesOfType("resource");

  if (
    fetchIssues.length === 0 &&
    uploadIssues.length === 0 &&
    resourceIssues.length === 0
  ) {
    return;
  }

  console.log(heading(chalk.red("Errors")));

  const groups = [
    { label: "Fetch failures", issues: fetchIssues },
    { label: "Upload failures", issues: uploadIssues },
    { label: "Resources failed", issues: resourceIssues },
  ];

  for (const { label, issues } of groups) {
    if (issues.length === 0) continue;
    console.log(countLine(chalk.yellow("✖"), label, issues.length, chalk.yellow));
    if (!verbose) continue;

    for (const issue of issues.slice(0, 5)) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (issues.length > 5) {
      console.log(`      ${chalk.dim(`  +${issues.length - 5} more`)}`);
    }
  }
}
