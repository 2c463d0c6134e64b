/**
 * Stats Module
 * Displays processing statistics and issues, exports stats.json
 */

import chalk from "chalk";
import type { ConversionContext, ProcessingStats, Tracker } from "../types";

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
 * Bar of converted over total, with percentage
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
 * Stat row with icon, padded label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Bold section title
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display processing statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { config, tracker, verbose, dialects } = ctx;
  const statsPath = await tracker.exportStats(config.output.directory);

  const stats = tracker.getStats();
  const hasWarnings =
    stats.failedStatements > 0 || tracker.getIssues("extraction").length > 0;
  const hasErrors = stats.failedFiles > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(`${dialects.source} → ${dialects.target}`)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayStatementsSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log(`\n   ${chalk.dim(`Stats written to ${statsPath}`)}`);
  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));

  console.log(`   ${progressBar(stats.successfulFiles, stats.totalFiles)}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.successfulFiles, chalk.green),
  );

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }
}

function displayStatementsSection(stats: ProcessingStats): void {
  if (stats.extractedStatements === 0) {
    return;
  }

  console.log(sectionHeader("Statements"));

  const attempted = stats.transpiledStatements + stats.failedStatements;
  console.log(`   ${progressBar(stats.transpiledStatements, attempted)}`);

  console.log(
    statRow(chalk.white("◉"), "Extracted", stats.extractedStatements),
  );

  if (stats.excludedStatements > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Excluded", stats.excludedStatements, chalk.cyan),
    );
  }

  console.log(
    statRow(
      chalk.green("◉"),
      "Transpiled",
      stats.transpiledStatements,
      chalk.green,
    ),
  );

  if (stats.failedStatements > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Failed",
        stats.failedStatements,
        chalk.yellow,
      ),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const fileIssues = tracker.getIssues("file");
  const statementIssues = tracker.getIssues("statement");
  const extractionIssues = tracker.getIssues("extraction");
  const resourceIssues = tracker.getIssues("resource");

  const hasIssues =
    fileIssues.length > 0 ||
    statementIssues.length > 0 ||
    extractionIssues.length > 0 ||
    resourceIssues.length > 0;

  if (!hasIssues) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (statementIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Statements failed",
        statementIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of statementIssues.slice(0, 5)) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        console.log(`        ${chalk.dim(issue.details)}`);
      }
      if (statementIssues.length > 5) {
        console.log(
          `      ${chalk.dim(`  +${statementIssues.length - 5} more`)}`,
        );
      }
    }
  }

  if (extractionIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Calls skipped",
        extractionIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of extractionIssues) {
        console.log(
          `      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`@${issue.offset}`)}`,
        );
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }
}
