/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import { ZodError } from "zod";
import { YAMLError } from "yaml";
import {
  OutputCollisionError,
  UnsupportedFormatError,
  WriteError,
} from "../errors";
import type { ConversionResult } from "../types/pipeline";

// ============================================================================
// Types
// ============================================================================

export type FileIssueReason =
  | "unsupported-format"
  | "read-error"
  | "write-error"
  | "output-collision"
  | "process-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "invalid-yaml"
  | "schema-validation"
  | "read-error";

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface StatementIssue {
  type: "statement";
  path: string;
  reason: "transpile-error";
  statement: string;
  details: string;
}

export interface ExtractionIssue {
  type: "extraction";
  path: string;
  reason: "unisolated-call";
  offset: number;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | StatementIssue | ExtractionIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;

  // Statement counts
  extractedStatements: number;
  excludedStatements: number;
  transpiledStatements: number;
  failedStatements: number;

  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof YAMLError) {
    return { reason: "invalid-yaml", details: error.message };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

function mapFileError(error: unknown): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof UnsupportedFormatError) {
    return { reason: "unsupported-format", details };
  }
  if (error instanceof WriteError) {
    return { reason: "write-error", details };
  }
  if (error instanceof OutputCollisionError) {
    return { reason: "output-collision", details };
  }
  // Anything else carrying an errno code came from reading the source
  if (error instanceof Error && "code" in error) {
    return { reason: "read-error", details };
  }

  return { reason: "process-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private extractedStatements = 0;
  private excludedStatements = 0;
  private transpiledStatements = 0;
  private failedStatements = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  /**
   * Fold a unit's statement counts, failures and warnings into the totals
   */
  recordResult(result: ConversionResult): void {
    this.extractedStatements += result.extracted;
    this.excludedStatements += result.extracted - result.statements.length;

    for (const { original, outcome } of result.statements) {
      if (outcome.ok) {
        this.transpiledStatements++;
        continue;
      }
      this.failedStatements++;
      this.issues.push({
        type: "statement",
        path: result.unit,
        reason: "transpile-error",
        statement: original.text,
        details: outcome.error,
      });
    }

    for (const warning of result.warnings) {
      this.issues.push({
        type: "extraction",
        path: result.unit,
        reason: "unisolated-call",
        offset: warning.offset,
        details: warning.message,
      });
    }
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(path: string, error: unknown, type: "file" | "resource"): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
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

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      extractedStatements: this.extractedStatements,
      excludedStatements: this.excludedStatements,
      transpiledStatements: this.transpiledStatements,
      failedStatements: this.failedStatements,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<string> {
    const { issues, ...summary } = this.getStats();

    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      file: {},
      statement: {},
      extraction: {},
      resource: {},
    };
    for (const issue of issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    const outputPath = join(outputDir, "stats.json");
    await mkdir(outputDir, { recursive: true });
    await writeFile(
      outputPath,
      JSON.stringify({ summary, issues: grouped }, null, 2),
      "utf-8",
    );
    return outputPath;
  }
}
