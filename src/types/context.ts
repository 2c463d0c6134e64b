/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { SourceUnit } from "./files";
import type { ConversionResult, DialectPair } from "./pipeline";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { DialectEngine } from "../dialects/engine";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  StatementIssue,
  ExtractionIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  dialects: DialectPair; // Canonical dialect names, validated before the run

  tracker: Tracker;
  logger: Logger;
  engine: DialectEngine;
  verbose?: boolean;

  units?: SourceUnit[]; // Scanner fills
  results?: ConversionResult[]; // Processor fills (successful units only)
}
