/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  DialectsConfig,
  TableMapping,
  ExtractionConfig,
  FilterConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
  TableMappingSchema,
} from "./config";

// Files
export type { SourceUnit } from "./files";

// Pipeline
export type {
  HostFormat,
  SourceSpan,
  StatementUnit,
  ExtractionWarning,
  ExtractionResult,
  DialectPair,
  TranspileOutcome,
  TranspiledStatement,
  PipelineStage,
  ConversionResult,
} from "./pipeline";
export { HOST_FORMATS, FORMAT_BY_EXTENSION } from "./pipeline";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  FileIssue,
  StatementIssue,
  ExtractionIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
