/**
 * sqlshift - library entry
 */

export * from "./pipeline";
export {
  DIALECTS,
  findDialect,
  isSupportedDialect,
  resolveDialectPair,
  SqlParserEngine,
} from "./dialects";
export type { DialectEngine, DialectInfo, TranslateOptions } from "./dialects";
export {
  OutputCollisionError,
  UnsupportedFormatError,
  UnsupportedDialectError,
  WriteError,
  UsageError,
} from "./errors";
export type {
  ConversionResult,
  DialectPair,
  ExtractionResult,
  ExtractionWarning,
  HostFormat,
  PipelineStage,
  StatementUnit,
  TableMapping,
  TranspileOutcome,
  TranspiledStatement,
} from "./types";
export { Logger } from "./utils";
