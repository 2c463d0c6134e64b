/**
 * Pipeline data types
 */

// ============================================================================
// Host formats
// ============================================================================

export const HOST_FORMATS = ["host-code", "plain-sql"] as const;

/**
 * Where statements live in a unit:
 * - host-code: triple-quoted arguments of a call such as spark.sql(...)
 * - plain-sql: a ;-delimited SQL script
 */
export type HostFormat = (typeof HOST_FORMATS)[number];

export const FORMAT_BY_EXTENSION: Readonly<Record<string, HostFormat>> = {
  ".py": "host-code",
  ".sql": "plain-sql",
};

// ============================================================================
// Statements
// ============================================================================

export interface SourceSpan {
  start: number; // Character offset of the first character
  end: number; // Character offset after the last character
}

export interface StatementUnit {
  readonly text: string;
  readonly origin?: SourceSpan;
}

export interface ExtractionWarning {
  offset: number;
  message: string;
}

export interface ExtractionResult {
  statements: StatementUnit[];
  warnings: ExtractionWarning[];
}

// ============================================================================
// Transpilation
// ============================================================================

export interface DialectPair {
  source: string;
  target: string;
}

export type TranspileOutcome =
  | { ok: true; sql: string }
  | { ok: false; error: string; original: string };

export interface TranspiledStatement {
  original: StatementUnit; // After filtering and renaming
  outcome: TranspileOutcome;
  output: string; // Rewritten SQL, or the error placeholder
}

// ============================================================================
// Results
// ============================================================================

export type PipelineStage =
  | "read"
  | "extracted"
  | "filtered"
  | "renamed"
  | "transpiled"
  | "written";

export interface ConversionResult {
  readonly unit: string;
  readonly format: HostFormat;
  readonly outputPath: string;
  readonly extracted: number; // Statements found before filtering
  readonly statements: readonly TranspiledStatement[];
  readonly warnings: readonly ExtractionWarning[];
}
