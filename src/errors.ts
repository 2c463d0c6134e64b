/**
 * Error types raised by the conversion pipeline
 * Statement-level failures are never raised; see TranspileOutcome
 */

export class UnsupportedFormatError extends Error {
  readonly format: string;

  constructor(format: string) {
    super(
      `Unsupported file type "${format}". Only .py and .sql files are supported.`,
    );
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

export class WriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${path}: ${reason}`, { cause });
    this.name = "WriteError";
    this.path = path;
  }
}

export class OutputCollisionError extends Error {
  readonly outputPath: string;

  constructor(outputPath: string, claimedBy: string) {
    super(`Output ${outputPath} is already produced by ${claimedBy}`);
    this.name = "OutputCollisionError";
    this.outputPath = outputPath;
  }
}

export class UnsupportedDialectError extends Error {
  readonly dialect: string;

  constructor(role: "source" | "target", dialect: string) {
    super(`Unsupported ${role} dialect: ${dialect}`);
    this.name = "UnsupportedDialectError";
    this.dialect = dialect;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
