export {
  extract,
  extractPlainSql,
  extractHostCode,
  DEFAULT_HOST_CALLEE,
} from "./extractor";
export type { ExtractOptions } from "./extractor";
export { filterStatements, isCreateTable } from "./filter";
export { renameTables } from "./renamer";
export {
  transpileStatements,
  errorPlaceholder,
  renderOutcome,
  ERROR_MARKER,
} from "./transpiler";
export {
  FilePipeline,
  processUnit,
  resolveHostFormat,
  outputFileName,
  renderArtifact,
  SEPARATOR,
} from "./file-pipeline";
export type { FilePipelineOptions, UnitInput } from "./file-pipeline";
