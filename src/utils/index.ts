/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists } from "./file-exists";
export { parseDataFile } from "./parse-data-file";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Table mapping utilities
export { parseTableMappings } from "./parse-table-mapping";
export { loadTableMappings } from "./load-table-mappings";

// Scheduling
export { runWithConcurrency } from "./run-with-concurrency";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
