import { UsageError } from "../errors";
import type { TableMapping } from "../types";

/**
 * Parse "source:target" pairs given on the command line
 * Only the first colon separates, so targets may contain colons
 */
export function parseTableMappings(pairs: readonly string[]): TableMapping[] {
  return pairs.map((pair) => {
    const separator = pair.indexOf(":");
    if (separator <= 0) {
      throw new UsageError(
        `Invalid table mapping "${pair}". Expected source_table:target_table.`,
      );
    }
    return {
      source: pair.slice(0, separator),
      target: pair.slice(separator + 1),
    };
  });
}
