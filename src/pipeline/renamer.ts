/**
 * Table Renamer
 * Applies table mappings in order as plain substring replacements
 */

import type { StatementUnit, TableMapping } from "../types";

/**
 * Each mapping sees the output of the previous one. Replacement is not
 * identifier-aware: `orders` also rewrites `orders_archive`. A mapping
 * with an empty source matches nothing.
 */
export function renameTables(
  statements: readonly StatementUnit[],
  mappings: readonly TableMapping[],
): StatementUnit[] {
  return mappings.reduce<StatementUnit[]>(
    (current, { source, target }) =>
      source === ""
        ? current
        : current.map((statement) => ({
            ...statement,
            text: statement.text.split(source).join(target),
          })),
    [...statements],
  );
}
