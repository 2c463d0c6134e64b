/**
 * Statement Filter
 * Drops schema-definition (CREATE TABLE) statements
 */

import type { StatementUnit } from "../types";

const CREATE_TABLE = /^\s*create\s+table\b/i;

export function isCreateTable(sql: string): boolean {
  return CREATE_TABLE.test(sql);
}

export function filterStatements(
  statements: readonly StatementUnit[],
): StatementUnit[] {
  return statements.filter((statement) => !isCreateTable(statement.text));
}
