/**
 * Dialect Registry
 * Fixed set of supported dialects, looked up case-insensitively
 */

import type { SqlLanguage } from "sql-formatter";
import { UnsupportedDialectError } from "../errors";
import type { DialectPair } from "../types";

export interface DialectInfo {
  name: string; // Canonical name
  aliases: string[];
  database: string; // node-sql-parser `database` option
  language: SqlLanguage; // sql-formatter `language` option
}

// Spark SQL grew out of HiveQL, so Spark statements go through the Hive grammar
export const DIALECTS: readonly DialectInfo[] = [
  { name: "athena", aliases: [], database: "Athena", language: "trino" },
  { name: "bigquery", aliases: [], database: "BigQuery", language: "bigquery" },
  { name: "db2", aliases: [], database: "DB2", language: "db2" },
  { name: "flink", aliases: ["flinksql"], database: "FlinkSQL", language: "sql" },
  { name: "hive", aliases: [], database: "Hive", language: "hive" },
  { name: "mariadb", aliases: [], database: "MariaDB", language: "mariadb" },
  { name: "mysql", aliases: [], database: "MySQL", language: "mysql" },
  {
    name: "postgres",
    aliases: ["postgresql", "pg"],
    database: "PostgresQL",
    language: "postgresql",
  },
  { name: "redshift", aliases: [], database: "Redshift", language: "redshift" },
  { name: "snowflake", aliases: [], database: "Snowflake", language: "snowflake" },
  { name: "spark", aliases: ["databricks"], database: "Hive", language: "spark" },
  { name: "sqlite", aliases: [], database: "Sqlite", language: "sqlite" },
  { name: "trino", aliases: ["presto"], database: "Trino", language: "trino" },
  {
    name: "tsql",
    aliases: ["transactsql", "mssql", "sqlserver"],
    database: "TransactSQL",
    language: "transactsql",
  },
];

const BY_NAME = new Map<string, DialectInfo>();
for (const dialect of DIALECTS) {
  BY_NAME.set(dialect.name, dialect);
  for (const alias of dialect.aliases) {
    BY_NAME.set(alias, dialect);
  }
}

export function findDialect(name: string): DialectInfo | undefined {
  return BY_NAME.get(name.trim().toLowerCase());
}

export function isSupportedDialect(name: string): boolean {
  return findDialect(name) !== undefined;
}

/**
 * Validate both dialects and return their canonical names
 */
export function resolveDialectPair(source: string, target: string): DialectPair {
  const read = findDialect(source);
  if (!read) throw new UnsupportedDialectError("source", source);

  const write = findDialect(target);
  if (!write) throw new UnsupportedDialectError("target", target);

  return { source: read.name, target: write.name };
}
