/**
 * Dialect Engine
 * Adapter around node-sql-parser (parse, regenerate) and sql-formatter (pretty print)
 */

import NodeSqlParser from "node-sql-parser";
import { format } from "sql-formatter";
import { findDialect } from "./registry";
import type { DialectPair, TranspileOutcome } from "../types";

export interface TranslateOptions {
  pretty?: boolean;
}

/**
 * Rewrites one statement from the source dialect to the target dialect.
 * Rejections by the underlying engine come back as failed outcomes.
 */
export interface DialectEngine {
  translate(
    sql: string,
    dialects: DialectPair,
    options?: TranslateOptions,
  ): TranspileOutcome;
}

function failure(sql: string, error: unknown): TranspileOutcome {
  return {
    ok: false,
    error: error instanceof Error ? error.message : String(error),
    original: sql,
  };
}

export class SqlParserEngine implements DialectEngine {
  private parser = new NodeSqlParser.Parser();

  translate(
    sql: string,
    dialects: DialectPair,
    options: TranslateOptions = {},
  ): TranspileOutcome {
    const read = findDialect(dialects.source);
    const write = findDialect(dialects.target);
    if (!read || !write) {
      const unknown = read ? dialects.target : dialects.source;
      return failure(sql, `Unknown dialect: ${unknown}`);
    }

    let rewritten: string;
    try {
      const ast = this.parser.astify(sql, { database: read.database });
      rewritten = this.parser.sqlify(ast, { database: write.database });
    } catch (error) {
      return failure(sql, error);
    }

    if (!options.pretty) {
      return { ok: true, sql: rewritten };
    }

    try {
      return {
        ok: true,
        sql: format(rewritten, { language: write.language, keywordCase: "upper" }),
      };
    } catch (error) {
      return failure(sql, error);
    }
  }
}
