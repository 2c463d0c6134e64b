import { describe, it, expect, vi } from "vitest";
import {
  ERROR_MARKER,
  errorPlaceholder,
  transpileStatements,
} from "./transpiler";
import { SqlParserEngine } from "../dialects/engine";
import { Logger } from "../utils/logger";
import type { DialectEngine } from "../dialects/engine";
import type { TranspileOutcome } from "../types";

const units = (...texts: string[]) => texts.map((text) => ({ text }));

const dialects = { source: "spark", target: "snowflake" };

// Upper-cases valid statements, rejects anything starting with INVALID
function fakeTranslate(sql: string): TranspileOutcome {
  if (sql.startsWith("INVALID")) {
    return { ok: false, error: "Invalid expression", original: sql };
  }
  return { ok: true, sql: sql.toUpperCase() };
}

const fakeEngine: DialectEngine = { translate: fakeTranslate };

describe("errorPlaceholder", () => {
  it("comments every line of the message and keeps the statement", () => {
    expect(errorPlaceholder("Unexpected token\nat line 1", "BAD q")).toBe(
      "-- Error transpiling query:\n-- Unexpected token\n-- at line 1\nBAD q",
    );
  });
});

describe("transpileStatements", () => {
  it("produces one output per statement in the same order", () => {
    const results = transpileStatements(
      units("select 1", "INVALID SQL QUERY", "select 2"),
      dialects,
      fakeEngine,
    );

    expect(results.map((r) => r.output)).toEqual([
      "SELECT 1",
      "-- Error transpiling query:\n-- Invalid expression\nINVALID SQL QUERY",
      "SELECT 2",
    ]);
    expect(results[1].outcome).toEqual({
      ok: false,
      error: "Invalid expression",
      original: "INVALID SQL QUERY",
    });
  });

  it("asks the engine for pretty output", () => {
    const translate = vi.fn(fakeTranslate);
    transpileStatements(units("select 1"), dialects, { translate });

    expect(translate).toHaveBeenCalledWith("select 1", dialects, {
      pretty: true,
    });
  });

  it("logs each failure without raising", () => {
    const logger = new Logger("silent");
    const error = vi.spyOn(logger, "error");

    transpileStatements(
      units("INVALID SQL QUERY", "select 1"),
      dialects,
      fakeEngine,
      logger,
    );

    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      "Error transpiling query: INVALID SQL QUERY\nError: Invalid expression",
    );
  });

  it("isolates a bad statement with the real engine", () => {
    const results = transpileStatements(
      units("SELECT 1", "INVALID SQL QUERY", "SELECT 2"),
      dialects,
      new SqlParserEngine(),
    );

    expect(results).toHaveLength(3);
    expect(results[0].outcome.ok).toBe(true);
    expect(results[0].output).toContain("SELECT");
    expect(results[1].outcome.ok).toBe(false);
    expect(results[1].output.startsWith(ERROR_MARKER)).toBe(true);
    expect(results[1].output.endsWith("\nINVALID SQL QUERY")).toBe(true);
    expect(results[2].outcome.ok).toBe(true);
    expect(results[2].output).toContain("SELECT");
  });
});
