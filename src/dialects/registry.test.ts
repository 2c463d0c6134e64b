import { describe, it, expect } from "vitest";
import {
  DIALECTS,
  findDialect,
  isSupportedDialect,
  resolveDialectPair,
} from "./registry";
import { UnsupportedDialectError } from "../errors";

describe("findDialect", () => {
  it("looks names up case-insensitively", () => {
    expect(findDialect("SPARK")?.name).toBe("spark");
    expect(findDialect("Snowflake")?.name).toBe("snowflake");
  });

  it("resolves aliases to the canonical dialect", () => {
    expect(findDialect("PostgreSQL")?.name).toBe("postgres");
    expect(findDialect("mssql")?.name).toBe("tsql");
  });

  it("returns undefined for unknown names", () => {
    expect(findDialect("cobol")).toBeUndefined();
  });
});

describe("isSupportedDialect", () => {
  it("accepts every registered name and alias", () => {
    for (const dialect of DIALECTS) {
      expect(isSupportedDialect(dialect.name)).toBe(true);
      for (const alias of dialect.aliases) {
        expect(isSupportedDialect(alias.toUpperCase())).toBe(true);
      }
    }
  });

  it("rejects unknown names", () => {
    expect(isSupportedDialect("oracle-forms")).toBe(false);
  });
});

describe("resolveDialectPair", () => {
  it("returns canonical names", () => {
    expect(resolveDialectPair("Spark", "POSTGRESQL")).toEqual({
      source: "spark",
      target: "postgres",
    });
  });

  it("checks the source dialect first", () => {
    expect(() => resolveDialectPair("cobol", "nope")).toThrow(
      "Unsupported source dialect: cobol",
    );
  });

  it("names an unsupported target", () => {
    expect(() => resolveDialectPair("spark", "nope")).toThrow(
      UnsupportedDialectError,
    );
    expect(() => resolveDialectPair("spark", "nope")).toThrow(
      "Unsupported target dialect: nope",
    );
  });
});
