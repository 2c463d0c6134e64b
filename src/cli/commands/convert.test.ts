import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { applyCliOptions, requireDialects } from "./convert";
import { loadDefaultConfig } from "../../utils";
import { UnsupportedDialectError, UsageError } from "../../errors";
import type { ConversionConfig } from "../../types";

describe("applyCliOptions", () => {
  let base: ConversionConfig;
  let dir: string;

  beforeEach(async () => {
    base = await loadDefaultConfig();
    dir = await mkdtemp(join(tmpdir(), "sqlshift-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("overrides config values given on the command line", async () => {
    const config = await applyCliOptions(base, {
      sourceFiles: ["a.sql", "b.py"],
      sourceDialect: "spark",
      targetDialect: "snowflake",
      tableMappings: ["table1:table2"],
      outputDir: "out",
      concurrency: 8,
      verbose: true,
    });

    expect(config.input.files).toEqual(["a.sql", "b.py"]);
    expect(config.dialects).toEqual({ source: "spark", target: "snowflake" });
    expect(config.tableMappings).toEqual([
      { source: "table1", target: "table2" },
    ]);
    expect(config.output.directory).toBe("out");
    expect(config.concurrency).toBe(8);
    expect(config.logging.level).toBe("debug");
  });

  it("leaves the base config untouched", async () => {
    await applyCliOptions(base, {
      sourceFiles: ["a.sql"],
      sourceDialect: "hive",
      verbose: true,
    });

    expect(base.input.files).toEqual([]);
    expect(base.dialects.source).toBeNull();
    expect(base.logging.level).toBe("info");
  });

  it("keeps config mappings when none are given", async () => {
    const withMappings = {
      ...base,
      tableMappings: [{ source: "a", target: "b" }],
    };

    const config = await applyCliOptions(withMappings, {});

    expect(config.tableMappings).toEqual([{ source: "a", target: "b" }]);
  });

  it("puts mappings from a file before inline ones", async () => {
    const file = join(dir, "mappings.json");
    await writeFile(
      file,
      JSON.stringify([{ src_table: "from_file", dst_table: "x" }]),
    );

    const config = await applyCliOptions(base, {
      tableMappingsFile: file,
      tableMappings: ["inline:y"],
    });

    expect(config.tableMappings).toEqual([
      { source: "from_file", target: "x" },
      { source: "inline", target: "y" },
    ]);
  });
});

describe("requireDialects", () => {
  let base: ConversionConfig;

  beforeEach(async () => {
    base = await loadDefaultConfig();
  });

  it("requires a source dialect", () => {
    expect(() => requireDialects(base)).toThrow(UsageError);
    expect(() => requireDialects(base)).toThrow(
      "Missing required parameter: --source-dialect",
    );
  });

  it("requires a target dialect", () => {
    const config = { ...base, dialects: { source: "spark", target: null } };
    expect(() => requireDialects(config)).toThrow(
      "Missing required parameter: --target-dialect",
    );
  });

  it("rejects unsupported dialects", () => {
    const config = { ...base, dialects: { source: "cobol", target: "spark" } };
    expect(() => requireDialects(config)).toThrow(UnsupportedDialectError);
    expect(() => requireDialects(config)).toThrow(
      "Unsupported source dialect: cobol",
    );
  });

  it("returns canonical dialect names", () => {
    const config = {
      ...base,
      dialects: { source: "Spark", target: "PostgreSQL" },
    };
    expect(requireDialects(config)).toEqual({
      source: "spark",
      target: "postgres",
    });
  });
});
