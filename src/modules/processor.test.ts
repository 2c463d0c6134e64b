import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { process } from "./processor";
import { loadDefaultConfig, Logger, Tracker } from "../utils";
import type { ConversionContext, SourceUnit, TranspileOutcome } from "../types";

function fakeTranslate(sql: string): TranspileOutcome {
  if (sql.startsWith("INVALID")) {
    return { ok: false, error: "Invalid expression", original: sql };
  }
  return { ok: true, sql: sql.toUpperCase() };
}

function unit(sourcePath: string, filename: string): SourceUnit {
  return { sourcePath, relativePath: sourcePath, filename };
}

describe("process", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sqlshift-process-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("requires the scanner to run first", async () => {
    const ctx: ConversionContext = {
      config: await loadDefaultConfig(),
      dialects: { source: "spark", target: "snowflake" },
      tracker: new Tracker(),
      logger: new Logger("silent"),
      engine: { translate: fakeTranslate },
    };

    await expect(process(ctx)).rejects.toThrow(
      "Scanner must run before processor",
    );
  });

  it("converts every unit and continues past failing ones", async () => {
    await writeFile(
      join(dir, "a.sql"),
      "select 1; CREATE TABLE t AS SELECT 1; select old_t.id from old_t;",
    );
    await writeFile(join(dir, "b.txt"), "select 2");
    await writeFile(join(dir, "c.py"), 'spark.sql("""INVALID SQL QUERY""")');

    const base = await loadDefaultConfig();
    const outputDir = join(dir, "out");
    const ctx: ConversionContext = {
      config: {
        ...base,
        output: { ...base.output, directory: outputDir },
        tableMappings: [{ source: "old_t", target: "new_t" }],
        concurrency: 2,
      },
      dialects: { source: "spark", target: "snowflake" },
      tracker: new Tracker(),
      logger: new Logger("silent"),
      engine: { translate: fakeTranslate },
      units: [
        unit(join(dir, "a.sql"), "a"),
        unit(join(dir, "b.txt"), "b"),
        unit(join(dir, "c.py"), "c"),
      ],
    };

    await process(ctx);

    expect(ctx.results?.map((r) => r.unit)).toEqual([
      join(dir, "a.sql"),
      join(dir, "c.py"),
    ]);
    expect(ctx.results?.[0].statements.map((s) => s.output)).toEqual([
      "SELECT 1",
      "SELECT NEW_T.ID FROM NEW_T",
    ]);
    expect((await readdir(outputDir)).sort()).toEqual([
      "converted_a.sql",
      "converted_c.sql",
    ]);

    const stats = ctx.tracker.getStats();
    expect(stats).toMatchObject({
      totalFiles: 3,
      successfulFiles: 2,
      failedFiles: 1,
      extractedStatements: 4,
      excludedStatements: 1,
      transpiledStatements: 2,
      failedStatements: 1,
    });
    expect(ctx.tracker.getIssues("file")).toEqual([
      {
        type: "file",
        path: join(dir, "b.txt"),
        reason: "unsupported-format",
        details:
          'Unsupported file type ".txt". Only .py and .sql files are supported.',
      },
    ]);
  });

  it("keeps the first unit when two stems share an output file", async () => {
    await mkdir(join(dir, "a"));
    await mkdir(join(dir, "b"));
    await writeFile(join(dir, "a", "job.sql"), "select 'from a'");
    await writeFile(join(dir, "b", "job.py"), 'spark.sql("""select 2""")');
    await writeFile(join(dir, "x.txt"), "select 3");
    await writeFile(join(dir, "x.sql"), "select 4");

    const base = await loadDefaultConfig();
    const outputDir = join(dir, "out");
    const ctx: ConversionContext = {
      config: {
        ...base,
        output: { ...base.output, directory: outputDir },
        concurrency: 4,
      },
      dialects: { source: "spark", target: "snowflake" },
      tracker: new Tracker(),
      logger: new Logger("silent"),
      engine: { translate: fakeTranslate },
      units: [
        unit(join(dir, "a", "job.sql"), "job"),
        unit(join(dir, "b", "job.py"), "job"),
        unit(join(dir, "x.txt"), "x"),
        unit(join(dir, "x.sql"), "x"),
      ],
    };

    await process(ctx);

    expect(ctx.results?.map((r) => r.unit)).toEqual([
      join(dir, "a", "job.sql"),
      join(dir, "x.sql"),
    ]);
    expect(await readFile(join(outputDir, "converted_job.sql"), "utf-8")).toBe(
      `SELECT 'FROM A';\n\n\n${"-".repeat(80)}\n\n`,
    );
    expect(ctx.tracker.getStats()).toMatchObject({
      totalFiles: 4,
      successfulFiles: 2,
      failedFiles: 2,
    });
    expect(ctx.tracker.getIssues("file").map((i) => [i.path, i.reason])).toEqual([
      [join(dir, "b", "job.py"), "output-collision"],
      [join(dir, "x.txt"), "unsupported-format"],
    ]);
    expect(ctx.tracker.getIssues("file")[0].details).toBe(
      `Output ${join(outputDir, "converted_job.sql")} is already produced by ${join(dir, "a", "job.sql")}`,
    );
  });
});
