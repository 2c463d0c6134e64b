/**
 * File Pipeline
 * read → extracted → filtered → renamed → transpiled → written, for one unit
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { basename, extname, join } from "node:path";
import { UnsupportedFormatError, WriteError } from "../errors";
import { extract } from "./extractor";
import { filterStatements } from "./filter";
import { renameTables } from "./renamer";
import { transpileStatements } from "./transpiler";
import type { DialectEngine } from "../dialects/engine";
import type { Logger } from "../utils/logger";
import {
  FORMAT_BY_EXTENSION,
  type ConversionResult,
  type DialectPair,
  type HostFormat,
  type PipelineStage,
  type TableMapping,
} from "../types";

export const SEPARATOR = "-".repeat(80);

export interface FilePipelineOptions {
  engine: DialectEngine;
  logger?: Logger;
  hostCallee?: string;
  excludeCreateTable?: boolean; // Default: true
  outputPrefix?: string; // Default: "converted_"
  encoding?: BufferEncoding; // Default: "utf-8"
  onStage?: (stage: PipelineStage, unit: string) => void;
}

export interface UnitInput {
  unit: string; // Identifier, usually the source path
  sourceText: string;
  format: HostFormat;
  dialects: DialectPair;
  mappings: readonly TableMapping[];
  outputDir: string;
}

/**
 * Map a path to its host format by extension
 * Throws UnsupportedFormatError for anything but .py and .sql
 */
export function resolveHostFormat(path: string): HostFormat {
  const ext = extname(path).toLowerCase();
  const format: HostFormat | undefined = FORMAT_BY_EXTENSION[ext];
  if (!format) {
    throw new UnsupportedFormatError(ext || basename(path));
  }
  return format;
}

export function outputFileName(unit: string, prefix = "converted_"): string {
  return `${prefix}${basename(unit, extname(unit))}.sql`;
}

/**
 * Every statement is terminated by `;` and followed by a separator line
 */
export function renderArtifact(outputs: readonly string[]): string {
  return outputs.map((sql) => `${sql};\n\n\n${SEPARATOR}\n\n`).join("");
}

export class FilePipeline {
  constructor(private options: FilePipelineOptions) {}

  /**
   * Run a unit whose text is already in hand
   */
  async process(input: UnitInput): Promise<ConversionResult> {
    this.enter("read", input.unit);
    return this.run(input);
  }

  /**
   * Read a file, resolve its format from the extension and run it
   */
  async convertFile(
    path: string,
    dialects: DialectPair,
    mappings: readonly TableMapping[],
    outputDir: string,
  ): Promise<ConversionResult> {
    const sourceText = await readFile(path, this.options.encoding ?? "utf-8");
    this.enter("read", path);

    const format = resolveHostFormat(path);
    return this.run({
      unit: path,
      sourceText,
      format,
      dialects,
      mappings,
      outputDir,
    });
  }

  /**
   * Convert one file and return the path of the written artifact
   */
  async processUnit(
    path: string,
    dialects: DialectPair,
    mappings: readonly TableMapping[],
    outputDir: string,
  ): Promise<string> {
    const result = await this.convertFile(path, dialects, mappings, outputDir);
    return result.outputPath;
  }

  private async run(input: UnitInput): Promise<ConversionResult> {
    const { unit, sourceText, format, dialects, mappings, outputDir } = input;
    const { engine, logger } = this.options;

    const { statements, warnings } = extract(sourceText, format, {
      hostCallee: this.options.hostCallee,
    });
    for (const warning of warnings) {
      logger?.warn(`${unit}: ${warning.message}`);
    }
    this.enter("extracted", unit);

    const kept =
      this.options.excludeCreateTable === false
        ? [...statements]
        : filterStatements(statements);
    this.enter("filtered", unit);

    const renamed = renameTables(kept, mappings);
    this.enter("renamed", unit);

    const transpiled = transpileStatements(renamed, dialects, engine, logger);
    this.enter("transpiled", unit);

    const outputPath = join(
      outputDir,
      outputFileName(unit, this.options.outputPrefix),
    );
    await this.write(
      outputDir,
      outputPath,
      renderArtifact(transpiled.map((statement) => statement.output)),
    );
    this.enter("written", unit);

    return {
      unit,
      format,
      outputPath,
      extracted: statements.length,
      statements: transpiled,
      warnings,
    };
  }

  private async write(
    outputDir: string,
    outputPath: string,
    content: string,
  ): Promise<void> {
    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(outputPath, content, "utf-8");
    } catch (error) {
      throw new WriteError(outputPath, error);
    }
  }

  private enter(stage: PipelineStage, unit: string): void {
    this.options.logger?.debug(`${unit}: ${stage}`);
    this.options.onStage?.(stage, unit);
  }
}

/**
 * One-shot form of FilePipeline.processUnit
 */
export async function processUnit(
  path: string,
  dialects: DialectPair,
  mappings: readonly TableMapping[],
  outputDir: string,
  options: FilePipelineOptions,
): Promise<string> {
  return new FilePipeline(options).processUnit(
    path,
    dialects,
    mappings,
    outputDir,
  );
}
