/**
 * Processor Module
 * Runs every scanned unit through the file pipeline with bounded concurrency
 */

import { extname, resolve } from "node:path";
import { OutputCollisionError } from "../errors";
import { FilePipeline, outputFileName } from "../pipeline";
import { runWithConcurrency } from "../utils";
import {
  FORMAT_BY_EXTENSION,
  type ConversionContext,
  type ConversionResult,
  type SourceUnit,
} from "../types";

interface OutputClaims {
  runnable: SourceUnit[];
  collisions: Array<{ unit: SourceUnit; error: OutputCollisionError }>;
}

/**
 * Units whose stems map to the same output file: the first in scan order
 * keeps it, the rest become collisions. Unsupported files claim nothing.
 */
function claimOutputs(
  units: readonly SourceUnit[],
  outputDir: string,
  prefix: string,
): OutputClaims {
  const owners = new Map<string, SourceUnit>();
  const claims: OutputClaims = { runnable: [], collisions: [] };

  for (const unit of units) {
    const ext = extname(unit.sourcePath).toLowerCase();
    if (!FORMAT_BY_EXTENSION[ext]) {
      claims.runnable.push(unit);
      continue;
    }

    const outputPath = resolve(
      outputDir,
      outputFileName(unit.sourcePath, prefix),
    );
    const owner = owners.get(outputPath);
    if (owner) {
      claims.collisions.push({
        unit,
        error: new OutputCollisionError(outputPath, owner.relativePath),
      });
      continue;
    }
    owners.set(outputPath, unit);
    claims.runnable.push(unit);
  }

  return claims;
}

/**
 * Reads from context:
 * - units (scanner)
 *
 * Writes to context:
 * - results: one ConversionResult per unit that was written
 *
 * A unit that fails (unsupported extension, unreadable, unwritable) is
 * logged and tracked; the remaining units still run. A unit whose output
 * file name is already taken by an earlier unit is not run.
 */
export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.units) {
    throw new Error("Scanner must run before processor");
  }

  const { config, dialects, tracker, logger, engine, units } = ctx;

  const pipeline = new FilePipeline({
    engine,
    logger,
    hostCallee: config.extraction.hostCallee,
    excludeCreateTable: config.filter.excludeCreateTable,
    outputPrefix: config.output.prefix,
    encoding: config.input.encoding,
  });

  tracker.setTotalFiles(units.length);

  const { runnable, collisions } = claimOutputs(
    units,
    config.output.directory,
    config.output.prefix,
  );
  for (const { unit, error } of collisions) {
    logger.warn(`Skipping file: ${unit.relativePath}\n${error.message}`);
    tracker.incrementFailed();
    tracker.trackError(unit.sourcePath, error, "file");
  }

  const outcomes = await runWithConcurrency(
    runnable,
    config.concurrency,
    async (unit): Promise<ConversionResult | null> => {
      logger.info(`Processing file: ${unit.relativePath}`);
      try {
        const result = await pipeline.convertFile(
          unit.sourcePath,
          dialects,
          config.tableMappings,
          config.output.directory,
        );
        tracker.incrementSuccessful();
        tracker.recordResult(result);
        return result;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(
          `Error processing file: ${unit.relativePath}\nError: ${message}`,
        );
        tracker.incrementFailed();
        tracker.trackError(unit.sourcePath, error, "file");
        return null;
      }
    },
  );

  ctx.results = outcomes.filter(
    (result): result is ConversionResult => result !== null,
  );
}
