/**
 * Convert command - Loads config and runs conversion pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  loadTableMappings,
  parseTableMappings,
  Logger,
  Tracker,
} from "../../utils";
import { resolveDialectPair, SqlParserEngine } from "../../dialects";
import { UnsupportedDialectError, UsageError } from "../../errors";
import * as modules from "../../modules";
import type {
  ConversionConfig,
  ConversionContext,
  DialectPair,
} from "../../types";

const ConvertOptionsSchema = z.object({
  sourceFiles: z.array(z.string()).optional(),
  sourceDir: z.string().optional(),
  sourceDialect: z.string().optional(),
  targetDialect: z.string().optional(),
  tableMappings: z.array(z.string()).optional(),
  tableMappingsFile: z.string().optional(),
  config: z.string().optional(),
  outputDir: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().optional(),
});

export type ConvertOptions = z.input<typeof ConvertOptionsSchema>;
type ParsedOptions = z.output<typeof ConvertOptionsSchema>;

/**
 * Override config values with whatever was given on the command line
 * Mappings from --table-mappings-file come first, then --table-mappings
 */
export async function applyCliOptions(
  base: ConversionConfig,
  options: ParsedOptions,
): Promise<ConversionConfig> {
  const config: ConversionConfig = {
    ...base,
    input: { ...base.input },
    output: { ...base.output },
    dialects: { ...base.dialects },
    logging: { ...base.logging },
  };

  if (options.sourceFiles?.length) {
    config.input.files = options.sourceFiles;
  }
  if (options.sourceDir) {
    config.input.directory = options.sourceDir;
  }
  if (options.sourceDialect) {
    config.dialects.source = options.sourceDialect;
  }
  if (options.targetDialect) {
    config.dialects.target = options.targetDialect;
  }

  const fromFile = options.tableMappingsFile
    ? await loadTableMappings(options.tableMappingsFile)
    : [];
  const inline = parseTableMappings(options.tableMappings ?? []);
  if (options.tableMappingsFile || inline.length > 0) {
    config.tableMappings = [...fromFile, ...inline];
  }

  if (options.outputDir) {
    config.output.directory = options.outputDir;
  }
  if (options.concurrency) {
    config.concurrency = options.concurrency;
  }
  if (options.verbose) {
    config.logging.level = "debug";
  }

  return config;
}

/**
 * Both dialects must be present and registered before anything runs
 */
export function requireDialects(config: ConversionConfig): DialectPair {
  const { source, target } = config.dialects;
  if (!source) {
    throw new UsageError("Missing required parameter: --source-dialect");
  }
  if (!target) {
    throw new UsageError("Missing required parameter: --target-dialect");
  }
  return resolveDialectPair(source, target);
}

export async function convertCommand(opts: ConvertOptions): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 });

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom) and apply CLI overrides
    const { config: loaded, errors } = await loadConfig(options.config);
    const config = await applyCliOptions(loaded, options);
    const dialects = requireDialects(config);

    const logger = new Logger(config.logging.level);
    const tracker = new Tracker();

    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
      logger.warn(`Ignoring invalid config file: ${err.path}`);
    }

    const ctx: ConversionContext = {
      config,
      dialects,
      tracker,
      logger,
      engine: new SqlParserEngine(),
      verbose: options.verbose,
    };

    spinner.start("Scanning files...");
    await modules.scan(ctx);

    const units = ctx.units ?? [];
    if (units.length === 0) {
      throw new UsageError("No files found to process.");
    }
    spinner.succeed(
      `Found ${units.length} file(s) · ${dialects.source} → ${dialects.target}`,
    );

    await modules.process(ctx);
    await modules.stats(ctx);
  } catch (error) {
    if (error instanceof UsageError || error instanceof UnsupportedDialectError) {
      spinner.fail(error.message);
    } else {
      spinner.fail("Conversion failed");
      console.error(error);
    }
    process.exit(1);
  }
}
