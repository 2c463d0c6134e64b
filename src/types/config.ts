/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  // Explicit files, processed whatever their extension
  files: z.array(z.string()),
  // Directory scanned for patterns; null scans the working directory only
  // when no explicit files are given
  directory: z.string().nullable(),
  patterns: z.array(z.string()).min(1),
  ignore: z.array(z.string()),
  encoding: z.enum(["utf8", "utf-8", "utf16le", "latin1", "ascii"]),
});

export const OutputConfigSchema = z.object({
  directory: z.string().min(1),
  prefix: z.string(),
});

export const DialectsConfigSchema = z.object({
  source: z.string().nullable(),
  target: z.string().nullable(),
});

export const TableMappingSchema = z.object({
  source: z.string().min(1, "Table mapping source must not be empty"),
  target: z.string(),
});

export const ExtractionConfigSchema = z.object({
  // Callee whose triple-quoted argument holds a statement, e.g. spark.sql
  hostCallee: z.string().min(1),
});

export const FilterConfigSchema = z.object({
  excludeCreateTable: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  dialects: DialectsConfigSchema,
  tableMappings: z.array(TableMappingSchema),
  extraction: ExtractionConfigSchema,
  filter: FilterConfigSchema,
  concurrency: z.number().int().positive(),
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    input: InputConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
    dialects: DialectsConfigSchema.partial().optional(),
    extraction: ExtractionConfigSchema.partial().optional(),
    filter: FilterConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type DialectsConfig = z.infer<typeof DialectsConfigSchema>;
export type TableMapping = z.infer<typeof TableMappingSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type FilterConfig = z.infer<typeof FilterConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;
