#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for sqlshift
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { dialectsCommand } from "./commands/dialects";

const program = new Command();

program
  .name("sqlshift")
  .description(
    "Convert SQL in .sql files and spark.sql() calls between dialects",
  )
  .version("0.1.0");

// Main conversion command (default action)
program
  .option("-f, --source-files <paths...>", "SQL or Python file(s) to process")
  .option("-d, --source-dir <path>", "Directory to scan for .py and .sql files")
  .option("-s, --source-dialect <name>", "Source SQL dialect")
  .option("-t, --target-dialect <name>", "Target SQL dialect")
  .option(
    "-m, --table-mappings <pairs...>",
    "Table renames as source_table:target_table",
  )
  .option(
    "--table-mappings-file <path>",
    "JSON or YAML file containing table mappings",
  )
  .option("-c, --config <path>", "Path to a JSON or YAML config file")
  .option(
    "-o, --output-dir <path>",
    "Directory for converted files (default: transpiled_queries)",
  )
  .option("-j, --concurrency <n>", "Files processed in parallel")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program
  .command("dialects")
  .description("List supported SQL dialects")
  .action(dialectsCommand);

await program.parseAsync();
