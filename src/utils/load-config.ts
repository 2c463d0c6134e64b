import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { fileExists } from "./file-exists";
import { parseDataFile } from "./parse-data-file";
import type { ConversionConfig, PartialConversionConfig } from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("sqlshift", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConversionConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await fileExists(userConfigPath))) {
    return null;
  }

  return PartialConversionConfigSchema.parse(
    await parseDataFile(userConfigPath),
  );
}

async function loadCustomConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  return PartialConversionConfigSchema.parse(await parseDataFile(configPath));
}

/**
 * Merge an override into a full config, section by section
 * Lists (files, patterns, table mappings) are replaced, not concatenated
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    dialects: { ...base.dialects, ...override.dialects },
    tableMappings: override.tableMappings ?? base.tableMappings,
    extraction: { ...base.extraction, ...override.extraction },
    filter: { ...base.filter, ...override.filter },
    concurrency: override.concurrency ?? base.concurrency,
    logging: { ...base.logging, ...override.logging },
  };
}

export interface ConfigError {
  path: string;
  error: unknown;
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load is reported in `errors` and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadCustomConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
