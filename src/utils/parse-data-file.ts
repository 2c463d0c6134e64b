import { readFile } from "fs/promises";
import { extname } from "node:path";
import YAML from "yaml";

/**
 * Read a JSON or YAML file, choosing the parser by extension
 * Throws on unsupported extensions and on syntax errors
 */
export async function parseDataFile(filepath: string): Promise<unknown> {
  const ext = extname(filepath).toLowerCase();
  if (![".json", ".yml", ".yaml"].includes(ext)) {
    throw new Error(
      `Unsupported file type "${ext}". Only .json, .yml, and .yaml files are supported.`,
    );
  }

  const content = await readFile(filepath, "utf-8");
  return ext === ".json" ? JSON.parse(content) : YAML.parse(content);
}
