import { z } from "zod";
import { parseDataFile } from "./parse-data-file";
import { TableMappingSchema } from "../types";
import type { TableMapping } from "../types";

// Accepts { source, target } as well as the older { src_table, dst_table }
const MappingEntrySchema = z.union([
  TableMappingSchema,
  z
    .object({
      src_table: z.string().min(1),
      dst_table: z.string(),
    })
    .transform(({ src_table, dst_table }) => ({
      source: src_table,
      target: dst_table,
    })),
]);

const MappingsFileSchema = z.union([
  z.array(MappingEntrySchema),
  z
    .object({ tableMappings: z.array(MappingEntrySchema) })
    .transform(({ tableMappings }) => tableMappings),
]);

/**
 * Load an ordered list of table mappings from a JSON or YAML file
 * Throws if the file is missing or does not match the schema
 */
export async function loadTableMappings(
  filepath: string,
): Promise<TableMapping[]> {
  return MappingsFileSchema.parse(await parseDataFile(filepath));
}
