/**
 * Scanner Module
 * Collects explicit source files and discovers .py/.sql files in a directory
 */

import glob from "fast-glob";
import path from "node:path";
import type { ConversionContext, SourceUnit } from "../types";

/**
 * Glob patterns excluding earlier artifacts: the whole output directory when
 * it sits inside the scanned directory, or the prefixed .sql files when the
 * two are the same directory
 */
function outputIgnore(
  inputDir: string,
  outputDir: string,
  prefix: string,
): string[] {
  const relative = path.relative(inputDir, path.resolve(outputDir));
  if (!relative) {
    return [`${glob.escapePath(prefix)}*.sql`];
  }
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return [];
  }
  return [`${relative.split(path.sep).join("/")}/**`];
}

/**
 * Scans configured inputs and populates context
 *
 * Writes to context:
 * - units: explicit files first (in the given order), then discovered
 *   files sorted by path, without duplicates
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { input, output } = ctx.config;

  const explicit = input.files.map((file) => path.resolve(file));

  // Fall back to the working directory only when nothing else was asked for
  const directory =
    input.directory ?? (explicit.length === 0 ? "." : null);

  let discovered: string[] = [];
  if (directory) {
    const inputDir = path.resolve(directory);
    discovered = await glob(input.patterns, {
      cwd: inputDir,
      absolute: true,
      onlyFiles: true,
      ignore: [
        ...input.ignore,
        ...outputIgnore(inputDir, output.directory, output.prefix),
      ],
    });
    // fast-glob returns POSIX separators
    discovered = discovered.map((file) => path.normalize(file)).sort();
  }

  const seen = new Set<string>();
  const units: SourceUnit[] = [];
  for (const sourcePath of [...explicit, ...discovered]) {
    if (seen.has(sourcePath)) continue;
    seen.add(sourcePath);
    units.push({
      sourcePath,
      relativePath: path.relative(process.cwd(), sourcePath) || sourcePath,
      filename: path.basename(sourcePath, path.extname(sourcePath)),
    });
  }

  ctx.logger.debug(
    `Scanned ${units.length} file(s): ${explicit.length} explicit, ${discovered.length} discovered`,
  );
  ctx.units = units;
}
