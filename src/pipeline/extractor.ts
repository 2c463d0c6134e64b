/**
 * Statement Extractor
 * Pulls raw SQL statements out of a unit of source text
 */

import { UnsupportedFormatError } from "../errors";
import type {
  ExtractionResult,
  ExtractionWarning,
  HostFormat,
  StatementUnit,
} from "../types";

export interface ExtractOptions {
  hostCallee?: string; // Defaults to spark.sql
}

export const DEFAULT_HOST_CALLEE = "spark.sql";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Split a SQL script on `;`
 * Semicolons inside literals or comments also split (no tokenizing)
 */
export function extractPlainSql(content: string): StatementUnit[] {
  const statements: StatementUnit[] = [];
  let segmentStart = 0;

  for (const segment of content.split(";")) {
    const text = segment.trim();
    if (text) {
      const start = segmentStart + segment.indexOf(text);
      statements.push({ text, origin: { start, end: start + text.length } });
    }
    segmentStart += segment.length + 1;
  }

  return statements;
}

/**
 * Find `callee("""...""")` call-sites (optionally f"""...""") and return
 * their trimmed bodies. A body may span lines.
 */
export function extractHostCode(
  content: string,
  callee: string = DEFAULT_HOST_CALLEE,
): ExtractionResult {
  const opener = new RegExp(
    `${escapeRegExp(callee)}\\(\\s*[fF]?("""|''')`,
    "g",
  );
  const statements: StatementUnit[] = [];
  const warnings: ExtractionWarning[] = [];

  let match: RegExpExecArray | null;
  while ((match = opener.exec(content)) !== null) {
    const delimiter = match[1];
    const bodyStart = match.index + match[0].length;
    const bodyEnd = content.indexOf(delimiter, bodyStart);

    if (bodyEnd === -1) {
      warnings.push({
        offset: match.index,
        message: `Could not extract SQL query from: ${match[0]} (unterminated ${delimiter} string)`,
      });
      continue;
    }

    const afterBody = bodyEnd + delimiter.length;
    opener.lastIndex = afterBody;

    if (!/^\s*\)/.test(content.slice(afterBody))) {
      warnings.push({
        offset: match.index,
        message: `Could not extract SQL query from: ${content.slice(match.index, afterBody)} (argument is not a single string literal)`,
      });
      continue;
    }

    const raw = content.slice(bodyStart, bodyEnd);
    const text = raw.trim();
    if (!text) {
      warnings.push({
        offset: match.index,
        message: `Skipping empty SQL query in ${callee}() call`,
      });
      continue;
    }

    const start = bodyStart + raw.indexOf(text);
    statements.push({ text, origin: { start, end: start + text.length } });
  }

  return { statements, warnings };
}

/**
 * Extract statements from `content` according to its host format
 * Returns an empty list when nothing is found
 */
export function extract(
  content: string,
  format: HostFormat,
  options: ExtractOptions = {},
): ExtractionResult {
  switch (format) {
    case "plain-sql":
      return { statements: extractPlainSql(content), warnings: [] };
    case "host-code":
      return extractHostCode(content, options.hostCallee);
    default: {
      // Unreachable for typed callers; guards values that arrive untyped
      const unknown: never = format;
      throw new UnsupportedFormatError(String(unknown));
    }
  }
}
