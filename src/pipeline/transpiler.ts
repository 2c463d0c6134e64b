/**
 * Dialect Transpiler
 * Sends each statement through the dialect engine; one output per input
 */

import type { DialectEngine } from "../dialects/engine";
import type { Logger } from "../utils/logger";
import type {
  DialectPair,
  StatementUnit,
  TranspileOutcome,
  TranspiledStatement,
} from "../types";

export const ERROR_MARKER = "-- Error transpiling query:";

/**
 * Comment block standing in for a statement the engine rejected.
 * Every line of the message is commented; the statement follows verbatim.
 */
export function errorPlaceholder(error: string, original: string): string {
  const message = error
    .split(/\r?\n/)
    .map((line) => `-- ${line}`.trimEnd())
    .join("\n");
  return `${ERROR_MARKER}\n${message}\n${original}`;
}

export function renderOutcome(outcome: TranspileOutcome): string {
  return outcome.ok
    ? outcome.sql
    : errorPlaceholder(outcome.error, outcome.original);
}

export function transpileStatements(
  statements: readonly StatementUnit[],
  dialects: DialectPair,
  engine: DialectEngine,
  logger?: Logger,
): TranspiledStatement[] {
  return statements.map((original) => {
    const outcome = engine.translate(original.text, dialects, { pretty: true });
    if (!outcome.ok) {
      logger?.error(
        `Error transpiling query: ${original.text}\nError: ${outcome.error}`,
      );
    }
    return { original, outcome, output: renderOutcome(outcome) };
  });
}
