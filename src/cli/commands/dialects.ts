/**
 * Dialects command - List supported dialect names
 */

import chalk from "chalk";
import { DIALECTS } from "../../dialects";

export function dialectsCommand(): void {
  console.log("Supported dialects (case-insensitive):");
  for (const dialect of DIALECTS) {
    const aliases = dialect.aliases.length
      ? chalk.dim(` (${dialect.aliases.join(", ")})`)
      : "";
    console.log(`  ${dialect.name}${aliases}`);
  }
}
