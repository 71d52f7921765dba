/**
 * show command - Show a pattern with its example and output
 */

import chalk from "chalk";
import { loadCatalog } from "../../core/catalog/index.js";
import { createLogger } from "../../utils/index.js";
import { resolvePattern } from "../helpers.js";

const logger = createLogger("show");

export async function showCommand(pattern: string): Promise<void> {
  const catalog = loadCatalog();
  const entry = resolvePattern(catalog, pattern);
  logger.debug({ patternId: entry.id }, "Showing pattern");

  console.log();
  console.log(chalk.cyan.bold(entry.name), chalk.dim(`(${entry.category})`));
  if (entry.aliases.length > 0) {
    console.log(chalk.dim(`Also known as: ${entry.aliases.join(", ")}`));
  }
  console.log();
  console.log(entry.overview);
  console.log();
  console.log(`${chalk.white.bold("Intent:")} ${entry.intent}`);

  console.log();
  console.log(chalk.white.bold("Participants"));
  for (const participant of entry.participants) {
    console.log(`  ${chalk.cyan(participant.role)}: ${participant.description}`);
  }

  console.log();
  console.log(chalk.white.bold("Example"), chalk.dim(entry.example));
  console.log(chalk.dim("─".repeat(60)));
  console.log(catalog.snippet(entry.id).trimEnd());
  console.log(chalk.dim("─".repeat(60)));

  console.log();
  console.log(chalk.white.bold("Output"));
  for (const line of catalog.run(entry.id)) {
    console.log(`  ${line}`);
  }
  console.log();
}
