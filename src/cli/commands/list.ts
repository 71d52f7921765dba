/**
 * list command - List catalogued patterns
 */

import chalk from "chalk";
import { loadCatalog } from "../../core/catalog/index.js";
import { createLogger } from "../../utils/index.js";
import { parseCategory, printJson } from "../helpers.js";

const logger = createLogger("list");

export interface ListOptions {
  category?: string;
  json?: boolean;
}

/**
 * List catalogued patterns, grouped by category
 */
export async function listCommand(options: ListOptions): Promise<void> {
  logger.debug({ options }, "Listing patterns");

  const catalog = loadCatalog();
  const category = parseCategory(options.category);
  const entries = catalog.list({ category });

  if (options.json) {
    printJson(
      entries.map(({ id, name, category, aliases, intent }) => ({ id, name, category, aliases, intent }))
    );
    return;
  }

  for (const summary of catalog.categories()) {
    if (category && summary.category !== category) continue;

    console.log();
    console.log(chalk.cyan.bold(`${summary.category} (${summary.count})`));
    for (const entry of entries.filter((e) => e.category === summary.category)) {
      console.log(`  ${chalk.white(entry.id.padEnd(18))} ${chalk.dim(entry.intent)}`);
    }
  }
  console.log();
}
