/**
 * search command - Find patterns by text
 */

import chalk from "chalk";
import { loadCatalog } from "../../core/catalog/index.js";
import { createLogger } from "../../utils/index.js";

const logger = createLogger("search");

export async function searchCommand(terms: string[]): Promise<void> {
  const query = terms.join(" ");
  const matches = loadCatalog().search(query);
  logger.debug({ query, matches: matches.length }, "Search finished");

  if (matches.length === 0) {
    console.log(chalk.yellow(`No patterns match "${query}".`));
    return;
  }

  for (const entry of matches) {
    console.log(`${chalk.white(entry.id.padEnd(18))} ${chalk.dim(entry.intent)}`);
  }
}
