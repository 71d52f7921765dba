/**
 * run command - Print a pattern's demo output
 */

import { loadCatalog } from "../../core/catalog/index.js";
import { createLogger } from "../../utils/index.js";
import { resolvePattern } from "../helpers.js";

const logger = createLogger("run");

export async function runCommand(pattern: string): Promise<void> {
  const catalog = loadCatalog();
  const entry = resolvePattern(catalog, pattern);
  logger.debug({ patternId: entry.id }, "Running demo");

  for (const line of catalog.run(entry.id)) {
    console.log(line);
  }
}
