/**
 * render command - Render the catalogue as a markdown reference
 */

import chalk from "chalk";
import * as path from "node:path";
import { loadCatalog } from "../../core/catalog/index.js";
import { loadConfig } from "../../core/config.js";
import { renderReference } from "../../core/documentation/index.js";
import { createLogger, writeFile } from "../../utils/index.js";

const logger = createLogger("render");

export interface RenderCommandOptions {
  output?: string;
  /** false when --no-output-blocks is given */
  outputBlocks?: boolean;
}

/**
 * Render the reference to stdout, or to a file with --output
 */
export async function renderCommand(options: RenderCommandOptions): Promise<void> {
  const config = loadConfig();
  const markdown = renderReference(loadCatalog(), {
    title: config.reference.title,
    description: config.reference.description,
    sectionLevel: config.reference.sectionLevel,
    includeOutput: config.reference.includeOutput && options.outputBlocks !== false,
  });

  if (!options.output) {
    process.stdout.write(markdown);
    return;
  }

  const outputPath = path.resolve(options.output);
  await writeFile(outputPath, markdown);
  logger.info({ outputPath }, "Reference written");
  console.log(chalk.green(`Reference written to ${path.relative(process.cwd(), outputPath) || outputPath}`));
}
