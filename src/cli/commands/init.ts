/**
 * init command - Write the default configuration
 */

import chalk from "chalk";
import * as path from "node:path";
import { writeDefaultConfig } from "../../core/config.js";
import { createLogger, getConfigPath } from "../../utils/index.js";

const logger = createLogger("init");

export interface InitOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const configPath = getConfigPath();
  logger.info({ options }, "Starting initialization");

  if (!writeDefaultConfig(undefined, options.force === true)) {
    console.log(chalk.yellow("pattern-atlas is already initialized in this project."));
    console.log(chalk.dim("Use --force to overwrite the configuration."));
    return;
  }

  console.log(chalk.green(`Configuration written to ${path.relative(process.cwd(), configPath)}`));
  console.log(
    chalk.dim("Next:"),
    chalk.white("pattern-atlas render -o PATTERNS.md"),
    chalk.dim("then"),
    chalk.white("pattern-atlas lint")
  );
}
