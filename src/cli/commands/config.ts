/**
 * config command - Print the effective configuration
 */

import chalk from "chalk";
import * as fs from "node:fs";
import { loadConfig } from "../../core/config.js";
import { createLogger, getConfigPath } from "../../utils/index.js";
import { printJson } from "../helpers.js";

const logger = createLogger("config");

export async function configCommand(): Promise<void> {
  const configPath = getConfigPath();
  const config = loadConfig();
  logger.debug({ configPath }, "Config command");

  if (fs.existsSync(configPath)) {
    console.error(chalk.dim(`# ${configPath}`));
  } else {
    console.error(chalk.dim("# defaults (run pattern-atlas init to write them)"));
  }
  printJson(config);
}
