#!/usr/bin/env node

/**
 * pattern-atlas CLI
 * Browse the catalogue, render and lint the reference, detect patterns in code
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { listCommand } from "./commands/list.js";
import { showCommand } from "./commands/show.js";
import { runCommand } from "./commands/run.js";
import { searchCommand } from "./commands/search.js";
import { renderCommand } from "./commands/render.js";
import { lintCommand } from "./commands/lint.js";
import { detectCommand } from "./commands/detect.js";
import { verifyCommand } from "./commands/verify.js";
import { initCommand } from "./commands/init.js";
import { configCommand } from "./commands/config.js";
import { CatalogError } from "../core/errors.js";
import { PATTERN_CATEGORIES } from "../types/index.js";
import { createLogger } from "../utils/logger.js";
import { parseConfidence } from "./helpers.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("pattern-atlas")
  .description("Creational and structural design patterns: catalogue, reference and detection")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Catalogue
// =============================================================================

program
  .command("list")
  .description("List catalogued patterns")
  .addOption(new Option("-c, --category <category>", "Only one category").choices([...PATTERN_CATEGORIES]))
  .option("--json", "Print JSON")
  .action(listCommand);

program
  .command("show")
  .description("Show a pattern with its example and output")
  .argument("<pattern>", "Pattern id, name or alias")
  .action(showCommand);

program
  .command("run")
  .description("Run a pattern's example and print its output")
  .argument("<pattern>", "Pattern id, name or alias")
  .action(runCommand);

program
  .command("search")
  .description("Find patterns whose text contains every term")
  .argument("<terms...>", "Search terms")
  .action(searchCommand);

program
  .command("verify")
  .description("Check that every example is self-contained, runs and is detected")
  .option("--json", "Print JSON")
  .action(verifyCommand);

// =============================================================================
// Reference Document
// =============================================================================

program
  .command("render")
  .description("Render the catalogue as a markdown reference")
  .option("-o, --output <file>", "Write to a file instead of stdout")
  .option("--no-output-blocks", "Leave out example output")
  .action(renderCommand);

program
  .command("lint")
  .description("Lint a markdown reference (default: the configured reference file)")
  .argument("[file]", "Reference document")
  .option("--json", "Print JSON")
  .action(lintCommand);

// =============================================================================
// Detection
// =============================================================================

program
  .command("detect")
  .description("Detect design patterns in TypeScript sources")
  .argument("<paths...>", "Files or directories")
  .option("-m, --min-confidence <n>", "Minimum confidence (0-1)", parseConfidence)
  .option("-p, --pattern <ids...>", "Only these pattern ids")
  .option("--json", "Print JSON")
  .action(detectCommand);

// =============================================================================
// Configuration
// =============================================================================

program
  .command("init")
  .description("Write the default configuration")
  .option("-f, --force", "Overwrite an existing configuration")
  .action(initCommand);

program
  .command("config")
  .description("Print the effective configuration")
  .action(configCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));

    if (error instanceof CatalogError && error.suggestions.length > 0) {
      console.error(chalk.dim(`Did you mean: ${error.suggestions.join(", ")}?`));
    }

    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
