/**
 * lint command - Lint a markdown reference document
 */

import chalk from "chalk";
import * as path from "node:path";
import { loadCatalog } from "../../core/catalog/index.js";
import { loadConfig } from "../../core/config.js";
import { hasErrors, lintFile } from "../../core/documentation/index.js";
import { createLogger } from "../../utils/index.js";
import { printJson } from "../helpers.js";

const logger = createLogger("lint");

export interface LintCommandOptions {
  json?: boolean;
}

/**
 * Lint a reference document. Sets exit code 1 when it has errors.
 */
export async function lintCommand(file: string | undefined, options: LintCommandOptions): Promise<void> {
  const config = loadConfig();
  const filePath = path.resolve(file ?? config.reference.output);
  const displayPath = path.relative(process.cwd(), filePath) || filePath;

  const result = lintFile(filePath, {
    sectionLevel: config.reference.sectionLevel,
    requireLanguageTag: config.lint.requireLanguageTag,
    requireAllPatterns: config.lint.requireAllPatterns,
    ignoreRules: config.lint.ignoreRules,
    catalog: loadCatalog(),
  });
  logger.debug({ filePath, errors: result.errorCount, warnings: result.warningCount }, "Lint finished");

  if (hasErrors(result)) {
    process.exitCode = 1;
  }

  if (options.json) {
    printJson({
      file: filePath,
      sections: result.sections.length,
      errorCount: result.errorCount,
      warningCount: result.warningCount,
      issues: result.issues,
    });
    return;
  }

  for (const issue of result.issues) {
    const severity = issue.severity === "error" ? chalk.red("error") : chalk.yellow("warning");
    console.log(
      `${chalk.dim(`${displayPath}:${issue.line}`)}  ${severity}  ${issue.message}  ${chalk.dim(issue.rule)}`
    );
  }

  const summary = `${result.sections.length} sections, ${result.errorCount} errors, ${result.warningCount} warnings`;
  if (hasErrors(result)) {
    console.log(chalk.red(`\n${displayPath}: ${summary}`));
  } else if (result.warningCount > 0) {
    console.log(chalk.yellow(`\n${displayPath}: ${summary}`));
  } else {
    console.log(chalk.green(`${displayPath}: ${summary}`));
  }
}
