/**
 * verify command - Check every catalogue example
 */

import chalk from "chalk";
import { createPatternAnalysisService } from "../../core/analysis/index.js";
import { loadCatalog, verifyCatalog } from "../../core/catalog/index.js";
import { createLogger } from "../../utils/index.js";
import { printJson } from "../helpers.js";

const logger = createLogger("verify");

export interface VerifyOptions {
  json?: boolean;
}

/**
 * Verify the catalogue. Sets exit code 1 when any entry fails.
 */
export async function verifyCommand(options: VerifyOptions): Promise<void> {
  const verification = verifyCatalog(loadCatalog(), createPatternAnalysisService());
  logger.debug({ ok: verification.ok }, "Verification finished");

  if (!verification.ok) {
    process.exitCode = 1;
  }

  if (options.json) {
    printJson(verification);
    return;
  }

  for (const entry of verification.entries) {
    const mark = entry.ok ? chalk.green("✓") : chalk.red("✗");
    console.log(`${mark} ${entry.id.padEnd(18)} ${chalk.dim(`${Math.round(entry.confidence * 100)}%`)}`);
    for (const problem of entry.problems) {
      console.log(chalk.red(`    ${problem}`));
    }
  }

  const failed = verification.entries.filter((entry) => !entry.ok).length;
  console.log();
  if (failed === 0) {
    console.log(chalk.green(`All ${verification.entries.length} patterns verified.`));
  } else {
    console.log(chalk.red(`${failed} of ${verification.entries.length} patterns failed verification.`));
  }
}
