/**
 * detect command - Detect design patterns in TypeScript sources
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import { createPatternAnalysisService } from "../../core/analysis/index.js";
import type { DetectedPattern } from "../../core/analysis/index.js";
import { loadCatalog } from "../../core/catalog/index.js";
import { loadConfig } from "../../core/config.js";
import { AnalysisError, ErrorCode } from "../../core/errors.js";
import { createLogger, resolveSourcePaths } from "../../utils/index.js";
import { formatConfidence, printJson, resolvePatternIds } from "../helpers.js";

const logger = createLogger("detect");

export interface DetectOptions {
  minConfidence?: number;
  pattern?: string[];
  json?: boolean;
}

function relative(filePath: string): string {
  return path.relative(process.cwd(), filePath) || filePath;
}

function printPattern(pattern: DetectedPattern): void {
  console.log(
    `${chalk.cyan.bold(pattern.name)} ${chalk.white(pattern.patternType)} ${formatConfidence(
      pattern.confidence,
      pattern.confidenceLevel
    )}`
  );
  for (const participant of pattern.participants) {
    console.log(
      `  ${chalk.dim(participant.role.padEnd(22))} ${participant.entityName} ${chalk.dim(relative(participant.filePath))}`
    );
  }
  for (const evidence of pattern.evidence) {
    console.log(chalk.dim(`  - ${evidence}`));
  }
}

/**
 * Detect patterns in files and directories
 */
export async function detectCommand(paths: string[], options: DetectOptions): Promise<void> {
  const config = loadConfig();
  const patternTypes = options.pattern
    ? resolvePatternIds(loadCatalog(), options.pattern)
    : config.detection.patternTypes;
  const minConfidence = options.minConfidence ?? config.detection.minConfidence;

  const spinner = ora({ text: "Finding source files...", isSilent: options.json === true }).start();

  const { files, missing } = await resolveSourcePaths(paths, config.detection.include, config.detection.ignore);
  if (missing.length > 0) {
    spinner.fail(chalk.red("Some paths do not exist"));
    throw new AnalysisError(`Not found: ${missing.join(", ")}`, ErrorCode.SOURCE_NOT_FOUND, {
      filePath: missing[0],
    });
  }
  if (files.length === 0) {
    spinner.warn(chalk.yellow("No source files found"));
    if (options.json) printJson({ files: 0, patterns: [] });
    return;
  }

  spinner.text = `Analyzing ${files.length} files...`;
  const service = createPatternAnalysisService();
  const result = await service.analyzeFiles(files, { minConfidence, patternTypes }).catch((error: unknown) => {
    spinner.fail(chalk.red("Analysis failed"));
    throw error;
  });
  logger.info({ files: files.length, patterns: result.stats.totalPatterns }, "Detection finished");
  spinner.succeed(`Analyzed ${files.length} files in ${result.stats.analysisTimeMs}ms`);

  if (options.json) {
    printJson({ files: files.length, patterns: result.patterns, stats: result.stats });
    return;
  }

  if (result.patterns.length === 0) {
    console.log(chalk.yellow("No patterns detected."));
    return;
  }

  for (const pattern of result.patterns) {
    console.log();
    printPattern(pattern);
  }

  const { highConfidenceCount, mediumConfidenceCount, lowConfidenceCount, totalPatterns } = result.stats;
  console.log();
  console.log(
    chalk.dim(
      `${totalPatterns} patterns (${highConfidenceCount} high, ${mediumConfidenceCount} medium, ${lowConfidenceCount} low)`
    )
  );
}
