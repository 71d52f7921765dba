/**
 * Shared option parsing and output formatting for CLI commands
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import type { IPatternCatalog, PatternEntry } from "../core/catalog/index.js";
import type { PatternConfidence } from "../core/analysis/index.js";
import { PATTERN_CATEGORIES } from "../types/index.js";
import type { PatternCategory, PatternId } from "../types/index.js";

/**
 * Parse a confidence threshold option
 */
export function parseConfidence(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("Expected a number between 0 and 1.");
  }
  return parsed;
}

export function parseCategory(value: string | undefined): PatternCategory | undefined {
  return PATTERN_CATEGORIES.find((category) => category === value);
}

/**
 * Resolve a pattern argument by id, name or alias.
 *
 * @throws CatalogError with suggestions when nothing matches
 */
export function resolvePattern(catalog: IPatternCatalog, query: string): PatternEntry {
  const result = catalog.resolve(query);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Resolve several pattern arguments to ids, keeping their first-seen order
 */
export function resolvePatternIds(catalog: IPatternCatalog, queries: string[]): PatternId[] {
  const ids: PatternId[] = [];
  for (const query of queries) {
    const { id } = resolvePattern(catalog, query);
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function formatConfidence(confidence: number, level: PatternConfidence): string {
  const text = `${Math.round(confidence * 100)}%`;
  switch (level) {
    case "high":
      return chalk.green(text);
    case "medium":
      return chalk.yellow(text);
    default:
      return chalk.dim(text);
  }
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
