/**
 * Pattern Catalogue
 *
 * Loads catalog/patterns.json, validates it, and joins each record with its
 * snippet file and demo runner.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { PATTERN_CATEGORIES, err, ok } from "../../types/index.js";
import type { PatternId, Result } from "../../types/index.js";
import { createLogger, getPackageRoot, readJson, slugify } from "../../utils/index.js";
import { CatalogFileSchema, formatZodError, safeValidate } from "../../utils/validation.js";
import { CatalogError, ErrorCode } from "../errors.js";
import { DEMOS, type Demo } from "./examples/index.js";
import type {
  CatalogFilter,
  CatalogOptions,
  CategorySummary,
  IPatternCatalog,
  PatternEntry,
} from "./interfaces.js";

const logger = createLogger("catalog");

const MAX_SUGGESTIONS = 3;

export function getDefaultCatalogPath(): string {
  return path.join(getPackageRoot(), "catalog", "patterns.json");
}

export function getDefaultExamplesDir(): string {
  return path.join(getPackageRoot(), "src", "core", "catalog", "examples");
}

/**
 * In-memory catalogue of design patterns.
 */
export class PatternCatalog implements IPatternCatalog {
  private readonly entries: PatternEntry[];
  private readonly byId: Map<string, PatternEntry>;
  private readonly demos: Readonly<Record<PatternId, Demo>>;

  constructor(entries: PatternEntry[], demos: Readonly<Record<PatternId, Demo>> = DEMOS) {
    this.entries = entries;
    this.demos = demos;
    this.byId = new Map(entries.map((entry) => [entry.id, entry]));
  }

  list(filter?: CatalogFilter): PatternEntry[] {
    if (!filter?.category) return [...this.entries];
    return this.entries.filter((entry) => entry.category === filter.category);
  }

  get(id: string): PatternEntry {
    const entry = this.byId.get(id);
    if (!entry) {
      throw new CatalogError(`Unknown pattern "${id}"`, ErrorCode.PATTERN_NOT_FOUND, {
        patternId: id,
        suggestions: this.suggest(slugify(id)),
      });
    }
    return entry;
  }

  resolve(query: string): Result<PatternEntry, CatalogError> {
    const key = slugify(query);
    const match = this.entries.find(
      (entry) =>
        entry.id === key ||
        slugify(entry.name) === key ||
        entry.aliases.some((alias) => slugify(alias) === key)
    );
    if (match) return ok(match);

    return err(
      new CatalogError(`No pattern matches "${query}"`, ErrorCode.PATTERN_NOT_FOUND, {
        patternId: query,
        suggestions: this.suggest(key),
      })
    );
  }

  search(text: string): PatternEntry[] {
    const terms = text.toLowerCase().split(/\s+/).filter((term) => term.length > 0);
    return this.entries.filter((entry) => {
      const haystack = [entry.name, ...entry.aliases, entry.overview, entry.intent]
        .join(" ")
        .toLowerCase();
      return terms.every((term) => haystack.includes(term));
    });
  }

  run(id: PatternId): string[] {
    const entry = this.get(id);
    const lines: string[] = [];
    try {
      this.demos[entry.id]((line) => lines.push(line));
    } catch (error) {
      throw new CatalogError(
        `Demo for ${entry.name} failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.DEMO_FAILED,
        { patternId: id }
      );
    }
    logger.debug({ patternId: id, lines: lines.length }, "Demo finished");
    return lines;
  }

  snippet(id: PatternId): string {
    const entry = this.get(id);
    try {
      return fs.readFileSync(entry.examplePath, "utf-8");
    } catch (error) {
      throw new CatalogError(`Snippet for ${entry.name} not found at ${entry.examplePath}`, ErrorCode.SNIPPET_NOT_FOUND, {
        patternId: id,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  categories(): CategorySummary[] {
    return PATTERN_CATEGORIES.map((category) => ({
      category,
      count: this.entries.filter((entry) => entry.category === category).length,
    }));
  }

  private suggest(key: string): string[] {
    if (key.length === 0) return [];
    return this.entries
      .filter((entry) => {
        const candidates = [entry.id, slugify(entry.name)];
        return candidates.some((candidate) => candidate.includes(key) || key.includes(candidate));
      })
      .slice(0, MAX_SUGGESTIONS)
      .map((entry) => entry.id);
  }
}

/**
 * Load and validate the catalogue.
 *
 * @throws CatalogError when the file is missing or invalid
 */
export function loadCatalog(options: CatalogOptions = {}): PatternCatalog {
  const catalogPath = options.catalogPath ?? getDefaultCatalogPath();
  const examplesDir = options.examplesDir ?? getDefaultExamplesDir();

  if (!fs.existsSync(catalogPath)) {
    throw new CatalogError(`Catalogue not found at ${catalogPath}`, ErrorCode.CATALOG_NOT_FOUND, {
      catalogPath,
    });
  }

  let data: unknown;
  try {
    data = readJson(catalogPath);
  } catch (error) {
    throw new CatalogError(`Catalogue at ${catalogPath} is not valid JSON`, ErrorCode.CATALOG_INVALID, {
      catalogPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const result = safeValidate(CatalogFileSchema, data);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new CatalogError(`Invalid catalogue: ${issues.join("; ")}`, ErrorCode.CATALOG_INVALID, {
      catalogPath,
      issues,
    });
  }

  const seenIds = new Set<string>();
  // Every lookup key (id, name, alias) maps to the entry that owns it
  const seenNames = new Map<string, string>(
    result.data.patterns.map((record) => [slugify(record.id), record.id])
  );
  const entries: PatternEntry[] = [];

  for (const record of result.data.patterns) {
    if (seenIds.has(record.id)) {
      throw new CatalogError(`Duplicate pattern id "${record.id}"`, ErrorCode.CATALOG_INVALID, {
        catalogPath,
        patternId: record.id,
      });
    }
    seenIds.add(record.id);

    for (const name of [record.name, ...record.aliases]) {
      const key = slugify(name);
      const owner = seenNames.get(key);
      if (owner !== undefined && owner !== record.id) {
        throw new CatalogError(
          `Name "${name}" of ${record.id} is already used by ${owner}`,
          ErrorCode.CATALOG_INVALID,
          { catalogPath, patternId: record.id }
        );
      }
      seenNames.set(key, record.id);
    }

    const [directory] = record.example.split("/");
    if (directory !== record.category) {
      throw new CatalogError(
        `Example ${record.example} of ${record.id} is outside the ${record.category} directory`,
        ErrorCode.CATALOG_INVALID,
        { catalogPath, patternId: record.id }
      );
    }

    entries.push({
      ...record,
      examplePath: path.join(examplesDir, record.example),
    });
  }

  logger.debug({ catalogPath, patterns: entries.length }, "Catalogue loaded");
  return new PatternCatalog(entries, options.demos);
}
