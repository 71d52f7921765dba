/**
 * Pattern Catalogue Interfaces
 *
 * @module
 */

import type { PatternCategory, PatternId, Result } from "../../types/index.js";
import type { CatalogError } from "../errors.js";
import type { Demo } from "./examples/index.js";

/**
 * A role played by a class or object in a pattern.
 */
export interface PatternParticipantRole {
  role: string;
  description: string;
}

/**
 * One catalogued pattern.
 */
export interface PatternEntry {
  id: PatternId;
  name: string;
  category: PatternCategory;
  aliases: string[];
  /** One-paragraph prose overview */
  overview: string;
  /** One-sentence statement of intent */
  intent: string;
  participants: PatternParticipantRole[];
  /** Snippet path relative to the examples directory */
  example: string;
  /** Absolute snippet path */
  examplePath: string;
}

export interface CatalogFilter {
  category?: PatternCategory;
}

export interface CategorySummary {
  category: PatternCategory;
  count: number;
}

export interface CatalogOptions {
  /** Path of the catalogue JSON (default: catalog/patterns.json in the package) */
  catalogPath?: string;
  /** Directory holding the snippets (default: the package's examples directory) */
  examplesDir?: string;
  /** Demo runners keyed by pattern id (default: the bundled examples) */
  demos?: Readonly<Record<PatternId, Demo>>;
}

/**
 * Read-only access to the catalogue.
 */
export interface IPatternCatalog {
  /** Entries in catalogue order */
  list(filter?: CatalogFilter): PatternEntry[];

  /**
   * Entry by exact id.
   *
   * @throws CatalogError when the id is not catalogued
   */
  get(id: string): PatternEntry;

  /** Lookup by id, name or alias, ignoring case and separators */
  resolve(query: string): Result<PatternEntry, CatalogError>;

  /** Entries whose text contains every whitespace-separated term */
  search(text: string): PatternEntry[];

  /** Run the entry's demo and return the printed lines */
  run(id: PatternId): string[];

  /** Snippet source text */
  snippet(id: PatternId): string;

  categories(): CategorySummary[];
}

// =============================================================================
// Verification
// =============================================================================

export interface VerificationChecks {
  /** The snippet file exists and is readable */
  snippet: boolean;
  /** The snippet imports nothing */
  selfContained: boolean;
  /** The demo runs and prints at least one line */
  demo: boolean;
  /** The detectors recognise the entry's own pattern in the snippet */
  detected: boolean;
}

export interface EntryVerification {
  id: PatternId;
  ok: boolean;
  checks: VerificationChecks;
  /** Best confidence of the entry's own pattern, 0 when not detected */
  confidence: number;
  problems: string[];
}

export interface CatalogVerification {
  ok: boolean;
  entries: EntryVerification[];
}
