/**
 * Catalogue Verification
 *
 * Checks that every entry's snippet exists, imports nothing, runs, and
 * actually exhibits the pattern it illustrates.
 *
 * @module
 */

import type { IPatternAnalysisService } from "../analysis/patterns/interfaces.js";
import { createLogger } from "../../utils/index.js";
import type {
  CatalogVerification,
  EntryVerification,
  IPatternCatalog,
  PatternEntry,
} from "./interfaces.js";

const logger = createLogger("verifier");

const IMPORT_PATTERNS = [
  /^\s*import[\s{*"']/m,
  /^\s*export\s[^;]*?\bfrom\s*["']/m,
  /\bimport\s*\(/,
  /\brequire\s*\(/,
];

/**
 * Whether source text contains an import, re-export, dynamic import or require.
 */
export function hasImports(source: string): boolean {
  return IMPORT_PATTERNS.some((pattern) => pattern.test(source));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function verifyEntry(
  entry: PatternEntry,
  catalog: IPatternCatalog,
  service: IPatternAnalysisService
): EntryVerification {
  const problems: string[] = [];
  const checks = { snippet: false, selfContained: false, demo: false, detected: false };
  let confidence = 0;

  let source: string | undefined;
  try {
    source = catalog.snippet(entry.id);
    checks.snippet = true;
  } catch (error) {
    problems.push(describe(error));
  }

  if (source !== undefined) {
    checks.selfContained = !hasImports(source);
    if (!checks.selfContained) {
      problems.push("Snippet imports other modules");
    }

    const result = service.analyzeSource(source, entry.examplePath);
    const own = result.patterns.filter((p) => p.patternType === entry.id);
    confidence = own.reduce((best, p) => Math.max(best, p.confidence), 0);
    checks.detected = own.length > 0;
    if (!checks.detected) {
      const found = [...new Set(result.patterns.map((p) => p.patternType))];
      problems.push(
        `${entry.name} not detected in snippet${found.length > 0 ? ` (found: ${found.join(", ")})` : ""}`
      );
    }
  }

  try {
    const lines = catalog.run(entry.id);
    checks.demo = lines.length > 0;
    if (!checks.demo) {
      problems.push("Demo printed nothing");
    }
  } catch (error) {
    problems.push(describe(error));
  }

  const ok = checks.snippet && checks.selfContained && checks.demo && checks.detected;
  logger.debug({ patternId: entry.id, ok, confidence }, "Entry verified");
  return { id: entry.id, ok, checks, confidence, problems };
}

/**
 * Verify every catalogue entry.
 */
export function verifyCatalog(
  catalog: IPatternCatalog,
  service: IPatternAnalysisService
): CatalogVerification {
  const entries = catalog.list().map((entry) => verifyEntry(entry, catalog, service));
  const ok = entries.every((entry) => entry.ok);
  if (!ok) {
    logger.warn(
      { failed: entries.filter((entry) => !entry.ok).map((entry) => entry.id) },
      "Catalogue verification failed"
    );
  }
  return { ok, entries };
}
