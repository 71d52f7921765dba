/**
 * Reference Linter
 *
 * Checks that every pattern section of a reference document carries a name,
 * an overview paragraph and a code block, and optionally that the sections
 * match the catalogue.
 *
 * @module
 */

import * as fs from "node:fs";
import type { PatternId } from "../../types/index.js";
import { createLogger, slugify } from "../../utils/index.js";
import { DocumentationError, ErrorCode } from "../errors.js";
import type { LintIssue, LintOptions, LintResult, LintRule, LintSeverity } from "./interfaces.js";
import { parseReference } from "./parser.js";

const logger = createLogger("linter");

const SEVERITIES: Record<LintRule, LintSeverity> = {
  "section-name": "error",
  "section-overview": "error",
  "section-code-block": "error",
  "code-block-language": "warning",
  "unterminated-fence": "error",
  "duplicate-section": "error",
  "unknown-pattern": "warning",
  "missing-pattern": "warning",
  "no-sections": "error",
};

/**
 * Lint a reference document held in memory.
 */
export function lintReference(markdown: string, options: LintOptions = {}): LintResult {
  const {
    sectionLevel = 3,
    requireLanguageTag = true,
    requireAllPatterns = true,
    ignoreRules = [],
    catalog,
  } = options;

  const parsed = parseReference(markdown, { sectionLevel });
  const issues: LintIssue[] = [];

  const report = (rule: LintRule, line: number, message: string, section?: string): void => {
    if (ignoreRules.includes(rule)) return;
    issues.push({
      rule,
      severity: SEVERITIES[rule],
      line,
      ...(section !== undefined ? { section } : {}),
      message,
    });
  };

  if (parsed.sections.length === 0) {
    report("no-sections", 1, `No level-${sectionLevel} sections found`);
  }

  const seen = new Map<string, number>();
  const covered = new Set<PatternId>();

  for (const section of parsed.sections) {
    const label = section.name || `(line ${section.line})`;

    if (section.name.length === 0) {
      report("section-name", section.line, "Section heading has no name");
    }
    if (section.overview === null) {
      report("section-overview", section.line, `${label} has no overview paragraph`, section.name);
    }
    if (section.codeBlocks.length === 0) {
      report("section-code-block", section.line, `${label} has no code block`, section.name);
    }
    if (requireLanguageTag) {
      for (const block of section.codeBlocks) {
        if (block.language.length === 0) {
          report("code-block-language", block.line, `Code block in ${label} has no language tag`, section.name);
        }
      }
    }

    const key = slugify(section.name);
    if (key.length > 0) {
      const firstLine = seen.get(key);
      if (firstLine !== undefined) {
        report(
          "duplicate-section",
          section.line,
          `${section.name} is already described at line ${firstLine}`,
          section.name
        );
      } else {
        seen.set(key, section.line);
      }
    }

    if (catalog && section.name.length > 0) {
      const resolved = catalog.resolve(section.name);
      if (resolved.ok) {
        covered.add(resolved.value.id);
      } else {
        report("unknown-pattern", section.line, `${section.name} is not a catalogued pattern`, section.name);
      }
    }
  }

  if (parsed.unterminatedFence) {
    const { line, section } = parsed.unterminatedFence;
    report("unterminated-fence", line, `Code block opened at line ${line} is never closed`, section);
  }

  if (catalog && requireAllPatterns) {
    for (const entry of catalog.list()) {
      if (!covered.has(entry.id)) {
        report("missing-pattern", 1, `No section describes ${entry.name}`, entry.name);
      }
    }
  }

  issues.sort((a, b) => a.line - b.line || a.rule.localeCompare(b.rule));

  const errorCount = issues.filter((issue) => issue.severity === "error").length;
  logger.debug({ sections: parsed.sections.length, issues: issues.length }, "Reference linted");

  return {
    sections: parsed.sections,
    issues,
    errorCount,
    warningCount: issues.length - errorCount,
  };
}

/**
 * Lint a reference document on disk.
 *
 * @throws DocumentationError when the file cannot be read
 */
export function lintFile(filePath: string, options: LintOptions = {}): LintResult {
  let markdown: string;
  try {
    markdown = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new DocumentationError("Cannot read reference document", ErrorCode.REFERENCE_NOT_FOUND, {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return lintReference(markdown, options);
}

export function hasErrors(result: LintResult): boolean {
  return result.errorCount > 0;
}
