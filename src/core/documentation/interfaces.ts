/**
 * Reference Document Interfaces
 *
 * Types shared by the markdown renderer, parser and linter.
 *
 * @module
 */

import type { IPatternCatalog } from "../catalog/interfaces.js";

// =============================================================================
// Rendering
// =============================================================================

export interface RenderOptions {
  title: string;
  description: string;
  /** Heading level of pattern sections (3-6; 1 and 2 are used by the document) */
  sectionLevel: number;
  /** Render each demo's printed output after its snippet */
  includeOutput: boolean;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * A fenced code block inside a section.
 */
export interface CodeBlock {
  /** First word of the fence info string; empty when absent */
  language: string;
  content: string;
  /** 1-based line of the opening fence */
  line: number;
}

/**
 * One pattern section of a reference document.
 */
export interface ReferenceSection {
  name: string;
  level: number;
  /** 1-based line of the heading */
  line: number;
  /** First paragraph of plain prose, or null when there is none */
  overview: string | null;
  codeBlocks: CodeBlock[];
}

export interface ParsedReference {
  sections: ReferenceSection[];
  /** Opening fence that is never closed */
  unterminatedFence: { line: number; section?: string } | null;
}

export interface ParseOptions {
  sectionLevel?: number;
}

// =============================================================================
// Linting
// =============================================================================

export type LintRule =
  | "section-name"
  | "section-overview"
  | "section-code-block"
  | "code-block-language"
  | "unterminated-fence"
  | "duplicate-section"
  | "unknown-pattern"
  | "missing-pattern"
  | "no-sections";

export type LintSeverity = "error" | "warning";

export interface LintIssue {
  rule: LintRule;
  severity: LintSeverity;
  /** 1-based line the issue refers to */
  line: number;
  section?: string;
  message: string;
}

export interface LintOptions {
  sectionLevel?: number;
  requireLanguageTag?: boolean;
  /** Report catalogue patterns without a section (needs `catalog`) */
  requireAllPatterns?: boolean;
  ignoreRules?: string[];
  /** Catalogue used to check section names */
  catalog?: IPatternCatalog;
}

export interface LintResult {
  sections: ReferenceSection[];
  issues: LintIssue[];
  errorCount: number;
  warningCount: number;
}
