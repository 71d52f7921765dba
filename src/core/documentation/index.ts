/**
 * Reference Documentation Module
 *
 * Renders the catalogue as markdown and lints reference documents.
 *
 * @module
 */

export type {
  RenderOptions,
  CodeBlock,
  ReferenceSection,
  ParsedReference,
  ParseOptions,
  LintRule,
  LintSeverity,
  LintIssue,
  LintOptions,
  LintResult,
} from "./interfaces.js";

export { renderReference, DEFAULT_RENDER_OPTIONS } from "./renderer.js";
export { parseReference, assertSectionLevel } from "./parser.js";
export { lintReference, lintFile, hasErrors } from "./linter.js";
