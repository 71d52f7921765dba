/**
 * Shared types for pattern-atlas
 */

// =============================================================================
// Pattern Identity
// =============================================================================

/**
 * Identifiers of the catalogued design patterns, in catalogue order.
 */
export const PATTERN_IDS = [
  "singleton",
  "factory-method",
  "abstract-factory",
  "builder",
  "prototype",
  "adapter",
  "bridge",
  "composite",
  "decorator",
  "facade",
  "flyweight",
  "proxy",
] as const;

export type PatternId = (typeof PATTERN_IDS)[number];

/**
 * Pattern families covered by the catalogue
 */
export const PATTERN_CATEGORIES = ["creational", "structural"] as const;

export type PatternCategory = (typeof PATTERN_CATEGORIES)[number];

/**
 * Type guard for catalogue pattern ids
 */
export function isPatternId(value: string): value is PatternId {
  return PATTERN_IDS.some((id) => id === value);
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Reference document rendering settings
 */
export interface ReferenceConfig {
  /** Title of the rendered document */
  title: string;
  /** One-line description printed under the title */
  description: string;
  /** Path of the reference document, relative to the project root */
  output: string;
  /** Heading level of a pattern section */
  sectionLevel: number;
  /** Whether to render each demo's printed output */
  includeOutput: boolean;
}

/**
 * Reference linting settings
 */
export interface LintConfig {
  requireLanguageTag: boolean;
  requireAllPatterns: boolean;
  ignoreRules: string[];
}

/**
 * Pattern detection settings
 */
export interface DetectionConfig {
  /** Minimum confidence threshold (0.0 - 1.0) */
  minConfidence: number;
  patternTypes: PatternId[];
  /** Glob patterns for source files */
  include: string[];
  /** Glob patterns to exclude */
  ignore: string[];
}

/**
 * Project configuration stored in .pattern-atlas/config.json
 */
export interface AtlasConfig {
  reference: ReferenceConfig;
  lint: LintConfig;
  detection: DetectionConfig;
}

export * from "./result.js";
