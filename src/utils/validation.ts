/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration and catalogue data at runtime.
 *
 * @module
 */

import { z } from "zod";
import { PATTERN_CATEGORIES, PATTERN_IDS, type AtlasConfig } from "../types/index.js";

// =============================================================================
// Configuration Schema
// =============================================================================

export const ReferenceConfigSchema = z.object({
  title: z.string().min(1).default("Design Pattern Reference"),
  description: z
    .string()
    .default("Creational and structural object-oriented design patterns, each with a runnable TypeScript example."),
  output: z.string().min(1).default("PATTERNS.md"),
  /** Level 1 is the title and level 2 the category headings */
  sectionLevel: z.number().int().min(3).max(6).default(3),
  includeOutput: z.boolean().default(true),
});

export const LintConfigSchema = z.object({
  requireLanguageTag: z.boolean().default(true),
  requireAllPatterns: z.boolean().default(true),
  ignoreRules: z.array(z.string()).default([]),
});

export const DetectionConfigSchema = z.object({
  minConfidence: z.number().min(0).max(1).default(0.5),
  patternTypes: z.array(z.enum(PATTERN_IDS)).default([...PATTERN_IDS]),
  include: z.array(z.string()).default(["**/*.ts", "**/*.tsx"]),
  ignore: z.array(z.string()).default(["**/dist/**", "**/*.d.ts"]),
});

/**
 * Project configuration schema; every field has a default, so `{}` is valid
 */
export const AtlasConfigSchema: z.ZodType<AtlasConfig, z.ZodTypeDef, unknown> = z.object({
  reference: ReferenceConfigSchema.default({}),
  lint: LintConfigSchema.default({}),
  detection: DetectionConfigSchema.default({}),
});

// =============================================================================
// Catalogue Schema
// =============================================================================

export const ParticipantSchema = z.object({
  role: z.string().min(1),
  description: z.string().min(1),
});

/**
 * One record of catalog/patterns.json
 */
export const PatternRecordSchema = z.object({
  id: z.enum(PATTERN_IDS),
  name: z.string().min(1),
  category: z.enum(PATTERN_CATEGORIES),
  aliases: z.array(z.string().min(1)).default([]),
  overview: z.string().min(1),
  intent: z.string().min(1),
  participants: z.array(ParticipantSchema).min(1),
  /** Snippet path relative to the examples directory */
  example: z.string().regex(/^[a-z-]+\/[a-z-]+\.ts$/, "must look like <category>/<id>.ts"),
});

export type PatternRecord = z.infer<typeof PatternRecordSchema>;

export const CatalogFileSchema = z.object({
  version: z.number().int().positive(),
  patterns: z.array(PatternRecordSchema).min(1),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
