/**
 * Design Pattern Detection Module
 *
 * Heuristic detection of the catalogued creational and structural design
 * patterns in TypeScript source.
 *
 * @module
 */

// =============================================================================
// Interfaces and Types
// =============================================================================

export type {
  // Pattern types
  DesignPatternType,
  PatternRole,
  PatternConfidence,
  // Detection results
  PatternParticipant,
  DetectedPattern,
  PatternAnalysisResult,
  // Heuristics
  PatternHeuristic,
  HeuristicSignal,
  // Input types
  ClassInfo,
  MethodInfo,
  PropertyInfo,
  ParameterInfo,
  FunctionInfo,
  InterfaceInfo,
  PatternAnalysisContext,
  // Options
  PatternDetectionOptions,
  // Interfaces
  IPatternDetector,
  IPatternAnalysisService,
} from "./interfaces.js";

// =============================================================================
// Detectors
// =============================================================================

export * from "./detectors/index.js";

// =============================================================================
// Service
// =============================================================================

export {
  PatternAnalysisService,
  createPatternAnalysisService,
} from "./service.js";

// =============================================================================
// Source Extraction
// =============================================================================

export { extractPatternContext, extractFileContext, mergeContexts } from "./source-extractor.js";
