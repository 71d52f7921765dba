/**
 * Design Pattern Detection Interfaces
 *
 * Interfaces for recognising the catalogued design patterns in TypeScript
 * source.
 *
 * Supported Patterns:
 * - Singleton: Private constructor, static getInstance, static instance field
 * - Factory Method: Abstract creation method overridden by subclasses
 * - Abstract Factory: Interface with several creation methods, concrete families
 * - Builder: Method chaining, build() method, fluent setters
 * - Prototype: clone() that copies the receiver
 * - Adapter: Conforms to a target while wrapping an unrelated adaptee
 * - Bridge: Abstraction holding an implementor with several implementations
 * - Composite: Collection of children typed as the shared component
 * - Decorator: Wraps the same interface, delegates with additions
 * - Facade: Simple entry point coordinating several subsystem classes
 * - Flyweight: Caching factory handing out shared immutable objects
 * - Proxy: Same interface as the wrapped subject, adds caching or access control
 *
 * @module
 */

import type { PatternId } from "../../../types/index.js";

// =============================================================================
// Pattern Types
// =============================================================================

/**
 * Types of design patterns that can be detected.
 */
export type DesignPatternType = PatternId;

/**
 * Roles that entities can play in a design pattern.
 */
export type PatternRole =
  // Singleton
  | "singleton"
  | "instance_holder"
  // Factory Method
  | "creator"
  | "concrete_creator"
  // Abstract Factory
  | "abstract_factory"
  | "concrete_factory"
  // Products of either factory pattern
  | "product"
  | "concrete_product"
  // Builder
  | "builder"
  | "director"
  | "built_product"
  // Prototype
  | "prototype"
  | "prototype_registry"
  // Adapter
  | "adapter"
  | "adaptee"
  | "target"
  // Bridge
  | "abstraction"
  | "refined_abstraction"
  | "implementor"
  | "concrete_implementor"
  // Composite
  | "composite"
  | "component"
  | "leaf"
  // Decorator
  | "decorator"
  | "decorated_component"
  // Facade
  | "facade"
  | "subsystem"
  // Flyweight
  | "flyweight"
  | "flyweight_factory"
  | "flyweight_context"
  // Proxy
  | "proxy"
  | "subject"
  | "real_subject";

/**
 * Confidence level for pattern detection.
 */
export type PatternConfidence = "high" | "medium" | "low";

// =============================================================================
// Pattern Detection Results
// =============================================================================

/**
 * A participant in a detected design pattern.
 */
export interface PatternParticipant {
  role: PatternRole;
  entityId: string;
  entityType: "class" | "function" | "interface";
  entityName: string;
  filePath: string;
  /** Why this entity is considered this role */
  evidence: string[];
}

/**
 * A detected design pattern instance.
 */
export interface DetectedPattern {
  id: string;
  patternType: DesignPatternType;
  /** Name of the primary participant */
  name: string;
  /** Confidence score (0.0 - 1.0) */
  confidence: number;
  confidenceLevel: PatternConfidence;
  /** Participants; the first one is the primary participant */
  participants: PatternParticipant[];
  evidence: string[];
  filePaths: string[];
  description?: string;
}

/**
 * Result of pattern analysis for a file or set of files.
 */
export interface PatternAnalysisResult {
  patterns: DetectedPattern[];
  stats: {
    totalPatterns: number;
    patternsByType: Record<DesignPatternType, number>;
    highConfidenceCount: number;
    mediumConfidenceCount: number;
    lowConfidenceCount: number;
    entitiesAnalyzed: number;
    analysisTimeMs: number;
  };
  /** Mean confidence of the reported patterns, 0 when none */
  confidence: number;
}

// =============================================================================
// Pattern Detection Heuristics
// =============================================================================

/**
 * Heuristic rule for detecting a pattern.
 */
export interface PatternHeuristic {
  name: string;
  patternType: DesignPatternType;
  /** Weight of this heuristic (0.0 - 1.0) */
  weight: number;
  description: string;
}

/**
 * One weighted signal evaluated for a candidate.
 */
export interface HeuristicSignal {
  weight: number;
  matched: boolean;
}

// =============================================================================
// Input Types
// =============================================================================

/**
 * Information about a class for pattern analysis.
 */
export interface ClassInfo {
  id: string;
  name: string;
  filePath: string;
  /** 1-based line of the declaration */
  line: number;
  methods: MethodInfo[];
  properties: PropertyInfo[];
  constructorParams: ParameterInfo[];
  extendsClass?: string;
  implementsInterfaces: string[];
  isAbstract: boolean;
  isExported: boolean;
  hasPrivateConstructor: boolean;
}

/**
 * Information about a method for pattern analysis.
 */
export interface MethodInfo {
  id: string;
  name: string;
  classId: string;
  parameters: ParameterInfo[];
  returnType?: string;
  isStatic: boolean;
  isAbstract: boolean;
  isPrivate: boolean;
  isPublic: boolean;
  /** Body text; absent for abstract methods */
  body?: string;
}

/**
 * Information about a property for pattern analysis.
 * Constructor parameter properties are included.
 */
export interface PropertyInfo {
  name: string;
  type?: string;
  isStatic: boolean;
  isPrivate: boolean;
  isReadonly: boolean;
  /** Initializer text */
  defaultValue?: string;
}

export interface ParameterInfo {
  name: string;
  type?: string;
  isOptional: boolean;
}

/**
 * Information about a top-level function for pattern analysis.
 */
export interface FunctionInfo {
  id: string;
  name: string;
  filePath: string;
  line: number;
  parameters: ParameterInfo[];
  returnType?: string;
  isExported: boolean;
  body?: string;
}

/**
 * Information about an interface for pattern analysis.
 */
export interface InterfaceInfo {
  id: string;
  name: string;
  filePath: string;
  line: number;
  methods: Array<{
    name: string;
    parameters: ParameterInfo[];
    returnType?: string;
  }>;
  properties: Array<{
    name: string;
    type?: string;
    isOptional: boolean;
  }>;
  extendsInterfaces: string[];
  isExported: boolean;
}

/**
 * Context for pattern analysis containing all relevant entities.
 */
export interface PatternAnalysisContext {
  classes: ClassInfo[];
  functions: FunctionInfo[];
  interfaces: InterfaceInfo[];
  /** File path being analyzed, when the context covers one file */
  filePath?: string;
}

// =============================================================================
// Detector Interfaces
// =============================================================================

/**
 * Options for pattern detection.
 */
export interface PatternDetectionOptions {
  /** Minimum confidence threshold (0.0 - 1.0) */
  minConfidence?: number;
  /** Pattern types to detect (default: all) */
  patternTypes?: DesignPatternType[];
}

/**
 * Interface for a single pattern detector.
 */
export interface IPatternDetector {
  readonly patternType: DesignPatternType;

  detect(
    context: PatternAnalysisContext,
    options?: PatternDetectionOptions
  ): DetectedPattern[];

  getHeuristics(): PatternHeuristic[];
}

/**
 * Interface for the pattern analysis service.
 */
export interface IPatternAnalysisService {
  /**
   * Analyze a context for all enabled design patterns.
   */
  analyze(
    context: PatternAnalysisContext,
    options?: PatternDetectionOptions
  ): PatternAnalysisResult;

  /**
   * Analyze TypeScript source text.
   */
  analyzeSource(
    source: string,
    filePath: string,
    options?: PatternDetectionOptions
  ): PatternAnalysisResult;

  /**
   * Read and analyze files as one merged context.
   */
  analyzeFiles(
    filePaths: string[],
    options?: PatternDetectionOptions
  ): Promise<PatternAnalysisResult>;

  /**
   * Register a custom pattern detector, replacing any detector of the same type.
   */
  registerDetector(detector: IPatternDetector): void;

  getDetectors(): IPatternDetector[];

  getDetector(patternType: DesignPatternType): IPatternDetector | undefined;
}
