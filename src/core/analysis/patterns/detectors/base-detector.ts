/**
 * Base Pattern Detector
 *
 * Provides common functionality for all pattern detectors.
 *
 * @module
 */

import type {
  IPatternDetector,
  DesignPatternType,
  PatternHeuristic,
  DetectedPattern,
  PatternParticipant,
  PatternRole,
  PatternAnalysisContext,
  PatternDetectionOptions,
  PatternConfidence,
  HeuristicSignal,
  ClassInfo,
  InterfaceInfo,
} from "../interfaces.js";

/** Candidates below this score are never reported, whatever the options say */
export const DETECTOR_FLOOR = 0.4;

export const DEFAULT_MIN_CONFIDENCE = 0.5;

/** Method name prefixes that mark a creation method */
const CREATION_PREFIXES = ["create", "make", "new", "produce", "build"];

const NON_REFERENCE_TYPES = new Set([
  "Array",
  "ReadonlyArray",
  "Set",
  "ReadonlySet",
  "Map",
  "ReadonlyMap",
  "WeakMap",
  "WeakSet",
  "Record",
  "Promise",
]);

/**
 * A class field that can hold a collaborator: declared properties and
 * constructor parameters.
 */
export interface FieldInfo {
  name: string;
  type?: string;
  isStatic: boolean;
}

/**
 * Base class for pattern detectors.
 * Provides common utility methods for pattern detection.
 */
export abstract class BasePatternDetector implements IPatternDetector {
  abstract readonly patternType: DesignPatternType;

  /**
   * Detect patterns in the given context.
   * Must be implemented by subclasses.
   */
  abstract detect(
    context: PatternAnalysisContext,
    options?: PatternDetectionOptions
  ): DetectedPattern[];

  /**
   * Get heuristics used by this detector.
   * Must be implemented by subclasses.
   */
  abstract getHeuristics(): PatternHeuristic[];

  // ==========================================================================
  // Results
  // ==========================================================================

  /**
   * Convert a numeric confidence score to a confidence level.
   */
  protected getConfidenceLevel(confidence: number): PatternConfidence {
    if (confidence >= 0.8) return "high";
    if (confidence >= 0.5) return "medium";
    return "low";
  }

  /**
   * Create a detected pattern instance. The id is derived from the pattern
   * type and the primary participant, so repeated runs agree.
   */
  protected createPattern(params: {
    name: string;
    confidence: number;
    participants: PatternParticipant[];
    evidence: string[];
    filePaths: string[];
    description?: string;
  }): DetectedPattern {
    const primary = params.participants[0]?.entityId ?? params.name;
    const confidence = Math.round(params.confidence * 1000) / 1000;
    return {
      id: `${this.patternType}:${primary}`,
      patternType: this.patternType,
      name: params.name,
      confidence,
      confidenceLevel: this.getConfidenceLevel(confidence),
      participants: params.participants,
      evidence: params.evidence,
      filePaths: [...new Set(params.filePaths)],
      description: params.description,
    };
  }

  protected classParticipant(role: PatternRole, cls: ClassInfo, evidence: string[]): PatternParticipant {
    return {
      role,
      entityId: cls.id,
      entityType: "class",
      entityName: cls.name,
      filePath: cls.filePath,
      evidence,
    };
  }

  protected interfaceParticipant(
    role: PatternRole,
    iface: InterfaceInfo,
    evidence: string[]
  ): PatternParticipant {
    return {
      role,
      entityId: iface.id,
      entityType: "interface",
      entityName: iface.name,
      filePath: iface.filePath,
      evidence,
    };
  }

  /**
   * Participant for a named type that may be a class or an interface.
   */
  protected typeParticipant(
    role: PatternRole,
    name: string,
    context: PatternAnalysisContext,
    evidence: string[]
  ): PatternParticipant | null {
    const cls = this.findClass(context, name);
    if (cls) return this.classParticipant(role, cls, evidence);
    const iface = this.findInterface(context, name);
    if (iface) return this.interfaceParticipant(role, iface, evidence);
    return null;
  }

  // ==========================================================================
  // Scoring
  // ==========================================================================

  /**
   * Calculate weighted confidence from multiple signals.
   */
  protected calculateWeightedConfidence(signals: HeuristicSignal[]): number {
    const totalWeight = signals.reduce((sum, s) => sum + s.weight, 0);
    const matchedWeight = signals
      .filter((s) => s.matched)
      .reduce((sum, s) => sum + s.weight, 0);
    return totalWeight > 0 ? matchedWeight / totalWeight : 0;
  }

  /**
   * Check if options allow this pattern type.
   */
  protected isPatternTypeEnabled(options?: PatternDetectionOptions): boolean {
    if (!options?.patternTypes) return true;
    return options.patternTypes.includes(this.patternType);
  }

  /**
   * Check if confidence meets the detector floor and the minimum threshold.
   */
  protected meetsConfidenceThreshold(
    confidence: number,
    options?: PatternDetectionOptions
  ): boolean {
    const minConfidence = options?.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    return confidence >= DETECTOR_FLOOR && confidence >= minConfidence;
  }

  // ==========================================================================
  // Names
  // ==========================================================================

  protected isCreationName(name: string): boolean {
    const lower = name.toLowerCase();
    return CREATION_PREFIXES.some((p) => lower.startsWith(p));
  }

  /**
   * Identifiers mentioned in a type annotation: `Map<string, TreeType>`
   * gives `Map`, `string` and `TreeType`.
   */
  protected typeNames(type: string | undefined): string[] {
    if (!type) return [];
    return type.match(/[A-Za-z_$][\w$]*/g) ?? [];
  }

  /**
   * The type name of a field holding exactly one object: `Coffee`,
   * `Repository<User>` and `Coffee | undefined` qualify; arrays, sets and
   * maps do not.
   */
  protected singleReferenceName(type: string | undefined): string | undefined {
    if (!type) return undefined;
    const match = /^([A-Za-z_$][\w$.]*)(?:<.*>)?(?:\s*\|\s*(?:undefined|null))*$/.exec(type.trim());
    const name = match?.[1];
    if (!name || NON_REFERENCE_TYPES.has(name)) return undefined;
    return name;
  }

  // ==========================================================================
  // Context Lookups
  // ==========================================================================

  protected findClass(context: PatternAnalysisContext, name: string): ClassInfo | undefined {
    return context.classes.find((c) => c.name === name);
  }

  protected findInterface(context: PatternAnalysisContext, name: string): InterfaceInfo | undefined {
    return context.interfaces.find((i) => i.name === name);
  }

  /**
   * Whether a name denotes an interface or an abstract class of the context.
   */
  protected isAbstractType(context: PatternAnalysisContext, name: string): boolean {
    if (this.findInterface(context, name)) return true;
    return this.findClass(context, name)?.isAbstract ?? false;
  }

  /**
   * Every supertype name of a class: its superclass chain, the interfaces
   * each of them implements, and the interfaces those extend.
   */
  protected getAncestry(cls: ClassInfo, context: PatternAnalysisContext): Set<string> {
    const ancestry = new Set<string>();
    const pending: string[] = [];
    const visitedClasses = new Set<string>([cls.name]);

    let current: ClassInfo | undefined = cls;
    while (current) {
      pending.push(...current.implementsInterfaces);
      const parent: string | undefined = current.extendsClass;
      if (!parent || visitedClasses.has(parent)) break;
      ancestry.add(parent);
      visitedClasses.add(parent);
      current = this.findClass(context, parent);
    }

    while (pending.length > 0) {
      const name = pending.pop();
      if (name === undefined || ancestry.has(name)) continue;
      ancestry.add(name);
      pending.push(...(this.findInterface(context, name)?.extendsInterfaces ?? []));
    }

    return ancestry;
  }

  /**
   * Classes other than `name` itself whose ancestry contains `name`.
   */
  protected findSubtypes(context: PatternAnalysisContext, name: string): ClassInfo[] {
    return context.classes.filter(
      (c) => c.name !== name && this.getAncestry(c, context).has(name)
    );
  }

  /**
   * Classes that directly extend the named class.
   */
  protected findSubclasses(context: PatternAnalysisContext, name: string): ClassInfo[] {
    return context.classes.filter((c) => c.extendsClass === name);
  }

  // ==========================================================================
  // Members
  // ==========================================================================

  /**
   * Instance and static fields, with constructor parameters that are not
   * already parameter properties.
   */
  protected getFields(cls: ClassInfo): FieldInfo[] {
    const fields: FieldInfo[] = cls.properties.map((p) => ({
      name: p.name,
      type: p.type,
      isStatic: p.isStatic,
    }));
    for (const param of cls.constructorParams) {
      if (!fields.some((f) => f.name === param.name)) {
        fields.push({ name: param.name, type: param.type, isStatic: false });
      }
    }
    return fields;
  }

  /**
   * Instance fields that hold a single object, with the held type's name.
   */
  protected getReferenceFields(cls: ClassInfo): Array<{ field: FieldInfo; typeName: string }> {
    const result: Array<{ field: FieldInfo; typeName: string }> = [];
    for (const field of this.getFields(cls)) {
      if (field.isStatic) continue;
      const typeName = this.singleReferenceName(field.type);
      if (typeName && typeName !== cls.name) result.push({ field, typeName });
    }
    return result;
  }

  /**
   * All method bodies of a class joined into one string.
   */
  protected classBody(cls: ClassInfo): string {
    return cls.methods.map((m) => m.body ?? "").join("\n");
  }

  /**
   * Whether some method forwards a call through the field (`this.inner.cost()`).
   */
  protected delegatesTo(cls: ClassInfo, fieldName: string): boolean {
    return this.classBody(cls).includes(`this.${fieldName}.`);
  }
}
