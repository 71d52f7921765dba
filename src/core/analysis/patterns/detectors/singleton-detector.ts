/**
 * Singleton Pattern Detector
 *
 * A class hides its constructor and hands out one lazily created instance
 * through a static accessor backed by a static field of its own type.
 *
 * @module
 */

import { BasePatternDetector } from "./base-detector.js";
import type {
  DesignPatternType,
  PatternHeuristic,
  DetectedPattern,
  PatternParticipant,
  PatternAnalysisContext,
  PatternDetectionOptions,
  HeuristicSignal,
  ClassInfo,
  MethodInfo,
  PropertyInfo,
} from "../interfaces.js";

const ACCESSOR_NAMES = ["getinstance", "instance", "shared", "sharedinstance", "default"];
const HOLDER_NAMES = ["instance", "_instance", "singleton", "_singleton", "shared"];

/** Lazy creation: a guard on the holder or a nullish assignment */
const LAZY_INIT = /\?\?=|if\s*\(\s*!|===?\s*(?:undefined|null)\b/;

/**
 * Detector for Singleton design pattern.
 */
export class SingletonDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "singleton";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "hidden-constructor",
        patternType: "singleton",
        weight: 0.35,
        description: "Constructor is private or protected",
      },
      {
        name: "static-accessor",
        patternType: "singleton",
        weight: 0.35,
        description: "Static method returning the class itself",
      },
      {
        name: "static-holder",
        patternType: "singleton",
        weight: 0.2,
        description: "Static field holding the instance",
      },
      {
        name: "lazy-creation",
        patternType: "singleton",
        weight: 0.1,
        description: "Accessor creates the instance on first use",
      },
    ];
  }

  detect(
    context: PatternAnalysisContext,
    options?: PatternDetectionOptions
  ): DetectedPattern[] {
    if (!this.isPatternTypeEnabled(options)) {
      return [];
    }

    return context.classes
      .filter((cls) => !cls.isAbstract)
      .map((cls) => this.score(cls))
      .filter((pattern) => this.meetsConfidenceThreshold(pattern.confidence, options));
  }

  private score(cls: ClassInfo): DetectedPattern {
    const accessor = this.findAccessor(cls);
    const holder = this.findHolder(cls);
    const lazy = accessor !== undefined && LAZY_INIT.test(accessor.body ?? "");

    const signals: HeuristicSignal[] = [
      { weight: 0.35, matched: cls.hasPrivateConstructor },
      { weight: 0.35, matched: accessor !== undefined },
      { weight: 0.2, matched: holder !== undefined },
      { weight: 0.1, matched: lazy },
    ];

    const evidence: string[] = [];
    if (cls.hasPrivateConstructor) evidence.push("Constructor is not public");
    if (accessor) evidence.push(`Static accessor ${cls.name}.${accessor.name}()`);
    if (holder) evidence.push(`Static field ${holder.name} holds the instance`);
    if (lazy) evidence.push("Instance is created on first access");

    const participants: PatternParticipant[] = [
      this.classParticipant("singleton", cls, ["Controls its own instantiation"]),
    ];
    if (holder) {
      participants.push({
        ...this.classParticipant("instance_holder", cls, ["Static field holding the instance"]),
        entityName: `${cls.name}.${holder.name}`,
      });
    }

    return this.createPattern({
      name: cls.name,
      confidence: this.calculateWeightedConfidence(signals),
      participants,
      evidence,
      filePaths: [cls.filePath],
      description: `Singleton "${cls.name}" keeps a single shared instance`,
    });
  }

  /**
   * A static method typed to return the class, or one with a conventional
   * accessor name.
   */
  private findAccessor(cls: ClassInfo): MethodInfo | undefined {
    const statics = cls.methods.filter((m) => m.isStatic);
    return (
      statics.find((m) => this.singleReferenceName(m.returnType) === cls.name) ??
      statics.find((m) => ACCESSOR_NAMES.includes(m.name.toLowerCase()))
    );
  }

  private findHolder(cls: ClassInfo): PropertyInfo | undefined {
    const statics = cls.properties.filter((p) => p.isStatic);
    return (
      statics.find((p) => this.singleReferenceName(p.type) === cls.name) ??
      statics.find((p) => HOLDER_NAMES.includes(p.name.toLowerCase()))
    );
  }
}

/**
 * Create a singleton pattern detector.
 */
export function createSingletonDetector(): SingletonDetector {
  return new SingletonDetector();
}
