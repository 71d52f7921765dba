/**
 * Bridge Pattern Detector
 *
 * Detects Bridge design pattern instances: an abstraction hierarchy holding a
 * reference to a separate implementor hierarchy, so both vary independently.
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
} from "../interfaces.js";

/**
 * Detector for Bridge design pattern.
 */
export class BridgeDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "bridge";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "holds-implementor",
        patternType: "bridge",
        weight: 0.4,
        description: "Holds an interface or abstract type with several implementations it does not share",
      },
      {
        name: "refined-abstractions",
        patternType: "bridge",
        weight: 0.3,
        description: "The abstraction has subclasses",
      },
      {
        name: "delegates-to-implementor",
        patternType: "bridge",
        weight: 0.3,
        description: "The abstraction or its subclasses call through to the implementor",
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

    const patterns: DetectedPattern[] = [];

    for (const cls of context.classes) {
      const pattern = this.detectBridge(cls, context);
      if (pattern && this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectBridge(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern | null {
    const implementor = this.findImplementor(cls, context);

    // Without a separate implementor hierarchy there is nothing to bridge
    if (!implementor) {
      return null;
    }

    const evidence: string[] = [
      `Holds implementor "${implementor.fieldName}: ${implementor.typeName}" with ${implementor.implementations.length} implementations`,
    ];
    const signals: HeuristicSignal[] = [{ weight: 0.4, matched: true }];

    const refinements = this.findSubclasses(context, cls.name);
    signals.push({ weight: 0.3, matched: refinements.length > 0 });
    if (refinements.length > 0) {
      evidence.push(`Refined by ${refinements.map((c) => c.name).join(", ")}`);
    }

    const fieldName = implementor.fieldName;
    const delegates = [cls, ...refinements].some((c) => this.delegatesTo(c, fieldName));
    signals.push({ weight: 0.3, matched: delegates });
    if (delegates) {
      evidence.push("Abstraction delegates work to the implementor");
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("abstraction", cls, ["Abstraction holding the implementor"]),
      ...refinements.map((c) =>
        this.classParticipant("refined_abstraction", c, [`Extends ${cls.name}`])
      ),
    ];

    const implementorParticipant = this.typeParticipant("implementor", implementor.typeName, context, [
      "Implementation interface",
    ]);
    if (implementorParticipant) participants.push(implementorParticipant);

    participants.push(
      ...implementor.implementations.map((c) =>
        this.classParticipant("concrete_implementor", c, [`Implements ${implementor.typeName}`])
      )
    );

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Bridge between "${cls.name}" and "${implementor.typeName}" implementations`,
    });
  }

  /**
   * First held interface or abstract type, outside the class's own
   * supertypes, with at least two concrete implementations.
   */
  private findImplementor(
    cls: ClassInfo,
    context: PatternAnalysisContext
  ): { fieldName: string; typeName: string; implementations: ClassInfo[] } | undefined {
    const ancestry = this.getAncestry(cls, context);
    for (const { field, typeName } of this.getReferenceFields(cls)) {
      if (ancestry.has(typeName) || !this.isAbstractType(context, typeName)) continue;
      const implementations = this.findSubtypes(context, typeName).filter((c) => !c.isAbstract);
      if (implementations.length >= 2) {
        return { fieldName: field.name, typeName, implementations };
      }
    }
    return undefined;
  }
}

/**
 * Create a bridge pattern detector.
 */
export function createBridgeDetector(): BridgeDetector {
  return new BridgeDetector();
}
