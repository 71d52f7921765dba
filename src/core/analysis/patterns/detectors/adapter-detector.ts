/**
 * Adapter Pattern Detector
 *
 * Detects Adapter design pattern instances: a class that conforms to a target
 * type while wrapping an adaptee of an unrelated type and translating calls.
 *
 * Heuristics:
 * - Name contains "Adapter"
 * - Holds an adaptee that is not one of its own supertypes
 * - Extends or implements the target
 * - Methods call into the adaptee
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

const ADAPTER_CLASS_PATTERNS = ["Adapter", "Adaptor"];

/**
 * Detector for Adapter design pattern.
 */
export class AdapterDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "adapter";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "adapter-naming",
        patternType: "adapter",
        weight: 0.25,
        description: "Class name contains Adapter",
      },
      {
        name: "wraps-foreign-type",
        patternType: "adapter",
        weight: 0.35,
        description: "Holds an adaptee whose type is unrelated to the target",
      },
      {
        name: "conforms-to-target",
        patternType: "adapter",
        weight: 0.25,
        description: "Extends or implements the target type",
      },
      {
        name: "delegates-to-adaptee",
        patternType: "adapter",
        weight: 0.15,
        description: "Methods call into the adaptee",
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
      const pattern = this.detectAdapter(cls, context);
      if (this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectAdapter(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern {
    const evidence: string[] = [];
    const signals: HeuristicSignal[] = [];

    const hasAdapterName = ADAPTER_CLASS_PATTERNS.some((pattern) => cls.name.includes(pattern));
    signals.push({ weight: 0.25, matched: hasAdapterName });
    if (hasAdapterName) {
      evidence.push(`Class name "${cls.name}" suggests adapter pattern`);
    }

    const targets = [cls.extendsClass, ...cls.implementsInterfaces].filter(
      (name): name is string => name !== undefined
    );
    const hasTarget = targets.length > 0;

    // The adaptee only counts when there is a target to adapt it to
    const ancestry = this.getAncestry(cls, context);
    const adaptee = hasTarget
      ? this.getReferenceFields(cls).find(
          (f) =>
            !ancestry.has(f.typeName) &&
            (this.findClass(context, f.typeName) !== undefined ||
              this.findInterface(context, f.typeName) !== undefined)
        )
      : undefined;
    signals.push({ weight: 0.35, matched: adaptee !== undefined });
    if (adaptee) {
      evidence.push(`Wraps adaptee "${adaptee.field.name}: ${adaptee.typeName}"`);
    }

    signals.push({ weight: 0.25, matched: hasTarget });
    if (hasTarget) {
      evidence.push(`Conforms to target: ${targets.join(", ")}`);
    }

    const delegates = adaptee !== undefined && this.delegatesTo(cls, adaptee.field.name);
    signals.push({ weight: 0.15, matched: delegates });
    if (delegates) {
      evidence.push("Methods translate calls to the adaptee");
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("adapter", cls, ["Adapter translating between target and adaptee"]),
    ];

    for (const target of targets) {
      const participant = this.typeParticipant("target", target, context, ["Interface clients expect"]);
      if (participant) participants.push(participant);
    }

    if (adaptee) {
      const participant = this.typeParticipant("adaptee", adaptee.typeName, context, [
        "Existing type with an incompatible interface",
      ]);
      if (participant) participants.push(participant);
    }

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Adapter "${cls.name}" makes ${adaptee?.typeName ?? "an existing type"} usable as ${targets.join(", ") || "the target"}`,
    });
  }
}

/**
 * Create an adapter pattern detector.
 */
export function createAdapterDetector(): AdapterDetector {
  return new AdapterDetector();
}
