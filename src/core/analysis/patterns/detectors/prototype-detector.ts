/**
 * Prototype Pattern Detector
 *
 * Detects Prototype design pattern instances: classes that create new
 * objects by copying themselves through a clone method.
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

const CLONE_METHOD_NAMES = ["clone", "copy", "duplicate"];

const PROTOTYPE_TYPE_PATTERN = /Prototype|Cloneable|Clonable/;

/**
 * Detector for Prototype design pattern.
 */
export class PrototypeDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "prototype";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "clone-method",
        patternType: "prototype",
        weight: 0.4,
        description: "Has a clone(), copy() or duplicate() instance method",
      },
      {
        name: "copies-receiver",
        patternType: "prototype",
        weight: 0.3,
        description: "The clone builds a new object from its own state",
      },
      {
        name: "prototype-contract",
        patternType: "prototype",
        weight: 0.2,
        description: "Implements a Prototype/Cloneable type or inherits a clone method",
      },
      {
        name: "clients-clone",
        patternType: "prototype",
        weight: 0.1,
        description: "Another class obtains objects by cloning",
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
      const pattern = this.detectPrototype(cls, context);
      if (pattern && this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectPrototype(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern | null {
    const cloneMethod = cls.methods.find((m) => !m.isStatic && this.isCloneMethod(m));
    if (!cloneMethod) {
      return null;
    }

    const evidence: string[] = [`Has clone method "${cloneMethod.name}"`];
    const signals: HeuristicSignal[] = [{ weight: 0.4, matched: true }];

    const body = cloneMethod.body ?? "";
    const copiesReceiver =
      body.includes(`new ${cls.name}(`) ||
      body.includes("Object.create(") ||
      body.includes("structuredClone(") ||
      body.includes("...this") ||
      body.includes("Object.assign(");
    signals.push({ weight: 0.3, matched: copiesReceiver });
    if (copiesReceiver) {
      evidence.push("Clone copies the receiver's state into a new object");
    }

    const ancestry = this.getAncestry(cls, context);
    const contract = [...ancestry].find(
      (name) =>
        PROTOTYPE_TYPE_PATTERN.test(name) ||
        (this.findClass(context, name)?.methods.some((m) => this.isCloneMethod(m)) ?? false) ||
        (this.findInterface(context, name)?.methods.some((m) => this.isCloneMethod(m)) ?? false)
    );
    signals.push({ weight: 0.2, matched: contract !== undefined });
    if (contract) {
      evidence.push(`Clone contract from ${contract}`);
    }

    const clients = context.classes.filter(
      (c) => c.id !== cls.id && !ancestry.has(c.name) && this.classBody(c).includes(`.${cloneMethod.name}(`)
    );
    signals.push({ weight: 0.1, matched: clients.length > 0 });
    if (clients.length > 0) {
      evidence.push(`Cloned by ${clients.map((c) => c.name).join(", ")}`);
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("prototype", cls, ["Object that can copy itself"]),
      ...clients.map((c) => this.classParticipant("prototype_registry", c, ["Produces objects by cloning"])),
    ];

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Prototype "${cls.name}" creates copies of itself through ${cloneMethod.name}()`,
    });
  }

  private isCloneMethod(method: { name: string }): boolean {
    return CLONE_METHOD_NAMES.includes(method.name.toLowerCase());
  }
}

/**
 * Create a prototype pattern detector.
 */
export function createPrototypeDetector(): PrototypeDetector {
  return new PrototypeDetector();
}
