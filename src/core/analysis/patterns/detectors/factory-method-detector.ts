/**
 * Factory Method Pattern Detector
 *
 * Detects Factory Method design pattern instances:
 * - A creator class declaring a creation method
 * - Subclasses overriding it to instantiate concrete products
 * - Creator logic calling the creation method instead of `new`
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
} from "../interfaces.js";

/**
 * Detector for Factory Method design pattern.
 */
export class FactoryMethodDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "factory-method";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "abstract-creation-method",
        patternType: "factory-method",
        weight: 0.4,
        description: "Creator declares an abstract create*/make* method",
      },
      {
        name: "overridden-with-new",
        patternType: "factory-method",
        weight: 0.3,
        description: "Subclasses override the method and instantiate a product",
      },
      {
        name: "used-by-creator",
        patternType: "factory-method",
        weight: 0.3,
        description: "Other creator methods call the factory method",
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
      const pattern = this.detectFactoryMethod(cls, context);
      if (pattern && this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectFactoryMethod(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern | null {
    const subclasses = this.findSubclasses(context, cls.name);

    // Creation methods that are abstract or that some subclass overrides
    const candidates = cls.methods.filter(
      (m) =>
        !m.isStatic &&
        this.isCreationName(m.name) &&
        (m.isAbstract || subclasses.some((s) => s.methods.some((sm) => sm.name === m.name)))
    );
    const factoryMethod = candidates.find((m) => m.isAbstract) ?? candidates[0];
    if (!factoryMethod) {
      return null;
    }

    const evidence: string[] = [];
    const signals: HeuristicSignal[] = [];

    signals.push({ weight: 0.4, matched: factoryMethod.isAbstract });
    evidence.push(
      factoryMethod.isAbstract
        ? `Declares abstract factory method "${factoryMethod.name}"`
        : `Declares overridable factory method "${factoryMethod.name}"`
    );

    const overrides = this.findOverrides(subclasses, factoryMethod);
    signals.push({ weight: 0.3, matched: overrides.length > 0 });
    if (overrides.length > 0) {
      evidence.push(`Overridden by ${overrides.map((o) => o.creator.name).join(", ")}`);
    }

    const calledByCreator = cls.methods.some(
      (m) => m.name !== factoryMethod.name && (m.body ?? "").includes(`this.${factoryMethod.name}(`)
    );
    signals.push({ weight: 0.3, matched: calledByCreator });
    if (calledByCreator) {
      evidence.push(`Creator logic calls this.${factoryMethod.name}()`);
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("creator", cls, [`Declares ${factoryMethod.name}()`]),
      ...overrides.map((o) =>
        this.classParticipant("concrete_creator", o.creator, [`Overrides ${factoryMethod.name}()`])
      ),
    ];

    const productType = this.typeNames(factoryMethod.returnType).find(
      (name) => this.findClass(context, name) !== undefined || this.findInterface(context, name) !== undefined
    );
    if (productType) {
      const product = this.typeParticipant("product", productType, context, ["Type the factory method returns"]);
      if (product) participants.push(product);
    }

    const concreteProducts = new Set(overrides.flatMap((o) => o.instantiated));
    for (const name of concreteProducts) {
      const product = this.findClass(context, name);
      if (product) {
        participants.push(this.classParticipant("concrete_product", product, ["Instantiated by a concrete creator"]));
      }
    }

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Factory method "${cls.name}.${factoryMethod.name}" lets subclasses choose the product`,
    });
  }

  /**
   * Subclasses overriding the method with a body that instantiates something,
   * with the class names they instantiate.
   */
  private findOverrides(
    subclasses: ClassInfo[],
    factoryMethod: MethodInfo
  ): Array<{ creator: ClassInfo; instantiated: string[] }> {
    const overrides: Array<{ creator: ClassInfo; instantiated: string[] }> = [];
    for (const creator of subclasses) {
      const override = creator.methods.find((m) => m.name === factoryMethod.name && !m.isAbstract);
      const body = override?.body ?? "";
      if (!body.includes("new ")) continue;
      const instantiated = [...body.matchAll(/\bnew\s+([A-Za-z_$][\w$]*)/g)]
        .map((match) => match[1])
        .filter((name): name is string => name !== undefined);
      overrides.push({ creator, instantiated });
    }
    return overrides;
  }
}

/**
 * Create a factory method pattern detector.
 */
export function createFactoryMethodDetector(): FactoryMethodDetector {
  return new FactoryMethodDetector();
}
