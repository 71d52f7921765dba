/**
 * Flyweight Pattern Detector
 *
 * Detects Flyweight design pattern instances: a factory that caches
 * immutable objects by key and hands out the shared instance, with context
 * objects holding a reference to it instead of copies of its state.
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
 * Detector for Flyweight design pattern.
 */
export class FlyweightDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "flyweight";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "caching-factory",
        patternType: "flyweight",
        weight: 0.4,
        description: "A method looks up a keyed cache and stores misses",
      },
      {
        name: "immutable-flyweight",
        patternType: "flyweight",
        weight: 0.3,
        description: "Cached objects only have readonly properties",
      },
      {
        name: "shared-by-contexts",
        patternType: "flyweight",
        weight: 0.3,
        description: "Other classes hold a reference to the cached type",
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
      const pattern = this.detectFlyweight(cls, context);
      if (pattern && this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectFlyweight(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern | null {
    const cache = this.findCache(cls, context);

    // Only caches of the code's own classes can hold flyweights
    if (!cache) {
      return null;
    }

    const { fieldName, flyweight } = cache;
    const evidence: string[] = [`Caches ${flyweight.name} instances in "${fieldName}"`];
    const signals: HeuristicSignal[] = [];

    const factoryMethods = cls.methods.filter(
      (m) => m.body?.includes(`${fieldName}.get(`) && m.body.includes(`${fieldName}.set(`)
    );
    signals.push({ weight: 0.4, matched: factoryMethods.length > 0 });
    if (factoryMethods.length > 0) {
      evidence.push(`Returns shared instances from ${factoryMethods.map((m) => m.name).join(", ")}`);
    }

    const immutable =
      flyweight.properties.length > 0 && flyweight.properties.every((p) => p.isReadonly);
    signals.push({ weight: 0.3, matched: immutable });
    if (immutable) {
      evidence.push(`${flyweight.name} state is readonly`);
    }

    const holders = context.classes.filter(
      (c) =>
        c.id !== cls.id &&
        c.id !== flyweight.id &&
        this.getReferenceFields(c).some((f) => f.typeName === flyweight.name)
    );
    signals.push({ weight: 0.3, matched: holders.length > 0 });
    if (holders.length > 0) {
      evidence.push(`Shared by ${holders.map((c) => c.name).join(", ")}`);
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("flyweight_factory", cls, ["Keyed cache of shared instances"]),
      this.classParticipant("flyweight", flyweight, ["Shared intrinsic state"]),
      ...holders.map((c) => this.classParticipant("flyweight_context", c, ["Holds extrinsic state"])),
    ];

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Flyweight factory "${cls.name}" shares ${flyweight.name} instances`,
    });
  }

  /**
   * A Map field, static or not, whose value type is a class of the context.
   */
  private findCache(
    cls: ClassInfo,
    context: PatternAnalysisContext
  ): { fieldName: string; flyweight: ClassInfo } | undefined {
    for (const prop of cls.properties) {
      const declared = prop.type ?? prop.defaultValue ?? "";
      const match = /\bMap\s*<\s*[^,<>]+,\s*([A-Za-z_$][\w$]*)\s*>/.exec(declared);
      const valueType = match?.[1];
      if (!valueType) continue;
      const flyweight = this.findClass(context, valueType);
      if (flyweight && flyweight.id !== cls.id) {
        return { fieldName: prop.name, flyweight };
      }
    }
    return undefined;
  }
}

/**
 * Create a flyweight pattern detector.
 */
export function createFlyweightDetector(): FlyweightDetector {
  return new FlyweightDetector();
}
