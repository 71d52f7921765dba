/**
 * Facade Pattern Detector
 *
 * Detects Facade design pattern instances: a class with a small public
 * surface that coordinates several other classes of the same code.
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

const FACADE_CLASS_PATTERNS = ["Facade", "Gateway", "Converter", "Coordinator", "Orchestrator", "Manager"];

const MIN_SUBSYSTEMS = 3;
const MAX_PUBLIC_METHODS = 3;

/**
 * Detector for Facade design pattern.
 */
export class FacadeDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "facade";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "facade-naming",
        patternType: "facade",
        weight: 0.2,
        description: "Class name suggests a facade (Facade, Gateway, Converter)",
      },
      {
        name: "coordinates-subsystems",
        patternType: "facade",
        weight: 0.45,
        description: `Uses at least ${MIN_SUBSYSTEMS} other classes`,
      },
      {
        name: "small-surface",
        patternType: "facade",
        weight: 0.2,
        description: `At most ${MAX_PUBLIC_METHODS} public instance methods`,
      },
      {
        name: "standalone",
        patternType: "facade",
        weight: 0.15,
        description: "Neither extends nor implements anything",
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
      const pattern = this.detectFacade(cls, context);
      if (pattern && this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectFacade(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern | null {
    const subsystems = this.findSubsystems(cls, context);

    // Naming and size alone describe most small classes
    if (subsystems.length < MIN_SUBSYSTEMS) {
      return null;
    }

    const evidence: string[] = [`Coordinates ${subsystems.map((c) => c.name).join(", ")}`];
    const signals: HeuristicSignal[] = [];

    const hasFacadeName = FACADE_CLASS_PATTERNS.some((pattern) => cls.name.endsWith(pattern));
    signals.push({ weight: 0.2, matched: hasFacadeName });
    if (hasFacadeName) {
      evidence.push(`Class name "${cls.name}" suggests facade pattern`);
    }

    signals.push({ weight: 0.45, matched: true });

    const publicMethods = cls.methods.filter((m) => m.isPublic && !m.isStatic);
    const smallSurface = publicMethods.length >= 1 && publicMethods.length <= MAX_PUBLIC_METHODS;
    signals.push({ weight: 0.2, matched: smallSurface });
    if (smallSurface) {
      evidence.push(`Small public surface: ${publicMethods.map((m) => m.name).join(", ")}`);
    }

    const standalone = cls.extendsClass === undefined && cls.implementsInterfaces.length === 0;
    signals.push({ weight: 0.15, matched: standalone });
    if (standalone) {
      evidence.push("Not part of a type hierarchy");
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("facade", cls, ["Simplified entry point"]),
      ...subsystems.map((c) => this.classParticipant("subsystem", c, [`Used by ${cls.name}`])),
    ];

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Facade "${cls.name}" hides ${subsystems.length} subsystem classes behind one interface`,
    });
  }

  /**
   * Other context classes the class mentions in its bodies or member types,
   * excluding its own supertypes.
   */
  private findSubsystems(cls: ClassInfo, context: PatternAnalysisContext): ClassInfo[] {
    const ancestry = this.getAncestry(cls, context);
    const memberTypes = [
      ...this.getFields(cls).map((f) => f.type ?? ""),
      ...cls.methods.flatMap((m) => m.parameters.map((p) => p.type ?? "")),
    ];
    const mentioned = new Set([
      ...this.typeNames(this.classBody(cls)),
      ...memberTypes.flatMap((t) => this.typeNames(t)),
    ]);

    const seen = new Set<string>();
    return context.classes.filter((c) => {
      if (c.id === cls.id || ancestry.has(c.name) || !mentioned.has(c.name) || seen.has(c.name)) {
        return false;
      }
      seen.add(c.name);
      return true;
    });
  }
}

/**
 * Create a facade pattern detector.
 */
export function createFacadeDetector(): FacadeDetector {
  return new FacadeDetector();
}
