/**
 * Builder Pattern Detector
 *
 * A builder accumulates state through chainable steps and hands out the
 * finished product from a final build method. Directors are classes that
 * take the builder as a parameter.
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
  ParameterInfo,
} from "../interfaces.js";

const BUILD_NAMES = ["build", "getresult", "getproduct", "assemble", "finish"];

/**
 * Detector for Builder design pattern.
 */
export class BuilderDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "builder";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "chainable-steps",
        patternType: "builder",
        weight: 0.35,
        description: "Two or more methods return the builder itself",
      },
      {
        name: "steps-record-state",
        patternType: "builder",
        weight: 0.15,
        description: "Every chainable step writes to the builder's fields",
      },
      {
        name: "build-method",
        patternType: "builder",
        weight: 0.3,
        description: "A final method returns a different type, the product",
      },
      {
        name: "builder-naming",
        patternType: "builder",
        weight: 0.2,
        description: "Class name ends with Builder",
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
      const pattern = this.score(cls, context);
      if (pattern && this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }
    return patterns;
  }

  private score(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern | null {
    const steps = cls.methods.filter((m) => !m.isStatic && this.returnsSelf(m, cls));
    if (steps.length === 0) return null;

    const chainable = steps.length >= 2;
    const recordsState = chainable && steps.every((m) => /\bthis\.[\w$]+\s*(?:=[^=]|\.push\()/.test(m.body ?? ""));
    const build = this.findBuildMethod(cls, steps, context);
    const named = cls.name.endsWith("Builder");

    const signals: HeuristicSignal[] = [
      { weight: 0.35, matched: chainable },
      { weight: 0.15, matched: recordsState },
      { weight: 0.3, matched: build !== undefined },
      { weight: 0.2, matched: named },
    ];

    const evidence: string[] = [`Chainable steps: ${steps.map((m) => m.name).join(", ")}`];
    if (recordsState) evidence.push("Each step records state on the builder");
    if (build) evidence.push(`${build.method.name}() returns ${build.product}`);

    const participants: PatternParticipant[] = [
      this.classParticipant("builder", cls, ["Collects construction steps"]),
    ];
    if (build) {
      const product = this.typeParticipant("built_product", build.product, context, [
        `Returned by ${cls.name}.${build.method.name}()`,
      ]);
      if (product) participants.push(product);
    }

    const directors = this.findDirectors(cls, context);
    for (const director of directors) {
      participants.push(
        this.classParticipant("director", director, [`Drives ${cls.name} through a construction sequence`])
      );
    }
    if (directors.length > 0) {
      evidence.push(`Directed by ${directors.map((d) => d.name).join(", ")}`);
    }

    return this.createPattern({
      name: cls.name,
      confidence: this.calculateWeightedConfidence(signals),
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Builder "${cls.name}" assembles ${build?.product ?? "an object"} step by step`,
    });
  }

  private returnsSelf(method: MethodInfo, cls: ClassInfo): boolean {
    const returnType = method.returnType?.trim();
    return returnType === "this" || this.singleReferenceName(returnType) === cls.name;
  }

  /**
   * A non-step method returning a known type that it either instantiates or
   * is conventionally named for.
   */
  private findBuildMethod(
    cls: ClassInfo,
    steps: MethodInfo[],
    context: PatternAnalysisContext
  ): { method: MethodInfo; product: string } | undefined {
    for (const method of cls.methods) {
      if (method.isStatic || steps.includes(method)) continue;
      // Unwraps generics such as Promise<House>
      const product = this.typeNames(method.returnType).find(
        (name) =>
          name !== cls.name &&
          (this.findClass(context, name) !== undefined || this.findInterface(context, name) !== undefined)
      );
      if (!product) continue;
      const body = method.body ?? "";
      if (BUILD_NAMES.includes(method.name.toLowerCase()) || body.includes(`new ${product}(`)) {
        return { method, product };
      }
    }
    return undefined;
  }

  private findDirectors(cls: ClassInfo, context: PatternAnalysisContext): ClassInfo[] {
    const mentionsBuilder = (params: ParameterInfo[]): boolean =>
      params.some((p) => this.typeNames(p.type).includes(cls.name));

    return context.classes.filter(
      (other) =>
        other.id !== cls.id &&
        (mentionsBuilder(other.constructorParams) || other.methods.some((m) => mentionsBuilder(m.parameters)))
    );
  }
}

/**
 * Create a builder pattern detector.
 */
export function createBuilderDetector(): BuilderDetector {
  return new BuilderDetector();
}
