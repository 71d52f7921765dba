/**
 * Decorator Pattern Detector
 *
 * Detects Decorator design pattern instances:
 * - Wrapper classes that extend functionality
 * - Same interface, delegates to wrapped object
 * - Adds behavior before/after delegation
 *
 * Heuristics:
 * - Holds a single component of one of its own supertypes
 * - Conforms to that supertype through extends or implements
 * - Methods delegate to wrapped object
 * - Name contains "Decorator", "Wrapper"
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

// Decorator naming patterns
const DECORATOR_CLASS_PATTERNS = ["Decorator", "Wrapper", "Enhancer", "Enricher", "Delegating"];

/**
 * Detector for Decorator design pattern.
 */
export class DecoratorDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "decorator";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "decorator-naming",
        patternType: "decorator",
        weight: 0.25,
        description: "Class name suggests decorator (Wrapper, Decorator)",
      },
      {
        name: "wraps-same-type",
        patternType: "decorator",
        weight: 0.35,
        description: "Holds a component of one of its own supertypes",
      },
      {
        name: "implements-same-interface",
        patternType: "decorator",
        weight: 0.25,
        description: "Implements same interface as wrapped component",
      },
      {
        name: "delegates-methods",
        patternType: "decorator",
        weight: 0.15,
        description: "Methods delegate to wrapped component",
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
      const pattern = this.detectDecorator(cls, context);
      if (this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectDecorator(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern {
    const evidence: string[] = [];
    const signals: HeuristicSignal[] = [];

    // Check class name
    const hasDecoratorName = DECORATOR_CLASS_PATTERNS.some((pattern) => cls.name.includes(pattern));
    signals.push({ weight: 0.25, matched: hasDecoratorName });
    if (hasDecoratorName) {
      evidence.push(`Class name "${cls.name}" suggests decorator pattern`);
    }

    // Check if wraps same type (a held component typed as one of its supertypes)
    const ancestry = this.getAncestry(cls, context);
    const wrapped = this.getReferenceFields(cls).find((f) => ancestry.has(f.typeName));
    const wrapsSameType = wrapped !== undefined;
    signals.push({ weight: 0.35, matched: wrapsSameType });
    if (wrapped) {
      evidence.push(`Wraps component of same type via "${wrapped.field.name}: ${wrapped.typeName}"`);
    }

    // Check if it conforms to the component type itself
    const hasHeritage = cls.implementsInterfaces.length > 0 || cls.extendsClass !== undefined;
    signals.push({ weight: 0.25, matched: hasHeritage && wrapsSameType });
    if (hasHeritage) {
      evidence.push(`Conforms to: ${[...ancestry].join(", ")}`);
    }

    // Check for delegation in methods
    const delegatesMethods = wrapped !== undefined && this.delegatesTo(cls, wrapped.field.name);
    signals.push({ weight: 0.15, matched: delegatesMethods });
    if (delegatesMethods) {
      evidence.push("Methods delegate to wrapped component");
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("decorator", cls, ["Decorator class that wraps and extends component"]),
    ];

    if (wrapped) {
      const component = this.typeParticipant("component", wrapped.typeName, context, [
        "Component type shared by decorator and decorated",
      ]);
      if (component) participants.push(component);

      // Concrete components: implementations of the component outside the decorator hierarchy
      for (const concrete of this.findSubtypes(context, wrapped.typeName)) {
        if (concrete.id === cls.id || this.getAncestry(concrete, context).has(cls.name)) continue;
        participants.push(
          this.classParticipant("decorated_component", concrete, ["Concrete component being decorated"])
        );
      }
    }

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Decorator pattern "${cls.name}" wraps and extends component behavior`,
    });
  }
}

/**
 * Create a decorator pattern detector.
 */
export function createDecoratorDetector(): DecoratorDetector {
  return new DecoratorDetector();
}
