/**
 * Composite Pattern Detector
 *
 * Detects Composite design pattern instances: a node that implements a
 * component type and keeps a collection of children of that same type.
 *
 * @module
 */

import { BasePatternDetector, type FieldInfo } from "./base-detector.js";
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

const CHILD_METHOD_PATTERNS = ["add", "remove", "getChild", "append", "insert", "attach", "detach"];

const COLLECTION_TYPE = /\[\]|\b(?:Array|ReadonlyArray|Set|ReadonlySet)</;

/**
 * Detector for Composite design pattern.
 */
export class CompositeDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "composite";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "children-of-component-type",
        patternType: "composite",
        weight: 0.35,
        description: "Holds a collection typed as one of its own supertypes",
      },
      {
        name: "child-management",
        patternType: "composite",
        weight: 0.25,
        description: "Has add/remove/getChild style methods",
      },
      {
        name: "recursive-operation",
        patternType: "composite",
        weight: 0.25,
        description: "Operations iterate over the children",
      },
      {
        name: "leaf-sibling",
        patternType: "composite",
        weight: 0.15,
        description: "Another class implements the same component as a leaf",
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
      const pattern = this.detectComposite(cls, context);
      if (pattern && this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectComposite(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern | null {
    const ancestry = this.getAncestry(cls, context);
    const children = this.findChildrenField(cls, ancestry);

    // A composite is defined by its children; without them there is no candidate
    if (!children) {
      return null;
    }

    const { field, component } = children;
    const evidence: string[] = [`Holds children "${field.name}: ${field.type ?? ""}" of component type ${component}`];
    const signals: HeuristicSignal[] = [{ weight: 0.35, matched: true }];

    const childMethods = cls.methods.filter((m) =>
      CHILD_METHOD_PATTERNS.some((p) => m.name.toLowerCase().startsWith(p.toLowerCase()))
    );
    signals.push({ weight: 0.25, matched: childMethods.length > 0 });
    if (childMethods.length > 0) {
      evidence.push(`Manages children: ${childMethods.map((m) => m.name).join(", ")}`);
    }

    const name = field.name.replace(/\$/g, "\\$");
    const iterates = new RegExp(
      `of this\\.${name}\\b|this\\.${name}\\.(?:map|forEach|reduce|some|every|filter|flatMap)\\(`
    ).test(this.classBody(cls));
    signals.push({ weight: 0.25, matched: iterates });
    if (iterates) {
      evidence.push("Operations recurse into the children");
    }

    const leaves = this.findSubtypes(context, component).filter(
      (c) => c.id !== cls.id && this.findChildrenField(c, this.getAncestry(c, context)) === undefined
    );
    signals.push({ weight: 0.15, matched: leaves.length > 0 });
    if (leaves.length > 0) {
      evidence.push(`Leaves: ${leaves.map((c) => c.name).join(", ")}`);
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("composite", cls, ["Node holding child components"]),
    ];
    const componentParticipant = this.typeParticipant("component", component, context, [
      "Type shared by leaves and composites",
    ]);
    if (componentParticipant) participants.push(componentParticipant);
    participants.push(...leaves.map((c) => this.classParticipant("leaf", c, ["Component without children"])));

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Composite "${cls.name}" treats groups of ${component} like a single ${component}`,
    });
  }

  /**
   * A collection field whose element type is one of the class's supertypes.
   */
  private findChildrenField(
    cls: ClassInfo,
    ancestry: Set<string>
  ): { field: FieldInfo; component: string } | undefined {
    for (const field of this.getFields(cls)) {
      if (field.isStatic || !field.type || !COLLECTION_TYPE.test(field.type)) continue;
      const component = this.typeNames(field.type).find((name) => ancestry.has(name));
      if (component) return { field, component };
    }
    return undefined;
  }
}

/**
 * Create a composite pattern detector.
 */
export function createCompositeDetector(): CompositeDetector {
  return new CompositeDetector();
}
