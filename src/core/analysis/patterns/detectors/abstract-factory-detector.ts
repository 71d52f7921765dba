/**
 * Abstract Factory Pattern Detector
 *
 * Detects Abstract Factory design pattern instances: an interface (or
 * abstract class) with several creation methods, implemented by concrete
 * factories that each produce one family of products.
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

interface FactoryContract {
  name: string;
  participant: PatternParticipant;
  filePath: string;
  methods: Array<{ name: string; returnType?: string }>;
}

/**
 * Detector for Abstract Factory design pattern.
 */
export class AbstractFactoryDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "abstract-factory";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "family-of-creation-methods",
        patternType: "abstract-factory",
        weight: 0.4,
        description: "Abstract type declares two or more creation methods",
      },
      {
        name: "concrete-factories",
        patternType: "abstract-factory",
        weight: 0.3,
        description: "Concrete classes implement the factory",
      },
      {
        name: "factories-instantiate",
        patternType: "abstract-factory",
        weight: 0.3,
        description: "Every concrete factory instantiates products in its creation methods",
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

    for (const contract of this.findContracts(context)) {
      const pattern = this.detectAbstractFactory(contract, context);
      if (this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  /**
   * Interfaces and abstract classes declaring at least two creation methods.
   */
  private findContracts(context: PatternAnalysisContext): FactoryContract[] {
    const contracts: FactoryContract[] = [];
    const evidence = ["Declares a family of creation methods"];

    for (const iface of context.interfaces) {
      const methods = iface.methods.filter((m) => this.isCreationName(m.name));
      if (methods.length >= 2) {
        contracts.push({
          name: iface.name,
          participant: this.interfaceParticipant("abstract_factory", iface, evidence),
          filePath: iface.filePath,
          methods,
        });
      }
    }

    for (const cls of context.classes) {
      if (!cls.isAbstract) continue;
      const methods = cls.methods.filter((m) => m.isAbstract && this.isCreationName(m.name));
      if (methods.length >= 2) {
        contracts.push({
          name: cls.name,
          participant: this.classParticipant("abstract_factory", cls, evidence),
          filePath: cls.filePath,
          methods,
        });
      }
    }

    return contracts;
  }

  private detectAbstractFactory(contract: FactoryContract, context: PatternAnalysisContext): DetectedPattern {
    const methodNames = contract.methods.map((m) => m.name);
    const evidence: string[] = [`${contract.name} declares ${methodNames.join(", ")}`];
    const signals: HeuristicSignal[] = [{ weight: 0.4, matched: true }];

    const factories = this.findSubtypes(context, contract.name).filter((c) => !c.isAbstract);
    signals.push({ weight: 0.3, matched: factories.length > 0 });
    if (factories.length > 0) {
      evidence.push(`Concrete factories: ${factories.map((c) => c.name).join(", ")}`);
    }

    const instantiates =
      factories.length > 0 && factories.every((f) => this.instantiatesProducts(f, methodNames));
    signals.push({ weight: 0.3, matched: instantiates });
    if (instantiates) {
      evidence.push("Each concrete factory creates its own products");
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      contract.participant,
      ...factories.map((c) =>
        this.classParticipant("concrete_factory", c, [`Implements ${contract.name}`])
      ),
    ];

    const productNames = new Set(
      contract.methods.flatMap((m) =>
        this.typeNames(m.returnType).filter(
          (name) => this.findClass(context, name) !== undefined || this.findInterface(context, name) !== undefined
        )
      )
    );
    for (const name of productNames) {
      const product = this.typeParticipant("product", name, context, ["Abstract product of the family"]);
      if (product) participants.push(product);
    }

    return this.createPattern({
      name: contract.name,
      confidence,
      participants,
      evidence,
      filePaths: [contract.filePath, ...participants.map((p) => p.filePath)],
      description: `Abstract factory "${contract.name}" creates families of ${[...productNames].join(" and ") || "related objects"}`,
    });
  }

  private instantiatesProducts(factory: ClassInfo, methodNames: string[]): boolean {
    return methodNames.every((name) =>
      factory.methods.some((m) => m.name === name && (m.body ?? "").includes("new "))
    );
  }
}

/**
 * Create an abstract factory pattern detector.
 */
export function createAbstractFactoryDetector(): AbstractFactoryDetector {
  return new AbstractFactoryDetector();
}
