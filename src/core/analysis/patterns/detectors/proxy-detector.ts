/**
 * Proxy Pattern Detector
 *
 * Detects Proxy design pattern instances: a stand-in with the same interface
 * as the subject it holds, controlling access to it (caching, lazy creation,
 * permission checks).
 *
 * Heuristics:
 * - Name suggests a proxy (Proxy, Cached, Lazy, Protected)
 * - Holds a subject typed as one of its own supertypes
 * - Access control: a cache lookup or a guard before delegating
 * - Methods delegate to the subject
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

const PROXY_CLASS_PATTERNS = ["Proxy", "Cached", "Caching", "Lazy", "Protected", "Guarded", "Secured", "Virtual"];

const GUARD_PATTERN = /if\s*\(\s*!?\s*this\.|\?\?=/;

/**
 * Detector for Proxy design pattern.
 */
export class ProxyDetector extends BasePatternDetector {
  readonly patternType: DesignPatternType = "proxy";

  getHeuristics(): PatternHeuristic[] {
    return [
      {
        name: "proxy-naming",
        patternType: "proxy",
        weight: 0.2,
        description: "Class name suggests a proxy (Proxy, Cached, Lazy)",
      },
      {
        name: "same-interface-subject",
        patternType: "proxy",
        weight: 0.3,
        description: "Holds a subject of one of its own supertypes",
      },
      {
        name: "access-control",
        patternType: "proxy",
        weight: 0.3,
        description: "Caches results or guards access before delegating",
      },
      {
        name: "delegates-to-subject",
        patternType: "proxy",
        weight: 0.2,
        description: "Methods forward calls to the subject",
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
      const pattern = this.detectProxy(cls, context);
      if (this.meetsConfidenceThreshold(pattern.confidence, options)) {
        patterns.push(pattern);
      }
    }

    return patterns;
  }

  private detectProxy(cls: ClassInfo, context: PatternAnalysisContext): DetectedPattern {
    const evidence: string[] = [];
    const signals: HeuristicSignal[] = [];

    const hasProxyName = PROXY_CLASS_PATTERNS.some((pattern) => cls.name.includes(pattern));
    signals.push({ weight: 0.2, matched: hasProxyName });
    if (hasProxyName) {
      evidence.push(`Class name "${cls.name}" suggests proxy pattern`);
    }

    const ancestry = this.getAncestry(cls, context);
    const subject = this.getReferenceFields(cls).find((f) => ancestry.has(f.typeName));
    signals.push({ weight: 0.3, matched: subject !== undefined });
    if (subject) {
      evidence.push(`Holds subject "${subject.field.name}: ${subject.typeName}"`);
    }

    const cacheField = this.findCacheField(cls);
    const hasGuard = GUARD_PATTERN.test(this.classBody(cls));
    const controlsAccess = cacheField !== undefined || hasGuard;
    signals.push({ weight: 0.3, matched: controlsAccess });
    if (cacheField) {
      evidence.push(`Caches results in "${cacheField}"`);
    } else if (hasGuard) {
      evidence.push("Guards access before delegating");
    }

    const delegates = subject !== undefined && this.delegatesTo(cls, subject.field.name);
    signals.push({ weight: 0.2, matched: delegates });
    if (delegates) {
      evidence.push("Methods delegate to subject");
    }

    const confidence = this.calculateWeightedConfidence(signals);

    const participants: PatternParticipant[] = [
      this.classParticipant("proxy", cls, ["Stand-in controlling access to the subject"]),
    ];

    if (subject) {
      const subjectType = this.typeParticipant("subject", subject.typeName, context, [
        "Interface shared by proxy and real subject",
      ]);
      if (subjectType) participants.push(subjectType);

      for (const real of this.findSubtypes(context, subject.typeName)) {
        if (real.id === cls.id) continue;
        participants.push(this.classParticipant("real_subject", real, ["Object the proxy stands in for"]));
      }
    }

    return this.createPattern({
      name: cls.name,
      confidence,
      participants,
      evidence,
      filePaths: [cls.filePath, ...participants.map((p) => p.filePath)],
      description: `Proxy "${cls.name}" controls access to its subject`,
    });
  }

  /**
   * A map-like field the class both reads and checks, e.g. `this.cache.get(`.
   */
  private findCacheField(cls: ClassInfo): string | undefined {
    const body = this.classBody(cls);
    return this.getFields(cls).find((f) => {
      const declared = `${f.type ?? ""} ${cls.properties.find((p) => p.name === f.name)?.defaultValue ?? ""}`;
      if (!/\b(?:Weak)?Map\b/.test(declared)) return false;
      return body.includes(`this.${f.name}.get(`) || body.includes(`this.${f.name}.has(`);
    })?.name;
  }
}

/**
 * Create a proxy pattern detector.
 */
export function createProxyDetector(): ProxyDetector {
  return new ProxyDetector();
}
