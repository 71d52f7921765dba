/**
 * Pattern Analysis Service
 *
 * Orchestrates design pattern detection.
 * Uses registered detectors to find patterns in classes, functions, and interfaces.
 *
 * @module
 */

import type {
  IPatternAnalysisService,
  IPatternDetector,
  PatternAnalysisContext,
  PatternAnalysisResult,
  PatternDetectionOptions,
  DesignPatternType,
  DetectedPattern,
} from "./interfaces.js";
import { PATTERN_IDS } from "../../../types/index.js";
import { createAllDetectors, DEFAULT_MIN_CONFIDENCE } from "./detectors/index.js";
import { extractFileContext, extractPatternContext, mergeContexts } from "./source-extractor.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("pattern-analysis-service");

/**
 * Pattern types that all describe "a class wrapping another object".
 * When several claim the same class, only the strongest reading is kept.
 */
const WRAPPER_PATTERNS: ReadonlySet<DesignPatternType> = new Set(["adapter", "decorator", "proxy"]);

/**
 * Service that performs design pattern analysis.
 */
export class PatternAnalysisService implements IPatternAnalysisService {
  private detectors: Map<DesignPatternType, IPatternDetector> = new Map();
  private defaultOptions: Required<PatternDetectionOptions>;

  constructor(options?: PatternDetectionOptions) {
    this.defaultOptions = {
      minConfidence: options?.minConfidence ?? DEFAULT_MIN_CONFIDENCE,
      patternTypes: options?.patternTypes ?? [...PATTERN_IDS],
    };

    // Register default detectors
    for (const detector of createAllDetectors()) {
      this.registerDetector(detector);
    }
  }

  /**
   * Register a pattern detector.
   */
  registerDetector(detector: IPatternDetector): void {
    this.detectors.set(detector.patternType, detector);
    logger.debug({ patternType: detector.patternType }, "Registered pattern detector");
  }

  /**
   * Get all registered detectors.
   */
  getDetectors(): IPatternDetector[] {
    return Array.from(this.detectors.values());
  }

  /**
   * Get detector for a specific pattern type.
   */
  getDetector(patternType: DesignPatternType): IPatternDetector | undefined {
    return this.detectors.get(patternType);
  }

  /**
   * Analyze a context for all supported design patterns.
   */
  analyze(
    context: PatternAnalysisContext,
    options?: PatternDetectionOptions
  ): PatternAnalysisResult {
    const startTime = Date.now();
    const mergedOptions: Required<PatternDetectionOptions> = {
      minConfidence: options?.minConfidence ?? this.defaultOptions.minConfidence,
      patternTypes: options?.patternTypes ?? this.defaultOptions.patternTypes,
    };
    const allPatterns: DetectedPattern[] = [];

    // Run each detector
    for (const detector of this.detectors.values()) {
      if (!mergedOptions.patternTypes.includes(detector.patternType)) {
        continue;
      }

      try {
        const patterns = detector.detect(context, mergedOptions);
        allPatterns.push(...patterns);
        logger.debug(
          {
            patternType: detector.patternType,
            patternsFound: patterns.length,
          },
          "Detector completed"
        );
      } catch (error) {
        logger.warn({ patternType: detector.patternType, error }, "Detector failed");
      }
    }

    const patterns = this.sortPatterns(this.resolveWrapperOverlaps(this.deduplicatePatterns(allPatterns)));

    // Build statistics
    const stats = this.buildStats(patterns, context, startTime);

    // Calculate overall confidence
    const confidence =
      patterns.length > 0
        ? patterns.reduce((sum, p) => sum + p.confidence, 0) / patterns.length
        : 0;

    return {
      patterns,
      stats,
      confidence,
    };
  }

  /**
   * Analyze TypeScript source text.
   */
  analyzeSource(
    source: string,
    filePath: string,
    options?: PatternDetectionOptions
  ): PatternAnalysisResult {
    return this.analyze(extractPatternContext(source, filePath), options);
  }

  /**
   * Read files and analyze them as one context, so hierarchies spanning
   * files are seen whole.
   */
  async analyzeFiles(
    filePaths: string[],
    options?: PatternDetectionOptions
  ): Promise<PatternAnalysisResult> {
    const contexts = await Promise.all(filePaths.map((filePath) => extractFileContext(filePath)));
    logger.debug({ files: filePaths.length }, "Extracted pattern contexts");
    return this.analyze(mergeContexts(contexts), options);
  }

  /**
   * Deduplicate patterns based on participants.
   */
  private deduplicatePatterns(patterns: DetectedPattern[]): DetectedPattern[] {
    const seen = new Map<string, DetectedPattern>();

    for (const pattern of patterns) {
      // Create key from pattern type + sorted participant IDs
      const participantIds = pattern.participants
        .map((p) => p.entityId)
        .sort()
        .join(",");
      const key = `${pattern.patternType}:${participantIds}`;

      const existing = seen.get(key);
      if (!existing || pattern.confidence > existing.confidence) {
        seen.set(key, pattern);
      }
    }

    return Array.from(seen.values());
  }

  /**
   * Keep only the highest-confidence wrapper reading of each primary class.
   * Ties go to the detector registered first.
   */
  private resolveWrapperOverlaps(patterns: DetectedPattern[]): DetectedPattern[] {
    const best = new Map<string, DetectedPattern>();

    for (const pattern of patterns) {
      const primary = pattern.participants[0]?.entityId;
      if (!WRAPPER_PATTERNS.has(pattern.patternType) || primary === undefined) continue;
      const existing = best.get(primary);
      if (!existing || pattern.confidence > existing.confidence) {
        best.set(primary, pattern);
      }
    }

    return patterns.filter((pattern) => {
      const primary = pattern.participants[0]?.entityId;
      if (!WRAPPER_PATTERNS.has(pattern.patternType) || primary === undefined) return true;
      return best.get(primary) === pattern;
    });
  }

  private sortPatterns(patterns: DetectedPattern[]): DetectedPattern[] {
    return [...patterns].sort(
      (a, b) => b.confidence - a.confidence || a.name.localeCompare(b.name)
    );
  }

  /**
   * Build analysis statistics.
   */
  private buildStats(
    patterns: DetectedPattern[],
    context: PatternAnalysisContext,
    startTime: number
  ): PatternAnalysisResult["stats"] {
    const patternsByType: Record<DesignPatternType, number> = {
      singleton: 0,
      "factory-method": 0,
      "abstract-factory": 0,
      builder: 0,
      prototype: 0,
      adapter: 0,
      bridge: 0,
      composite: 0,
      decorator: 0,
      facade: 0,
      flyweight: 0,
      proxy: 0,
    };

    let highConfidence = 0;
    let mediumConfidence = 0;
    let lowConfidence = 0;

    for (const pattern of patterns) {
      patternsByType[pattern.patternType]++;

      if (pattern.confidenceLevel === "high") {
        highConfidence++;
      } else if (pattern.confidenceLevel === "medium") {
        mediumConfidence++;
      } else {
        lowConfidence++;
      }
    }

    return {
      totalPatterns: patterns.length,
      patternsByType,
      highConfidenceCount: highConfidence,
      mediumConfidenceCount: mediumConfidence,
      lowConfidenceCount: lowConfidence,
      entitiesAnalyzed:
        context.classes.length +
        context.functions.length +
        context.interfaces.length,
      analysisTimeMs: Date.now() - startTime,
    };
  }
}

/**
 * Create a pattern analysis service.
 */
export function createPatternAnalysisService(
  options?: PatternDetectionOptions
): PatternAnalysisService {
  return new PatternAnalysisService(options);
}
