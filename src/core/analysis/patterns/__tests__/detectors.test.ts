/**
 * Pattern Detector Tests
 *
 * Each catalogue snippet must be recognised as its own pattern, and small
 * fixtures pin down the scoring of individual signals.
 */

import { describe, it, expect, beforeAll } from "vitest";
import { loadCatalog, type PatternCatalog } from "../../../catalog/index.js";
import { createPatternAnalysisService } from "../service.js";
import { extractPatternContext } from "../source-extractor.js";
import {
  createAllDetectors,
  createSingletonDetector,
  createAdapterDetector,
  createCompositeDetector,
  DETECTOR_FLOOR,
} from "../detectors/index.js";
import type { DetectedPattern } from "../interfaces.js";
import { PATTERN_IDS, type PatternId } from "../../../../types/index.js";

function roles(pattern: DetectedPattern | undefined): Array<[string, string]> {
  return (pattern?.participants ?? []).map((p) => [p.role, p.entityName]);
}

describe("catalogue snippets", () => {
  let catalog: PatternCatalog;

  beforeAll(() => {
    catalog = loadCatalog();
  });

  function detect(id: PatternId): DetectedPattern[] {
    const entry = catalog.get(id);
    return createPatternAnalysisService()
      .analyzeSource(catalog.snippet(id), entry.examplePath)
      .patterns.filter((p) => p.patternType === id);
  }

  it("detects the singleton", () => {
    const [pattern] = detect("singleton");
    expect(pattern?.name).toBe("AppSettings");
    expect(pattern?.confidence).toBe(1);
    expect(pattern?.confidenceLevel).toBe("high");
    expect(roles(pattern)).toEqual([
      ["singleton", "AppSettings"],
      ["instance_holder", "AppSettings.instance"],
    ]);
  });

  it("detects the factory method", () => {
    const patterns = detect("factory-method");
    expect(patterns).toHaveLength(1);
    expect(patterns[0]?.confidence).toBe(1);
    expect(roles(patterns[0])).toEqual([
      ["creator", "Logistics"],
      ["concrete_creator", "RoadLogistics"],
      ["concrete_creator", "SeaLogistics"],
      ["product", "Transport"],
      ["concrete_product", "Truck"],
      ["concrete_product", "Ship"],
    ]);
  });

  it("detects the abstract factory", () => {
    const [pattern] = detect("abstract-factory");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["abstract_factory", "FurnitureFactory"],
      ["concrete_factory", "VictorianFurnitureFactory"],
      ["concrete_factory", "ModernFurnitureFactory"],
      ["product", "Chair"],
      ["product", "Sofa"],
    ]);
    expect(pattern?.participants[0]?.entityType).toBe("interface");
  });

  it("detects the builder with its product and director", () => {
    const [pattern] = detect("builder");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["builder", "HouseBuilder"],
      ["built_product", "House"],
      ["director", "HouseDirector"],
    ]);
  });

  it("detects prototypes and ranks the abstract one lower", () => {
    const patterns = detect("prototype");
    expect(patterns.map((p) => [p.name, p.confidence])).toEqual([
      ["Circle", 1],
      ["Rectangle", 1],
      ["Shape", 0.7],
    ]);
    expect(roles(patterns[0])).toEqual([
      ["prototype", "Circle"],
      ["prototype_registry", "ShapeRegistry"],
    ]);
  });

  it("detects the adapter", () => {
    const [pattern] = detect("adapter");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["adapter", "SquarePegAdapter"],
      ["target", "RoundPeg"],
      ["adaptee", "SquarePeg"],
    ]);
  });

  it("detects the bridge", () => {
    const [pattern] = detect("bridge");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["abstraction", "Shape"],
      ["refined_abstraction", "Circle"],
      ["refined_abstraction", "Square"],
      ["implementor", "Color"],
      ["concrete_implementor", "Red"],
      ["concrete_implementor", "Blue"],
    ]);
  });

  it("detects the composite and its leaf", () => {
    const [pattern] = detect("composite");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["composite", "CompoundGraphic"],
      ["component", "Graphic"],
      ["leaf", "Dot"],
    ]);
  });

  it("detects the base decorator and its concrete component", () => {
    const patterns = detect("decorator");
    expect(patterns.map((p) => p.name)).toEqual(["CoffeeDecorator"]);
    expect(patterns[0]?.confidence).toBe(1);
    expect(roles(patterns[0])).toEqual([
      ["decorator", "CoffeeDecorator"],
      ["component", "Coffee"],
      ["decorated_component", "SimpleCoffee"],
    ]);
  });

  it("detects the facade and its subsystems", () => {
    const [pattern] = detect("facade");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["facade", "VideoConverter"],
      ["subsystem", "VideoFile"],
      ["subsystem", "CodecFactory"],
      ["subsystem", "BitrateReader"],
      ["subsystem", "AudioMixer"],
    ]);
  });

  it("detects the flyweight factory", () => {
    const [pattern] = detect("flyweight");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["flyweight_factory", "TreeFactory"],
      ["flyweight", "TreeType"],
      ["flyweight_context", "Tree"],
    ]);
  });

  it("detects the caching proxy", () => {
    const [pattern] = detect("proxy");
    expect(pattern?.confidence).toBe(1);
    expect(roles(pattern)).toEqual([
      ["proxy", "CachedVideoService"],
      ["subject", "VideoService"],
      ["real_subject", "RemoteVideoService"],
    ]);
  });
});

describe("detector scoring", () => {
  it("registers one detector per catalogued pattern with weights summing to one", () => {
    const detectors = createAllDetectors();
    expect(detectors.map((d) => d.patternType)).toEqual([...PATTERN_IDS]);
    for (const detector of detectors) {
      const total = detector.getHeuristics().reduce((sum, h) => sum + h.weight, 0);
      expect(total).toBeCloseTo(1, 10);
      expect(detector.getHeuristics().every((h) => h.patternType === detector.patternType)).toBe(true);
    }
  });

  it("scores a partial singleton as medium confidence", () => {
    const context = extractPatternContext(
      [
        "export class Registry {",
        "  private static instance: Registry | undefined;",
        "  static getInstance(): Registry {",
        "    return (Registry.instance ??= new Registry());",
        "  }",
        "}",
      ].join("\n"),
      "registry.ts"
    );
    const detector = createSingletonDetector();

    const [pattern] = detector.detect(context);
    expect(pattern?.confidence).toBe(0.65);
    expect(pattern?.confidenceLevel).toBe("medium");
    expect(pattern?.id).toBe("singleton:class:registry.ts:Registry:1");

    expect(detector.detect(context, { minConfidence: 0.7 })).toEqual([]);
    expect(detector.detect(context, { patternTypes: ["builder"] })).toEqual([]);
  });

  it("never reports candidates below the detector floor", () => {
    const context = extractPatternContext(
      "export class Registry {\n  static getInstance(): Registry {\n    return new Registry();\n  }\n}\n",
      "registry.ts"
    );
    expect(DETECTOR_FLOOR).toBe(0.4);
    expect(createSingletonDetector().detect(context, { minConfidence: 0 })).toEqual([]);
  });

  it("does not treat a name alone as an adapter", () => {
    const context = extractPatternContext(
      "export class PowerAdapter {\n  plug(): string {\n    return \"on\";\n  }\n}\n",
      "power.ts"
    );
    expect(createAdapterDetector().detect(context, { minConfidence: 0 })).toEqual([]);
  });

  it("scores a composite without leaves or child management", () => {
    const context = extractPatternContext(
      [
        "interface Entry {",
        "  size(): number;",
        "}",
        "class Folder implements Entry {",
        "  private items: Entry[] = [];",
        "  size(): number {",
        "    return this.items.reduce((n, item) => n + item.size(), 0);",
        "  }",
        "}",
      ].join("\n"),
      "folder.ts"
    );
    const [pattern] = createCompositeDetector().detect(context);
    expect(pattern?.confidence).toBe(0.6);
    expect(roles(pattern)).toEqual([
      ["composite", "Folder"],
      ["component", "Entry"],
    ]);
  });
});
