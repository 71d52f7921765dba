/**
 * Pattern Analysis Service Tests
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { createPatternAnalysisService, PatternAnalysisService } from "../service.js";
import type { DetectedPattern, IPatternDetector, PatternAnalysisContext } from "../interfaces.js";
import { loadCatalog, type PatternCatalog } from "../../../catalog/index.js";
import { AnalysisError, ErrorCode } from "../../../errors.js";
import { PATTERN_IDS } from "../../../../types/index.js";

function fakePattern(name: string, confidence: number, entityId: string): DetectedPattern {
  return {
    id: `facade:${entityId}`,
    patternType: "facade",
    name,
    confidence,
    confidenceLevel: confidence >= 0.8 ? "high" : confidence >= 0.5 ? "medium" : "low",
    participants: [
      { role: "facade", entityId, entityType: "class", entityName: name, filePath: "fake.ts", evidence: [] },
    ],
    evidence: [],
    filePaths: ["fake.ts"],
  };
}

function fixedDetector(patterns: DetectedPattern[]): IPatternDetector {
  return {
    patternType: "facade",
    detect: () => patterns,
    getHeuristics: () => [],
  };
}

const EMPTY_CONTEXT: PatternAnalysisContext = { classes: [], functions: [], interfaces: [] };

describe("PatternAnalysisService", () => {
  let catalog: PatternCatalog;

  beforeAll(() => {
    catalog = loadCatalog();
  });

  function analyzeSnippet(service: PatternAnalysisService, id: "proxy" | "prototype" | "composite" | "singleton") {
    return (options?: Parameters<PatternAnalysisService["analyzeSource"]>[2]) =>
      service.analyzeSource(catalog.snippet(id), catalog.get(id).examplePath, options);
  }

  it("registers every detector by default", () => {
    const service = createPatternAnalysisService();
    expect(service.getDetectors().map((d) => d.patternType)).toEqual([...PATTERN_IDS]);
    expect(service.getDetector("bridge")?.patternType).toBe("bridge");
  });

  it("keeps only the strongest wrapper reading of a class", () => {
    const analyze = analyzeSnippet(createPatternAnalysisService(), "proxy");

    const decoratorOnly = analyze({ patternTypes: ["decorator"] }).patterns;
    expect(decoratorOnly.map((p) => [p.patternType, p.name, p.confidence])).toEqual([
      ["decorator", "CachedVideoService", 0.75],
    ]);

    const all = analyze().patterns.filter((p) => p.name === "CachedVideoService");
    expect(all.map((p) => p.patternType)).toEqual(["proxy"]);
  });

  it("applies constructor defaults and per-call overrides", () => {
    const analyze = analyzeSnippet(createPatternAnalysisService({ minConfidence: 0.9 }), "prototype");

    const strict = analyze().patterns.filter((p) => p.patternType === "prototype");
    expect(strict.map((p) => p.name)).toEqual(["Circle", "Rectangle"]);

    const relaxed = analyze({ minConfidence: 0.5 }).patterns.filter((p) => p.patternType === "prototype");
    expect(relaxed.map((p) => p.name)).toEqual(["Circle", "Rectangle", "Shape"]);
  });

  it("builds consistent statistics", () => {
    const result = analyzeSnippet(createPatternAnalysisService(), "composite")();
    const { stats } = result;

    expect(stats.entitiesAnalyzed).toBe(4);
    expect(stats.patternsByType.composite).toBe(1);
    expect(stats.totalPatterns).toBe(result.patterns.length);
    expect(Object.values(stats.patternsByType).reduce((sum, n) => sum + n, 0)).toBe(stats.totalPatterns);
    expect(stats.highConfidenceCount + stats.mediumConfidenceCount + stats.lowConfidenceCount).toBe(
      stats.totalPatterns
    );
    expect(Object.keys(stats.patternsByType)).toHaveLength(12);
  });

  it("skips a failing detector and keeps the others", () => {
    const service = createPatternAnalysisService();
    const failing: IPatternDetector = {
      patternType: "singleton",
      detect: () => {
        throw new Error("boom");
      },
      getHeuristics: () => [],
    };
    service.registerDetector(failing);
    expect(service.getDetector("singleton")).toBe(failing);

    const result = analyzeSnippet(service, "singleton")();
    expect(result.patterns.some((p) => p.patternType === "singleton")).toBe(false);
  });

  it("de-duplicates by participants, keeping the highest confidence", () => {
    const service = createPatternAnalysisService();
    service.registerDetector(
      fixedDetector([fakePattern("Gateway", 0.6, "class:a"), fakePattern("Gateway", 0.9, "class:a")])
    );

    const result = service.analyze(EMPTY_CONTEXT, { patternTypes: ["facade"] });
    expect(result.patterns.map((p) => p.confidence)).toEqual([0.9]);
    expect(result.confidence).toBe(0.9);
  });

  it("sorts by confidence, then name", () => {
    const service = createPatternAnalysisService();
    service.registerDetector(
      fixedDetector([
        fakePattern("Beta", 0.6, "class:b"),
        fakePattern("Gamma", 0.9, "class:g"),
        fakePattern("Alpha", 0.6, "class:a"),
      ])
    );

    const result = service.analyze(EMPTY_CONTEXT, { patternTypes: ["facade"] });
    expect(result.patterns.map((p) => p.name)).toEqual(["Gamma", "Alpha", "Beta"]);
    expect(result.stats.highConfidenceCount).toBe(1);
    expect(result.stats.mediumConfidenceCount).toBe(2);
    expect(result.confidence).toBeCloseTo(0.7, 10);
  });

  it("reports zero confidence when nothing is found", () => {
    const result = createPatternAnalysisService().analyze(EMPTY_CONTEXT);
    expect(result.patterns).toEqual([]);
    expect(result.confidence).toBe(0);
    expect(result.stats.entitiesAnalyzed).toBe(0);
  });
});

describe("analyzeFiles", () => {
  let tempDir: string;
  let files: { creator: string; button: string; web: string };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pattern-atlas-analyze-"));
    files = {
      creator: path.join(tempDir, "dialog.ts"),
      button: path.join(tempDir, "button.ts"),
      web: path.join(tempDir, "web-dialog.ts"),
    };
    fs.writeFileSync(
      files.creator,
      [
        'import type { Button } from "./button.js";',
        "export abstract class Dialog {",
        "  protected abstract createButton(): Button;",
        "  render(): string {",
        "    return this.createButton().paint();",
        "  }",
        "}",
      ].join("\n")
    );
    fs.writeFileSync(files.button, "export interface Button {\n  paint(): string;\n}\n");
    fs.writeFileSync(
      files.web,
      [
        'import { Dialog } from "./dialog.js";',
        'import type { Button } from "./button.js";',
        "export class HtmlButton implements Button {",
        "  paint(): string {",
        '    return "<button>";',
        "  }",
        "}",
        "export class WebDialog extends Dialog {",
        "  protected createButton(): Button {",
        "    return new HtmlButton();",
        "  }",
        "}",
      ].join("\n")
    );
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("sees hierarchies that span files", async () => {
    const service = createPatternAnalysisService();
    const result = await service.analyzeFiles([files.creator, files.button, files.web], {
      patternTypes: ["factory-method"],
    });

    expect(result.patterns).toHaveLength(1);
    const [pattern] = result.patterns;
    expect(pattern?.name).toBe("Dialog");
    expect(pattern?.confidence).toBe(1);
    expect(pattern?.participants.map((p) => [p.role, p.entityName])).toEqual([
      ["creator", "Dialog"],
      ["concrete_creator", "WebDialog"],
      ["product", "Button"],
      ["concrete_product", "HtmlButton"],
    ]);
    expect(pattern?.filePaths).toEqual([files.creator, files.web, files.button]);
  });

  it("scores a lone creator lower", async () => {
    const result = await createPatternAnalysisService().analyzeFiles([files.creator], {
      patternTypes: ["factory-method"],
    });
    expect(result.patterns.map((p) => p.confidence)).toEqual([0.7]);
  });

  it("rejects missing files", async () => {
    const missing = path.join(tempDir, "absent.ts");
    const error = await createPatternAnalysisService()
      .analyzeFiles([files.creator, missing])
      .catch((e: unknown) => e);
    expect(error instanceof AnalysisError && error.code).toBe(ErrorCode.SOURCE_NOT_FOUND);
  });

  it("rejects a directory given as a file", async () => {
    const error = await createPatternAnalysisService()
      .analyzeFiles([tempDir])
      .catch((e: unknown) => e);
    expect(error instanceof AnalysisError && error.code).toBe(ErrorCode.SOURCE_NOT_FOUND);
  });
});
