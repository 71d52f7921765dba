/**
 * Error Hierarchy Tests
 */

import { describe, it, expect } from "vitest";
import {
  AnalysisError,
  CatalogError,
  ConfigurationError,
  DocumentationError,
  ErrorCode,
  PatternAtlasError,
} from "../errors.js";

describe("error classes", () => {
  it("carry a code, name and context", () => {
    const error = new CatalogError("Unknown pattern", ErrorCode.PATTERN_NOT_FOUND, {
      patternId: "observer",
      suggestions: [],
    });

    expect(error).toBeInstanceOf(PatternAtlasError);
    expect(error.name).toBe("CatalogError");
    expect(error.code).toBe("E1002");
    expect(error.patternId).toBe("observer");
    expect(error.toString()).toBe("[E1002] CatalogError: Unknown pattern");
  });

  it("serialises to JSON for logging", () => {
    const json = new AnalysisError("Source missing", ErrorCode.SOURCE_NOT_FOUND, { filePath: "a.ts" }).toJSON();
    expect(json.name).toBe("AnalysisError");
    expect(json.code).toBe(ErrorCode.SOURCE_NOT_FOUND);
    expect(json.context).toEqual({ filePath: "a.ts" });
    expect(typeof json.timestamp).toBe("string");
  });

  it("includes the file in documentation errors", () => {
    const error = new DocumentationError("Cannot read", ErrorCode.REFERENCE_NOT_FOUND, { filePath: "PATTERNS.md" });
    expect(error.toString()).toBe(`[${ErrorCode.REFERENCE_NOT_FOUND}] DocumentationError: Cannot read at PATTERNS.md`);
  });
});

describe("ConfigurationError", () => {
  it("has a fixed code and keeps the issues", () => {
    const error = new ConfigurationError("bad", { issues: ["a: b"] });
    expect(error.code).toBe(ErrorCode.CONFIGURATION_ERROR);
    expect(error).toBeInstanceOf(PatternAtlasError);
    expect(error.issues).toEqual(["a: b"]);
  });
});
