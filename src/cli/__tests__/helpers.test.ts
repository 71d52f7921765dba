/**
 * CLI helper tests
 */

import { describe, it, expect, beforeAll } from "vitest";
import { InvalidArgumentError } from "commander";

import { parseCategory, parseConfidence, resolvePattern, resolvePatternIds } from "../helpers.js";
import { loadCatalog, type PatternCatalog } from "../../core/catalog/index.js";
import { CatalogError, ErrorCode } from "../../core/errors.js";

describe("parseConfidence", () => {
  it.each([
    ["0", 0],
    ["0.75", 0.75],
    ["1", 1],
  ])("accepts %s", (input, expected) => {
    expect(parseConfidence(input)).toBe(expected);
  });

  it.each(["", " ", "-0.1", "1.5", "high", "NaN"])("rejects %j", (input) => {
    expect(() => parseConfidence(input)).toThrow(InvalidArgumentError);
  });
});

describe("parseCategory", () => {
  it("narrows known categories", () => {
    expect(parseCategory("structural")).toBe("structural");
    expect(parseCategory("behavioral")).toBeUndefined();
    expect(parseCategory(undefined)).toBeUndefined();
  });
});

describe("pattern arguments", () => {
  let catalog: PatternCatalog;

  beforeAll(() => {
    catalog = loadCatalog();
  });

  it("resolves ids, names and aliases in first-seen order", () => {
    expect(resolvePatternIds(catalog, ["Wrapper", "proxy", "Adapter", "surrogate", "Kit"])).toEqual([
      "adapter",
      "proxy",
      "abstract-factory",
    ]);
  });

  it("throws the catalogue error with suggestions", () => {
    let caught: unknown;
    try {
      resolvePattern(catalog, "factory");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CatalogError);
    if (caught instanceof CatalogError) {
      expect(caught.code).toBe(ErrorCode.PATTERN_NOT_FOUND);
      expect(caught.suggestions).toEqual(["factory-method", "abstract-factory"]);
    }
  });
});
