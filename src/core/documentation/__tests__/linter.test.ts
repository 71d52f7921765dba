/**
 * Reference Linter Tests
 */

import { describe, it, expect, beforeAll } from "vitest";
import * as os from "node:os";
import * as path from "node:path";

import { lintReference, lintFile, hasErrors } from "../linter.js";
import { loadCatalog, type PatternCatalog } from "../../catalog/index.js";
import { DocumentationError, ErrorCode } from "../../errors.js";

describe("lintReference", () => {
  let catalog: PatternCatalog;

  beforeAll(() => {
    catalog = loadCatalog();
  });

  const doc = [
    "# Ref",
    "",
    "### Singleton",
    "",
    "Only one.",
    "",
    "```",
    "code",
    "```",
    "",
    "### Observer",
    "",
    "```ts",
    "x",
    "```",
    "### Singleton",
    "Again.",
    "```ts",
    "y",
    "```",
    "###",
    "Nameless.",
    "```ts",
    "z",
    "```",
  ].join("\n");

  it("reports section problems sorted by line", () => {
    const result = lintReference(doc, { catalog, requireAllPatterns: false });

    expect(result.issues.map((issue) => [issue.line, issue.rule, issue.severity])).toEqual([
      [7, "code-block-language", "warning"],
      [11, "section-overview", "error"],
      [11, "unknown-pattern", "warning"],
      [16, "duplicate-section", "error"],
      [21, "section-name", "error"],
    ]);
    expect(result.errorCount).toBe(3);
    expect(result.warningCount).toBe(2);
    expect(result.sections).toHaveLength(4);
    expect(hasErrors(result)).toBe(true);
  });

  it("writes messages naming the section", () => {
    const result = lintReference(doc, { catalog, requireAllPatterns: false });
    expect(result.issues.map((issue) => issue.message)).toEqual([
      "Code block in Singleton has no language tag",
      "Observer has no overview paragraph",
      "Observer is not a catalogued pattern",
      "Singleton is already described at line 3",
      "Section heading has no name",
    ]);
    expect(result.issues[1]?.section).toBe("Observer");
    expect(result.issues[4]?.section).toBeUndefined();
  });

  it("skips catalogue checks without a catalogue", () => {
    const rules = lintReference(doc).issues.map((issue) => issue.rule);
    expect(rules).toEqual(["code-block-language", "section-overview", "duplicate-section", "section-name"]);
  });

  it("drops ignored rules and optional language tags", () => {
    const ignored = lintReference(doc, { ignoreRules: ["code-block-language", "duplicate-section"] });
    expect(ignored.issues.map((issue) => issue.rule)).toEqual(["section-overview", "section-name"]);

    const untagged = lintReference(doc, { requireLanguageTag: false });
    expect(untagged.issues.some((issue) => issue.rule === "code-block-language")).toBe(false);
  });

  it("reports a document without sections once", () => {
    const result = lintReference("# Empty\n\nNothing here.\n", { catalog, requireAllPatterns: false });
    expect(result.issues).toEqual([
      { rule: "no-sections", severity: "error", line: 1, message: "No level-3 sections found" },
    ]);
  });

  it("still lists every missing pattern when there are no sections", () => {
    const result = lintReference("# Empty\n\nNothing here.\n", { catalog });
    expect(result.issues).toHaveLength(13);
    expect(result.issues.filter((issue) => issue.rule === "missing-pattern")).toHaveLength(12);
    expect(result.issues[0]?.message).toBe("No section describes Singleton");
    expect(result.issues[12]).toEqual({
      rule: "no-sections",
      severity: "error",
      line: 1,
      message: "No level-3 sections found",
    });
    expect(result.errorCount).toBe(1);
    expect(result.warningCount).toBe(12);
  });

  it.each([1, 2, 7, 3.5])("rejects section level %s", (sectionLevel) => {
    let caught: unknown;
    try {
      lintReference("### Singleton\nOne.\n", { sectionLevel });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DocumentationError);
    expect(caught instanceof DocumentationError && caught.code).toBe(ErrorCode.INVALID_SECTION_LEVEL);
  });

  it("lists catalogue patterns that have no section", () => {
    const result = lintReference(["### Singleton", "One.", "```ts", "x", "```"].join("\n"), { catalog });

    expect(result.errorCount).toBe(0);
    expect(result.warningCount).toBe(11);
    expect(result.issues.every((issue) => issue.rule === "missing-pattern" && issue.line === 1)).toBe(true);
    expect(result.issues[0]?.message).toBe("No section describes Factory Method");
    expect(result.issues[10]?.message).toBe("No section describes Proxy");
  });

  it("matches sections by alias", () => {
    const result = lintReference(["### Virtual Constructor", "Text.", "```ts", "x", "```"].join("\n"), {
      catalog,
      requireAllPatterns: false,
    });
    expect(result.issues).toEqual([]);
  });

  it("reports an unterminated fence in its section", () => {
    const result = lintReference(["### Proxy", "Text.", "```ts", "x"].join("\n"));
    expect(result.issues).toEqual([
      { rule: "section-code-block", severity: "error", line: 1, section: "Proxy", message: "Proxy has no code block" },
      {
        rule: "unterminated-fence",
        severity: "error",
        line: 3,
        section: "Proxy",
        message: "Code block opened at line 3 is never closed",
      },
    ]);
  });
});

describe("lintFile", () => {
  it("throws a DocumentationError for a missing file", () => {
    const missing = path.join(os.tmpdir(), "pattern-atlas-missing", "PATTERNS.md");
    let caught: unknown;
    try {
      lintFile(missing);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DocumentationError);
    if (caught instanceof DocumentationError) {
      expect(caught.code).toBe(ErrorCode.REFERENCE_NOT_FOUND);
      expect(caught.filePath).toBe(missing);
    }
  });
});
