/**
 * Reference Parser Tests
 */

import { describe, it, expect } from "vitest";
import { assertSectionLevel, parseReference } from "../parser.js";
import { DocumentationError, ErrorCode } from "../../errors.js";

describe("parseReference", () => {
  const doc = [
    "# Title",
    "",
    "### Alpha",
    "",
    "First line",
    "continues here.",
    "",
    "Second paragraph.",
    "",
    "```ts",
    "const a = 1;",
    "```",
    "",
    "#### Detail",
    "",
    "~~~",
    "plain",
    "~~~",
    "### Beta",
    "- list item",
    "```js",
    "open",
  ].join("\n");

  it("splits sections at the section level", () => {
    const parsed = parseReference(doc);

    expect(parsed.sections).toEqual([
      {
        name: "Alpha",
        level: 3,
        line: 3,
        overview: "First line continues here.",
        codeBlocks: [
          { language: "ts", content: "const a = 1;", line: 10 },
          { language: "", content: "plain", line: 16 },
        ],
      },
      { name: "Beta", level: 3, line: 19, overview: null, codeBlocks: [] },
    ]);
  });

  it("reports a fence that is never closed", () => {
    expect(parseReference(doc).unterminatedFence).toEqual({ line: 21, section: "Beta" });
  });

  it("reports an unterminated fence outside any section", () => {
    const parsed = parseReference("# Title\n```ts\nconst a = 1;\n");
    expect(parsed.sections).toEqual([]);
    expect(parsed.unterminatedFence).toEqual({ line: 2 });
  });

  it("ends a section at a higher-level heading", () => {
    const parsed = parseReference(["### One", "", "## Group", "", "Not an overview."].join("\n"));
    expect(parsed.sections).toEqual([{ name: "One", level: 3, line: 1, overview: null, codeBlocks: [] }]);
  });

  it("skips labels, emphasis and lists when looking for the overview", () => {
    const parsed = parseReference(
      ["### Gamma ###", "*Also known as: G*", "**Intent:** do things", "Output:", "- a", "", "Real text."].join("\n")
    );
    expect(parsed.sections[0]?.name).toBe("Gamma");
    expect(parsed.sections[0]?.overview).toBe("Real text.");
  });

  it("does not treat headings inside code blocks as sections", () => {
    const parsed = parseReference(["### Real", "Text.", "```md", "### Fake", "```"].join("\n"));
    expect(parsed.sections.map((section) => section.name)).toEqual(["Real"]);
    expect(parsed.sections[0]?.codeBlocks[0]?.content).toBe("### Fake");
  });

  it("honours a custom section level", () => {
    const parsed = parseReference(["### Group", "#### Inner", "Text."].join("\n"), { sectionLevel: 4 });
    expect(parsed.sections.map((section) => [section.name, section.line])).toEqual([["Inner", 2]]);
  });

  it.each([1, 2, 7, 3.5])("rejects section level %s", (sectionLevel) => {
    let caught: unknown;
    try {
      parseReference("## A\ntext", { sectionLevel });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DocumentationError);
    expect(caught instanceof DocumentationError && caught.code).toBe(ErrorCode.INVALID_SECTION_LEVEL);
  });

  it.each([3, 4, 5, 6])("accepts section level %s", (sectionLevel) => {
    expect(() => assertSectionLevel(sectionLevel)).not.toThrow();
  });
});
