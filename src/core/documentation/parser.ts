/**
 * Reference Parser
 *
 * Splits a markdown reference into pattern sections. Only what the linter
 * needs is recognised: ATX headings, fenced code blocks and paragraphs.
 *
 * @module
 */

import { DocumentationError, ErrorCode } from "../errors.js";
import type { CodeBlock, ParseOptions, ParsedReference, ReferenceSection } from "./interfaces.js";

const HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?(?:[ \t]+#+)?[ \t]*$/;
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})[ \t]*([^\s`]*)/;
const LIST_ITEM = /^\s*(?:[-*+]|\d+[.)])\s/;
const EMPHASIS_LINE = /^(?:\*[^*].*\*|_[^_].*_)$/;
const BOLD_LABEL = /^\*\*[^*]+:\*\*/;
const LABEL_LINE = /^[A-Za-z][A-Za-z ]*:$/;

interface OpenFence {
  marker: string;
  language: string;
  line: number;
  content: string[];
}

/**
 * Levels 1 and 2 belong to the title and the category headings.
 *
 * @throws DocumentationError INVALID_SECTION_LEVEL outside 3..6
 */
export function assertSectionLevel(level: number): void {
  if (!Number.isInteger(level) || level < 3 || level > 6) {
    throw new DocumentationError(
      `Section level must be between 3 and 6, got ${level}`,
      ErrorCode.INVALID_SECTION_LEVEL
    );
  }
}

/**
 * True for a line that can belong to an overview paragraph.
 */
function isProse(line: string): boolean {
  const text = line.trim();
  if (text.length === 0) return false;
  if (LIST_ITEM.test(line)) return false;
  if (EMPHASIS_LINE.test(text) || BOLD_LABEL.test(text) || LABEL_LINE.test(text)) return false;
  if (text.startsWith("|") || text.startsWith("<!--")) return false;
  return true;
}

function isClosingFence(line: string, open: OpenFence): boolean {
  const text = line.trim();
  const char = open.marker.charAt(0);
  if (!text.startsWith(open.marker)) return false;
  return [...text].every((c) => c === char);
}

class SectionBuilder {
  private readonly overviewLines: string[] = [];
  private overviewDone = false;
  readonly codeBlocks: CodeBlock[] = [];

  constructor(
    readonly name: string,
    readonly level: number,
    readonly line: number
  ) {}

  /** A line that ends the overview paragraph if one has started */
  interrupt(): void {
    if (this.overviewLines.length > 0) this.overviewDone = true;
  }

  text(line: string): void {
    if (this.overviewDone) return;
    if (isProse(line)) {
      this.overviewLines.push(line.trim());
    } else {
      this.interrupt();
    }
  }

  build(): ReferenceSection {
    return {
      name: this.name,
      level: this.level,
      line: this.line,
      overview: this.overviewLines.length > 0 ? this.overviewLines.join(" ") : null,
      codeBlocks: this.codeBlocks,
    };
  }
}

/**
 * Parse a reference document into sections.
 */
export function parseReference(markdown: string, options: ParseOptions = {}): ParsedReference {
  const sectionLevel = options.sectionLevel ?? 3;
  assertSectionLevel(sectionLevel);
  const lines = markdown.split(/\r?\n/);
  const sections: ReferenceSection[] = [];

  let current: SectionBuilder | null = null;
  let fence: OpenFence | null = null;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index] ?? "";
    const lineNumber = index + 1;

    if (fence) {
      if (isClosingFence(line, fence)) {
        current?.codeBlocks.push({
          language: fence.language,
          content: fence.content.join("\n"),
          line: fence.line,
        });
        fence = null;
      } else {
        fence.content.push(line);
      }
      continue;
    }

    const fenceMatch = FENCE_OPEN.exec(line);
    if (fenceMatch) {
      current?.interrupt();
      fence = {
        marker: fenceMatch[1] ?? "```",
        language: fenceMatch[2] ?? "",
        line: lineNumber,
        content: [],
      };
      continue;
    }

    const headingMatch = HEADING.exec(line);
    if (headingMatch) {
      const level = (headingMatch[1] ?? "").length;
      if (level <= sectionLevel) {
        if (current) sections.push(current.build());
        current =
          level === sectionLevel
            ? new SectionBuilder((headingMatch[2] ?? "").trim(), level, lineNumber)
            : null;
      } else {
        current?.interrupt();
      }
      continue;
    }

    current?.text(line);
  }

  const unterminatedFence: ParsedReference["unterminatedFence"] = fence
    ? { line: fence.line, ...(current ? { section: current.name } : {}) }
    : null;
  if (current) sections.push(current.build());

  return { sections, unterminatedFence };
}
