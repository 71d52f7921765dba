/**
 * Reference Renderer
 *
 * Renders the catalogue as a single markdown reference document: contents,
 * then one section per pattern grouped by category.
 *
 * @module
 */

import type { PatternCategory } from "../../types/index.js";
import { PATTERN_CATEGORIES } from "../../types/index.js";
import { createLogger, slugify } from "../../utils/index.js";
import type { IPatternCatalog, PatternEntry } from "../catalog/interfaces.js";
import type { RenderOptions } from "./interfaces.js";
import { assertSectionLevel } from "./parser.js";

const logger = createLogger("renderer");

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  title: "Design Pattern Reference",
  description:
    "Creational and structural object-oriented design patterns, each with a runnable TypeScript example.",
  sectionLevel: 3,
  includeOutput: true,
};

const CATEGORY_LABELS: Record<PatternCategory, string> = {
  creational: "Creational",
  structural: "Structural",
};

function heading(level: number, text: string): string {
  return `${"#".repeat(level)} ${text}`;
}

function fence(language: string, content: string): string[] {
  return ["```" + language, content.replace(/\s+$/, ""), "```"];
}

function renderContents(catalog: IPatternCatalog): string[] {
  const lines = [heading(2, "Contents"), ""];
  for (const category of PATTERN_CATEGORIES) {
    const entries = catalog.list({ category });
    if (entries.length === 0) continue;
    lines.push(`- ${CATEGORY_LABELS[category]}`);
    for (const entry of entries) {
      lines.push(`  - [${entry.name}](#${slugify(entry.name)})`);
    }
  }
  return lines;
}

function renderSection(catalog: IPatternCatalog, entry: PatternEntry, options: RenderOptions): string[] {
  const lines = [heading(options.sectionLevel, entry.name), ""];

  if (entry.aliases.length > 0) {
    lines.push(`*Also known as: ${entry.aliases.join(", ")}*`, "");
  }

  lines.push(entry.overview, "", `**Intent:** ${entry.intent}`, "", "**Participants:**", "");
  for (const participant of entry.participants) {
    lines.push(`- **${participant.role}**: ${participant.description}`);
  }
  lines.push("", ...fence("ts", catalog.snippet(entry.id)));

  if (options.includeOutput) {
    lines.push("", "Output:", "", ...fence("text", catalog.run(entry.id).join("\n")));
  }

  return lines;
}

/**
 * Render the whole catalogue as markdown.
 *
 * @throws DocumentationError when the section level collides with the
 * document's own headings
 */
export function renderReference(
  catalog: IPatternCatalog,
  options: Partial<RenderOptions> = {}
): string {
  const resolved: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...options };

  assertSectionLevel(resolved.sectionLevel);

  const blocks: string[][] = [
    [heading(1, resolved.title), "", resolved.description],
    renderContents(catalog),
  ];

  for (const category of PATTERN_CATEGORIES) {
    const entries = catalog.list({ category });
    if (entries.length === 0) continue;
    blocks.push([heading(2, `${CATEGORY_LABELS[category]} Patterns`)]);
    for (const entry of entries) {
      blocks.push(renderSection(catalog, entry, resolved));
    }
  }

  logger.debug({ sections: catalog.list().length }, "Reference rendered");
  return `${blocks.map((block) => block.join("\n")).join("\n\n")}\n`;
}
