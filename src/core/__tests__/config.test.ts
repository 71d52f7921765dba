/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { getDefaultConfig, loadConfig, parseConfig, writeDefaultConfig } from "../config.js";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { PATTERN_IDS } from "../../types/index.js";
import { getConfigPath } from "../../utils/index.js";

describe("getDefaultConfig", () => {
  it("fills every section", () => {
    expect(getDefaultConfig()).toEqual({
      reference: {
        title: "Design Pattern Reference",
        description:
          "Creational and structural object-oriented design patterns, each with a runnable TypeScript example.",
        output: "PATTERNS.md",
        sectionLevel: 3,
        includeOutput: true,
      },
      lint: { requireLanguageTag: true, requireAllPatterns: true, ignoreRules: [] },
      detection: {
        minConfidence: 0.5,
        patternTypes: [...PATTERN_IDS],
        include: ["**/*.ts", "**/*.tsx"],
        ignore: ["**/dist/**", "**/*.d.ts"],
      },
    });
  });
});

describe("parseConfig", () => {
  it("merges partial sections with defaults", () => {
    const config = parseConfig({ reference: { sectionLevel: 4 }, detection: { patternTypes: ["proxy"] } });
    expect(config.reference.sectionLevel).toBe(4);
    expect(config.reference.output).toBe("PATTERNS.md");
    expect(config.detection.patternTypes).toEqual(["proxy"]);
    expect(config.detection.minConfidence).toBe(0.5);
  });

  it("rejects invalid values with one issue per problem", () => {
    let caught: unknown;
    try {
      parseConfig({ reference: { sectionLevel: 2 }, detection: { minConfidence: 2 } }, "config.json");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.code).toBe(ErrorCode.CONFIGURATION_ERROR);
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^reference\.sectionLevel: /);
      expect(caught.issues[1]).toMatch(/^detection\.minConfidence: /);
      expect(caught.message.startsWith("Invalid config.json: ")).toBe(true);
    }
  });

  it("rejects unknown pattern ids", () => {
    expect(() => parseConfig({ detection: { patternTypes: ["observer"] } })).toThrow(ConfigurationError);
  });
});

describe("loadConfig and writeDefaultConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pattern-atlas-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("uses defaults when no file exists", () => {
    expect(loadConfig(tempDir)).toEqual(getDefaultConfig());
  });

  it("writes the defaults once unless forced", () => {
    expect(writeDefaultConfig(tempDir)).toBe(true);
    const configPath = getConfigPath(tempDir);
    expect(configPath).toBe(path.join(tempDir, ".pattern-atlas", "config.json"));
    expect(JSON.parse(fs.readFileSync(configPath, "utf-8"))).toEqual(getDefaultConfig());

    fs.writeFileSync(configPath, JSON.stringify({ reference: { output: "docs/REFERENCE.md" } }));
    expect(writeDefaultConfig(tempDir)).toBe(false);
    expect(loadConfig(tempDir).reference.output).toBe("docs/REFERENCE.md");

    expect(writeDefaultConfig(tempDir, true)).toBe(true);
    expect(loadConfig(tempDir).reference.output).toBe("PATTERNS.md");
  });

  it("rejects a file that is not JSON", () => {
    fs.mkdirSync(path.join(tempDir, ".pattern-atlas"));
    fs.writeFileSync(getConfigPath(tempDir), "{ broken");
    expect(() => loadConfig(tempDir)).toThrow(/^Failed to read /);
  });
});
