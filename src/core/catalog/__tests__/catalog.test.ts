/**
 * Pattern Catalogue Tests
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { loadCatalog, getDefaultExamplesDir, PatternCatalog } from "../catalog.js";
import { DEMOS } from "../examples/index.js";
import { CatalogError, ErrorCode } from "../../errors.js";
import { PATTERN_IDS } from "../../../types/index.js";

describe("loadCatalog", () => {
  let catalog: PatternCatalog;

  beforeAll(() => {
    catalog = loadCatalog();
  });

  it("loads all twelve patterns in catalogue order", () => {
    expect(catalog.list().map((entry) => entry.id)).toEqual([...PATTERN_IDS]);
  });

  it("resolves example paths against the examples directory", () => {
    const entry = catalog.get("builder");
    expect(entry.example).toBe("creational/builder.ts");
    expect(entry.examplePath).toBe(path.join(getDefaultExamplesDir(), "creational", "builder.ts"));
    expect(fs.existsSync(entry.examplePath)).toBe(true);
  });

  it("filters by category", () => {
    expect(catalog.list({ category: "creational" }).map((entry) => entry.id)).toEqual([
      "singleton",
      "factory-method",
      "abstract-factory",
      "builder",
      "prototype",
    ]);
    expect(catalog.list({ category: "structural" })).toHaveLength(7);
  });

  it("summarises categories", () => {
    expect(catalog.categories()).toEqual([
      { category: "creational", count: 5 },
      { category: "structural", count: 7 },
    ]);
  });
});

describe("PatternCatalog lookups", () => {
  let catalog: PatternCatalog;

  beforeAll(() => {
    catalog = loadCatalog();
  });

  it("get throws a CatalogError with suggestions for unknown ids", () => {
    let caught: unknown;
    try {
      catalog.get("singleto");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CatalogError);
    if (caught instanceof CatalogError) {
      expect(caught.code).toBe(ErrorCode.PATTERN_NOT_FOUND);
      expect(caught.patternId).toBe("singleto");
      expect(caught.suggestions).toEqual(["singleton"]);
    }
  });

  it("resolves ids, names and aliases ignoring case and separators", () => {
    const queries = ["factory-method", "Factory Method", "FACTORY_METHOD", "Virtual Constructor"];
    for (const query of queries) {
      const result = catalog.resolve(query);
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.id).toBe("factory-method");
    }

    const alias = catalog.resolve("handle/body");
    expect(alias.ok && alias.value.id).toBe("bridge");
  });

  it("returns an error result with every partial match as a suggestion", () => {
    const result = catalog.resolve("factory");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PATTERN_NOT_FOUND);
      expect(result.error.suggestions).toEqual(["factory-method", "abstract-factory"]);
    }
  });

  it("suggests nothing for unrelated text", () => {
    const result = catalog.resolve("observer");
    expect(!result.ok && result.error.suggestions).toEqual([]);
  });

  it("searches names, aliases, overview and intent", () => {
    expect(catalog.search("families").map((entry) => entry.id)).toEqual(["abstract-factory"]);
    expect(catalog.search("Surrogate placeholder").map((entry) => entry.id)).toEqual(["proxy"]);
    expect(catalog.search("sharing").map((entry) => entry.id)).toEqual(["flyweight"]);
    expect(catalog.search("families surrogate")).toEqual([]);
  });

  it("returns snippet source", () => {
    const source = catalog.snippet("singleton");
    expect(source).toContain("export class AppSettings");
    expect(source).toContain("export function demo(");
  });

  it("runs demos", () => {
    expect(catalog.run("proxy")).toEqual([
      "Video intro: <video intro>",
      "Video intro: <video intro>",
      "Remote downloads: 1",
    ]);
  });
});

describe("loadCatalog with custom files", () => {
  let tempDir: string;

  const record = {
    id: "singleton",
    name: "Singleton",
    category: "creational",
    aliases: [],
    overview: "One instance.",
    intent: "Ensure a class has only one instance.",
    participants: [{ role: "Singleton", description: "Holds the instance" }],
    example: "creational/singleton.ts",
  };

  function writeCatalog(data: unknown): string {
    const catalogPath = path.join(tempDir, "patterns.json");
    fs.writeFileSync(catalogPath, typeof data === "string" ? data : JSON.stringify(data));
    return catalogPath;
  }

  function loadError(catalogPath: string): CatalogError {
    try {
      loadCatalog({ catalogPath, examplesDir: tempDir });
    } catch (error) {
      if (error instanceof CatalogError) return error;
      throw error;
    }
    throw new Error("expected loadCatalog to throw");
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pattern-atlas-catalog-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("loads a minimal catalogue", () => {
    const catalog = loadCatalog({ catalogPath: writeCatalog({ version: 1, patterns: [record] }), examplesDir: tempDir });
    expect(catalog.list()).toHaveLength(1);
    expect(catalog.get("singleton").examplePath).toBe(path.join(tempDir, "creational", "singleton.ts"));
  });

  it("reports a missing snippet", () => {
    const catalog = loadCatalog({ catalogPath: writeCatalog({ version: 1, patterns: [record] }), examplesDir: tempDir });
    expect(() => catalog.snippet("singleton")).toThrow(CatalogError);
    try {
      catalog.snippet("singleton");
    } catch (error) {
      expect(error instanceof CatalogError && error.code).toBe(ErrorCode.SNIPPET_NOT_FOUND);
    }
  });

  it("rejects a missing file", () => {
    expect(loadError(path.join(tempDir, "absent.json")).code).toBe(ErrorCode.CATALOG_NOT_FOUND);
  });

  it("rejects invalid JSON", () => {
    expect(loadError(writeCatalog("{ not json")).code).toBe(ErrorCode.CATALOG_INVALID);
  });

  it("rejects records failing the schema", () => {
    const error = loadError(writeCatalog({ version: 1, patterns: [{ ...record, id: "observer" }] }));
    expect(error.code).toBe(ErrorCode.CATALOG_INVALID);
    expect(error.message).toMatch(/^Invalid catalogue: patterns\.0\.id: /);
  });

  it("rejects duplicate ids", () => {
    const error = loadError(writeCatalog({ version: 1, patterns: [record, record] }));
    expect(error.message).toBe('Duplicate pattern id "singleton"');
  });

  it("rejects a name reused by another pattern", () => {
    const other = {
      ...record,
      id: "prototype",
      name: "Prototype",
      aliases: ["singleton"],
      example: "creational/prototype.ts",
    };
    const error = loadError(writeCatalog({ version: 1, patterns: [record, other] }));
    expect(error.code).toBe(ErrorCode.CATALOG_INVALID);
    expect(error.message).toBe('Name "singleton" of prototype is already used by singleton');
  });

  it.each([
    ["after", false],
    ["before", true],
  ])("rejects an alias that is another pattern's id, declared %s it", (_order, aliasFirst) => {
    const owner = { ...record, name: "Sole Instance" };
    const other = {
      ...record,
      id: "prototype",
      name: "Prototype",
      aliases: ["singleton"],
      example: "creational/prototype.ts",
    };
    const patterns = aliasFirst ? [other, owner] : [owner, other];
    const error = loadError(writeCatalog({ version: 1, patterns }));
    expect(error.code).toBe(ErrorCode.CATALOG_INVALID);
    expect(error.message).toBe('Name "singleton" of prototype is already used by singleton');
  });

  it("wraps a failing demo in DEMO_FAILED", () => {
    const catalog = loadCatalog({
      catalogPath: writeCatalog({ version: 1, patterns: [record] }),
      examplesDir: tempDir,
      demos: {
        ...DEMOS,
        singleton: () => {
          throw new Error("boom");
        },
      },
    });

    let caught: unknown;
    try {
      catalog.run("singleton");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CatalogError);
    if (caught instanceof CatalogError) {
      expect(caught.code).toBe(ErrorCode.DEMO_FAILED);
      expect(caught.message).toBe("Demo for Singleton failed: boom");
      expect(caught.patternId).toBe("singleton");
    }
  });

  it("runs the demos it is given", () => {
    const catalog = new PatternCatalog(loadCatalog().list(), {
      ...DEMOS,
      adapter: (print) => print("stub"),
    });
    expect(catalog.run("adapter")).toEqual(["stub"]);
    expect(catalog.run("proxy")).toHaveLength(3);
  });

  it("rejects an example outside its category directory", () => {
    const error = loadError(
      writeCatalog({ version: 1, patterns: [{ ...record, example: "structural/singleton.ts" }] })
    );
    expect(error.message).toBe("Example structural/singleton.ts of singleton is outside the creational directory");
  });
});
