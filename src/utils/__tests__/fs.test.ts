/**
 * File discovery tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { findFiles, resolveSourcePaths, writeFile } from "../fs.js";
import { slugify } from "../index.js";

describe("resolveSourcePaths", () => {
  let tempDir: string;

  function touch(relative: string): string {
    const filePath = path.join(tempDir, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "export {};\n");
    return filePath;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pattern-atlas-fs-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("globs directories with include and ignore patterns", async () => {
    const a = touch("src/a.ts");
    const b = touch("src/nested/b.tsx");
    touch("src/types.d.ts");
    touch("src/readme.md");
    touch("src/dist/out.ts");
    touch("src/node_modules/dep/index.ts");

    const result = await resolveSourcePaths(
      ["src"],
      ["**/*.ts", "**/*.tsx"],
      ["**/dist/**", "**/*.d.ts"],
      tempDir
    );

    expect(result).toEqual({ files: [a, b].sort(), missing: [] });
  });

  it("takes files as given and reports missing paths", async () => {
    const file = touch("notes.md");

    const result = await resolveSourcePaths(["notes.md", "nope", "notes.md"], ["**/*.ts"], [], tempDir);

    expect(result.files).toEqual([file]);
    expect(result.missing).toEqual(["nope"]);
  });

  it("findFiles returns sorted absolute paths", async () => {
    const z = touch("z.ts");
    const a = touch("a.ts");
    expect(await findFiles({ patterns: ["*.ts"], cwd: tempDir })).toEqual([a, z]);
  });

  it("writeFile creates parent directories", async () => {
    const target = path.join(tempDir, "out", "deep", "PATTERNS.md");
    await writeFile(target, "# Patterns\n");
    expect(fs.readFileSync(target, "utf-8")).toBe("# Patterns\n");
  });
});

describe("slugify", () => {
  it.each([
    ["Factory Method", "factory-method"],
    ["  Handle/Body ", "handle-body"],
    ["FACTORY_METHOD", "factory-method"],
    ["--Proxy--", "proxy"],
    ["", ""],
  ])("%j -> %j", (input, expected) => {
    expect(slugify(input)).toBe(expected);
  });
});
