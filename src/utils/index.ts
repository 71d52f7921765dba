/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

export * from "./logger.js";
export * from "./fs.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".pattern-atlas";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

// =============================================================================
// Package Paths
// =============================================================================

let packageRoot: string | null = null;

/**
 * Directory holding this package's package.json. Works from both src/ and
 * dist/, since catalogue data and snippets are read from the package itself.
 */
export function getPackageRoot(): string {
  if (packageRoot) return packageRoot;

  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error("Could not locate the pattern-atlas package root");
    }
    dir = parent;
  }

  packageRoot = dir;
  return dir;
}

// =============================================================================
// Basic File Operations
// =============================================================================

export function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, "utf-8");
  const data: unknown = JSON.parse(content);
  return data;
}

export function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

// =============================================================================
// ID Generation
// =============================================================================

/**
 * Generate a unique ID for a function entity
 */
export function generateFunctionId(
  fileRelativePath: string,
  functionName: string,
  startLine: number
): string {
  return `fn:${fileRelativePath.replace(/\\/g, "/")}:${functionName}:${startLine}`;
}

/**
 * Generate a unique ID for a class entity
 */
export function generateClassId(
  fileRelativePath: string,
  className: string,
  startLine: number
): string {
  return `class:${fileRelativePath.replace(/\\/g, "/")}:${className}:${startLine}`;
}

/**
 * Generate a unique ID for an interface entity
 */
export function generateInterfaceId(
  fileRelativePath: string,
  interfaceName: string,
  startLine: number
): string {
  return `iface:${fileRelativePath.replace(/\\/g, "/")}:${interfaceName}:${startLine}`;
}

/**
 * Generate a unique ID for a method entity
 */
export function generateMethodId(classId: string, methodName: string, startLine: number): string {
  return `${classId}#${methodName}:${startLine}`;
}

// =============================================================================
// Names
// =============================================================================

/**
 * Lowercase a name and collapse every run of non-alphanumerics into "-".
 * Used for markdown anchors and for comparing pattern names.
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
