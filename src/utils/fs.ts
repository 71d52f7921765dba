/**
 * File System Utilities
 * File discovery and writing helpers for the CLI and analysis layer
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content);
}

/**
 * Find files matching glob patterns
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = true } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore: ["**/node_modules/**", "**/.git/**", ...ignore],
    dot: false,
  });
  return files.sort();
}

/**
 * Expand a mix of file and directory arguments into source files.
 * Files are taken as given; directories are globbed with the include and
 * ignore patterns. Missing paths are returned separately.
 */
export async function resolveSourcePaths(
  inputs: string[],
  include: string[],
  ignore: string[],
  cwd: string = process.cwd()
): Promise<{ files: string[]; missing: string[] }> {
  const files = new Set<string>();
  const missing: string[] = [];

  for (const input of inputs) {
    const absolute = path.resolve(cwd, input);
    let stats: fs.Stats;
    try {
      stats = await fsPromises.stat(absolute);
    } catch {
      missing.push(input);
      continue;
    }

    if (stats.isDirectory()) {
      for (const file of await findFiles({ patterns: include, ignore, cwd: absolute })) {
        files.add(file);
      }
    } else {
      files.add(absolute);
    }
  }

  return { files: [...files].sort(), missing };
}
