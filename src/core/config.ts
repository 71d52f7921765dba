/**
 * Configuration loading
 *
 * Reads .pattern-atlas/config.json from the project root. A missing file means
 * defaults; an invalid file is a ConfigurationError.
 *
 * @module
 */

import * as fs from "node:fs";
import type { AtlasConfig } from "../types/index.js";
import { getConfigPath, readJson, writeJson, createLogger } from "../utils/index.js";
import { AtlasConfigSchema, formatZodError, safeValidate } from "../utils/validation.js";
import { ConfigurationError } from "./errors.js";

const logger = createLogger("config");

/**
 * Configuration with every default applied
 */
export function getDefaultConfig(): AtlasConfig {
  const result = safeValidate(AtlasConfigSchema, {});
  if (!result.success) {
    throw new ConfigurationError("Default configuration is invalid", {
      issues: formatZodError(result.error),
    });
  }
  return result.data;
}

/**
 * Parse raw configuration data, filling in defaults
 */
export function parseConfig(data: unknown, source = "configuration"): AtlasConfig {
  const result = safeValidate(AtlasConfigSchema, data);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

/**
 * Load the project configuration
 */
export function loadConfig(projectRoot?: string): AtlasConfig {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    logger.debug({ configPath }, "No configuration file, using defaults");
    return getDefaultConfig();
  }

  let data: unknown;
  try {
    data = readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${configPath}`, {
      configPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const config = parseConfig(data, configPath);
  logger.debug({ configPath }, "Configuration loaded");
  return config;
}

/**
 * Write the default configuration. Returns false when a file already exists
 * and `force` is not set.
 */
export function writeDefaultConfig(projectRoot?: string, force = false): boolean {
  const configPath = getConfigPath(projectRoot);
  if (fs.existsSync(configPath) && !force) {
    return false;
  }
  writeJson(configPath, getDefaultConfig());
  logger.info({ configPath }, "Configuration written");
  return true;
}
