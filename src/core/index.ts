/**
 * Core module - everything the CLI builds on, usable as a library
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./config.js";
export * from "./catalog/index.js";
export * from "./documentation/index.js";
export * from "./analysis/index.js";

// Re-export types
export * from "../types/index.js";
