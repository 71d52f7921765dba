/**
 * Analysis Module
 *
 * Design pattern detection over TypeScript source.
 *
 * @module
 */

export * from "./patterns/index.js";
