/**
 * Pattern Catalogue Module
 *
 * @module
 */

export type {
  PatternParticipantRole,
  PatternEntry,
  CatalogFilter,
  CategorySummary,
  CatalogOptions,
  IPatternCatalog,
  VerificationChecks,
  EntryVerification,
  CatalogVerification,
} from "./interfaces.js";

export { PatternCatalog, loadCatalog, getDefaultCatalogPath, getDefaultExamplesDir } from "./catalog.js";
export { verifyCatalog, hasImports } from "./verifier.js";
export { DEMOS, type Demo } from "./examples/index.js";
