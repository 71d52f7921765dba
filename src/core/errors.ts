/**
 * Error Classes for pattern-atlas
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Catalogue errors (1xxx)
  CATALOG_INVALID = "E1000",
  CATALOG_NOT_FOUND = "E1001",
  PATTERN_NOT_FOUND = "E1002",
  SNIPPET_NOT_FOUND = "E1003",
  DEMO_FAILED = "E1004",

  // Documentation errors (2xxx)
  REFERENCE_NOT_FOUND = "E2000",
  INVALID_SECTION_LEVEL = "E2002",

  // Analysis errors (3xxx)
  SOURCE_NOT_FOUND = "E3001",

  // General errors (9xxx)
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all pattern-atlas errors
 */
export class PatternAtlasError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PatternAtlasError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Catalogue loading and lookup errors
 */
export class CatalogError extends PatternAtlasError {
  public readonly patternId?: string;
  public readonly suggestions: string[];

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown> & { patternId?: string; suggestions?: string[] }
  ) {
    super(message, code, context);
    this.name = "CatalogError";
    this.patternId = context?.patternId;
    this.suggestions = context?.suggestions ?? [];
  }
}

/**
 * Reference rendering and parsing errors
 */
export class DocumentationError extends PatternAtlasError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "DocumentationError";
    this.filePath = context?.filePath;
  }

  toString(): string {
    const location = this.filePath ? ` at ${this.filePath}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Source extraction and pattern detection errors
 */
export class AnalysisError extends PatternAtlasError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "AnalysisError";
    this.filePath = context?.filePath;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends PatternAtlasError {
  public readonly issues: string[];

  constructor(message: string, context?: Record<string, unknown> & { issues?: string[] }) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
    this.issues = context?.issues ?? [];
  }
}
