// ============================================================================
// Filter Parser Error
// ============================================================================

export type FilterParserStage = 'lexer' | 'parser' | 'validator';

/**
 * Structured error for filter parsing failures with detailed context
 */
export class FilterParserError extends Error {
  /** Stage where the error occurred */
  public readonly stage: FilterParserStage;

  /** The clause or value that could not be parsed */
  public readonly snippet?: string;

  /** Field the failing clause refers to (if known) */
  public readonly field?: string;

  /** Human-readable troubleshooting hint */
  public readonly hint?: string;

  constructor(options: {
    message: string;
    stage: FilterParserStage;
    snippet?: string;
    field?: string;
    hint?: string;
  }) {
    super(options.message);
    this.name = 'FilterParserError';
    this.stage = options.stage;
    this.snippet = options.snippet;
    this.field = options.field;
    this.hint = options.hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FilterParserError);
    }
  }
}

// ============================================================================
// Schema Error
// ============================================================================

/**
 * Raised by a Schema when a version or field is not part of it.
 */
export class SchemaError extends Error {
  public readonly version: number;
  public readonly field?: string;

  constructor(message: string, version: number, field?: string) {
    super(message);
    this.name = 'SchemaError';
    this.version = version;
    this.field = field;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaError);
    }
  }
}

// ============================================================================
// Query Builder Error
// ============================================================================

export type BuilderOptionKind =
  | 'schema'
  | 'verb'
  | 'fields'
  | 'aggregations'
  | 'groupBy'
  | 'limit'
  | 'filter'
  | 'version'
  | 'render';

/**
 * Error raised while applying a builder option or rendering a query.
 * The first failing option aborts construction.
 */
export class QueryBuilderError extends Error {
  /** Option that was being applied when the error occurred */
  public readonly option: BuilderOptionKind;
  public readonly cause?: Error;

  constructor(message: string, option: BuilderOptionKind, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'QueryBuilderError';
    this.option = option;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryBuilderError);
    }
  }
}
