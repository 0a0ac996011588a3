import { QueryBuilderError } from './errors.js';
import { renderExpr } from './expressions.js';
import { validateFilter } from './FilterParser.js';
import { Schema } from './schema/Schema.js';
import { AggregationField, AggregationVerb, Expr, Verb } from './types.js';
import { aggregationAlias, isAggregationVerb } from './verbs.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_LIMIT = 100;

// ============================================================================
// Options
// ============================================================================

/**
 * One configuration step. Options are plain data and are applied in order by
 * createQueryBuilder(); the first invalid option aborts construction.
 */
export type BuilderOption =
  | { kind: 'verb'; verb: Verb }
  | { kind: 'fields'; fields: readonly string[] }
  | { kind: 'aggregations'; aggregations: readonly AggregationField[] }
  | { kind: 'groupBy'; fields: readonly string[] }
  | { kind: 'limit'; limit: number }
  | { kind: 'filter'; filter: Expr | undefined }
  | { kind: 'version'; version: number };

/** Set the query verb (single-aggregation path). `raw` selects records instead of aggregating. */
export const withVerb = (verb: Verb): BuilderOption => ({ kind: 'verb', verb });

/** Set the field of the single aggregation, or the fields displayed by `raw`. */
export const withFields = (...fields: string[]): BuilderOption => ({ kind: 'fields', fields });

export const withAggregations = (...aggregations: AggregationField[]): BuilderOption => ({
  kind: 'aggregations',
  aggregations,
});

export const withGroupBy = (...fields: string[]): BuilderOption => ({ kind: 'groupBy', fields });

export const withLimit = (limit: number): BuilderOption => ({ kind: 'limit', limit });

/** Add a filter; several filters are joined with `and`. Undefined adds nothing. */
export const withFilter = (filter: Expr | undefined): BuilderOption => ({ kind: 'filter', filter });

export const withVersion = (version: number): BuilderOption => ({ kind: 'version', version });

// ============================================================================
// State
// ============================================================================

interface BuilderState {
  aggregations: AggregationField[];
  /** Fields displayed by the raw verb */
  fields: string[];
  /** Fields set while aggregating, adopted if the verb later switches to raw */
  pendingFields: string[];
  groupBy: string[];
  filters: Expr[];
  limit: number;
  version: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function validateField(
  schema: Schema,
  field: string,
  version: number,
  option: 'fields' | 'aggregations' | 'groupBy'
): void {
  try {
    schema.validateField(field, version);
  } catch (error) {
    const label = option === 'groupBy' ? 'group by field' : 'field';
    throw new QueryBuilderError(
      `invalid ${label} '${field}': ${errorMessage(error)}`,
      option,
      asError(error)
    );
  }
}

function requireNumeric(
  schema: Schema,
  field: string,
  verb: AggregationVerb,
  option: 'verb' | 'fields' | 'aggregations'
): void {
  if (verb !== 'count' && !schema.isNumeric(field)) {
    throw new QueryBuilderError(`field '${field}' must be numeric for verb '${verb}'`, option);
  }
}

function applyVerb(state: BuilderState, schema: Schema, verb: Verb): void {
  if (!isAggregationVerb(verb)) {
    state.aggregations = [];
    if (state.pendingFields.length > 0) {
      state.fields = state.pendingFields;
      state.pendingFields = [];
    } else if (state.fields.length === 0) {
      state.fields = ['*'];
    }
    return;
  }

  const [first, ...rest] = state.aggregations;
  if (!first) {
    state.aggregations = [{ field: '*', verb }];
    return;
  }
  if (first.field !== '*') {
    requireNumeric(schema, first.field, verb, 'verb');
  }
  state.aggregations = [{ field: first.field, verb }, ...rest];
}

function applyFields(state: BuilderState, schema: Schema, fields: readonly string[]): void {
  for (const field of fields) {
    validateField(schema, field, state.version, 'fields');
  }

  const [first, ...rest] = state.aggregations;
  if (!first) {
    state.fields = [...fields];
    return;
  }

  state.pendingFields = [...fields];
  if (fields.length > 0) {
    requireNumeric(schema, fields[0], first.verb, 'fields');
    state.aggregations = [{ field: fields[0], verb: first.verb }, ...rest];
  }
}

function applyAggregations(
  state: BuilderState,
  schema: Schema,
  aggregations: readonly AggregationField[]
): void {
  if (aggregations.length === 0) {
    throw new QueryBuilderError('at least one aggregation is required', 'aggregations');
  }
  for (const aggregation of aggregations) {
    validateField(schema, aggregation.field, state.version, 'aggregations');
    requireNumeric(schema, aggregation.field, aggregation.verb, 'aggregations');
  }
  state.aggregations = aggregations.map((aggregation) => ({ ...aggregation }));
}

function applyOption(state: BuilderState, schema: Schema, option: BuilderOption): void {
  switch (option.kind) {
    case 'verb':
      applyVerb(state, schema, option.verb);
      return;
    case 'fields':
      applyFields(state, schema, option.fields);
      return;
    case 'aggregations':
      applyAggregations(state, schema, option.aggregations);
      return;
    case 'groupBy':
      for (const field of option.fields) {
        validateField(schema, field, state.version, 'groupBy');
      }
      state.groupBy = [...option.fields];
      return;
    case 'limit':
      if (!Number.isInteger(option.limit)) {
        throw new QueryBuilderError(`limit must be an integer, got ${option.limit}`, 'limit');
      }
      if (option.limit < 0) {
        throw new QueryBuilderError('limit must be non-negative', 'limit');
      }
      state.limit = option.limit;
      return;
    case 'filter':
      if (!option.filter) {
        return;
      }
      try {
        validateFilter(option.filter, schema, state.version);
      } catch (error) {
        throw new QueryBuilderError(errorMessage(error), 'filter', asError(error));
      }
      state.filters.push(option.filter);
      return;
    case 'version':
      try {
        schema.validateVersion(option.version);
      } catch (error) {
        throw new QueryBuilderError(
          `invalid version ${option.version}: ${errorMessage(error)}`,
          'version',
          asError(error)
        );
      }
      state.version = option.version;
      return;
  }
}

// ============================================================================
// Builder
// ============================================================================

/**
 * A configured query, rendered to the Logs Insights pipeline syntax:
 *
 * ```
 * parse ... | filter ... | stats ... by ... | sort <first alias> desc | limit N
 * ```
 *
 * The raw verb replaces `stats`/`sort` with a `display` clause when specific
 * fields were requested. Instances are created by createQueryBuilder() and are
 * not modified afterwards.
 */
export class QueryBuilder {
  private readonly schema: Schema;
  private readonly state: Readonly<BuilderState>;

  constructor(schema: Schema, state: BuilderState) {
    this.schema = schema;
    this.state = state;
  }

  get version(): number {
    return this.state.version;
  }

  get limit(): number {
    return this.state.limit;
  }

  get aggregations(): readonly AggregationField[] {
    return this.state.aggregations;
  }

  get fields(): readonly string[] {
    return this.state.fields;
  }

  get groupBy(): readonly string[] {
    return this.state.groupBy;
  }

  get filters(): readonly Expr[] {
    return this.state.filters;
  }

  /**
   * Render the query.
   * @throws QueryBuilderError when the schema has no parse pattern for the version
   */
  render(): string {
    let parsePattern: string;
    try {
      parsePattern = this.schema.getParsePattern(this.state.version);
    } catch (error) {
      throw new QueryBuilderError(errorMessage(error), 'render', asError(error));
    }

    const parts = [parsePattern];

    if (this.state.filters.length > 0) {
      parts.push(`filter ${renderExpr({ type: 'and', children: this.state.filters })}`);
    }

    if (this.state.aggregations.length > 0) {
      parts.push(this.buildStatsClause(), this.buildSortClause());
    } else if (this.state.fields.length > 0 && this.state.fields[0] !== '*') {
      parts.push(`display ${this.state.fields.map((field) => this.aliasedExpression(field)).join(', ')}`);
    }

    if (this.state.limit > 0) {
      parts.push(`limit ${this.state.limit}`);
    }

    return parts.join(' | ');
  }

  /**
   * Render the query, or an empty string when it cannot be rendered.
   * A partial query is never returned.
   */
  toString(): string {
    try {
      return this.render();
    } catch (error) {
      logger.warn('query render failed', { version: this.state.version, error });
      return '';
    }
  }

  private buildStatsClause(): string {
    const stats = this.state.aggregations.map((aggregation) => {
      const computed = this.schema.getComputedFieldExpression(aggregation.field, this.state.version);
      return `${aggregation.verb}(${computed || aggregation.field}) as ${aggregationAlias(aggregation)}`;
    });

    let clause = `stats ${stats.join(', ')}`;
    if (this.state.groupBy.length > 0) {
      clause += ` by ${this.state.groupBy.map((field) => this.aliasedExpression(field)).join(', ')}`;
    }
    return clause;
  }

  /** Results are always ordered by the first aggregation, descending. */
  private buildSortClause(): string {
    return `sort ${aggregationAlias(this.state.aggregations[0])} desc`;
  }

  /** `end - start as duration` for computed fields, the bare name otherwise */
  private aliasedExpression(field: string): string {
    const computed = this.schema.getComputedFieldExpression(field, this.state.version);
    return computed ? `${computed} as ${field}` : field;
  }
}

/**
 * Create a query builder from the schema defaults plus each option in order.
 *
 * Defaults: `count(*) as flows`, limit 100, the schema's default version.
 *
 * @throws QueryBuilderError for a missing schema or the first invalid option
 *
 * @example
 * ```typescript
 * const builder = createQueryBuilder(
 *   new FlowLogSchema(),
 *   withGroupBy('srcaddr'),
 *   withFilter(eq('action', 'REJECT')),
 *   withLimit(10)
 * );
 * builder.toString();
 * // parse @message ... | filter action = 'REJECT' | stats count(*) as flows by srcaddr
 * //   | sort flows desc | limit 10
 * ```
 */
export function createQueryBuilder(
  schema: Schema | undefined,
  ...options: BuilderOption[]
): QueryBuilder {
  if (!schema) {
    throw new QueryBuilderError('schema is required', 'schema');
  }

  const state: BuilderState = {
    aggregations: [{ field: '*', verb: 'count' }],
    fields: [],
    pendingFields: [],
    groupBy: [],
    filters: [],
    limit: DEFAULT_LIMIT,
    version: schema.getDefaultVersion(),
  };

  for (const option of options) {
    applyOption(state, schema, option);
  }

  logger.debug('builder', 'query builder created', {
    version: state.version,
    aggregations: state.aggregations,
    groupBy: state.groupBy,
    filterCount: state.filters.length,
    limit: state.limit,
  });

  return new QueryBuilder(schema, state);
}
