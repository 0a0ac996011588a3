import { CompilerConfig, loadCompilerConfig } from '../config/compiler.js';
import { logger } from '../utils/logger.js';
import { QueryBuilderError } from './errors.js';
import { parseFilterWithSchema } from './FilterParser.js';
import {
  BuilderOption,
  createQueryBuilder,
  withAggregations,
  withFields,
  withFilter,
  withGroupBy,
  withLimit,
  withVerb,
  withVersion,
} from './QueryBuilder.js';
import { Schema } from './schema/Schema.js';
import { Verb } from './types.js';
import { isAggregationVerb, parseVerb } from './verbs.js';

/**
 * A query described the way a caller types it: verb name, comma-separated
 * field lists and filter text.
 */
export interface QueryRequest {
  verb: string;
  /** Aggregated fields, or displayed fields for `raw` */
  fields?: string[];
  groupBy?: string[];
  filter?: string;
  limit?: number;
  version?: number;
}

/**
 * Flatten repeated and comma-separated values:
 * `['srcaddr, dstaddr', 'bytes']` → `['srcaddr', 'dstaddr', 'bytes']`.
 */
export function parseFieldList(values: readonly string[] | undefined): string[] {
  if (!values || values.length === 0) {
    return [];
  }

  return values
    .join(',')
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
}

/**
 * Translate a request into builder options, in application order:
 * version, limit, verb, fields or aggregations, group-by, filter.
 */
export function buildQueryOptions(
  schema: Schema,
  request: QueryRequest,
  config: CompilerConfig = loadCompilerConfig()
): BuilderOption[] {
  const options: BuilderOption[] = [
    withVersion(request.version ?? config.defaultVersion),
    withLimit(request.limit ?? config.defaultLimit),
  ];

  let verb: Verb;
  try {
    verb = parseVerb(request.verb);
  } catch (error) {
    throw new QueryBuilderError(
      `invalid verb '${request.verb}': ${error instanceof Error ? error.message : String(error)}`,
      'verb',
      error instanceof Error ? error : undefined
    );
  }

  const fields = parseFieldList(request.fields);
  options.push(withVerb(verb));

  if (!isAggregationVerb(verb)) {
    if (fields.length > 0) {
      options.push(withFields(...fields));
    }
  } else if (fields.length > 0) {
    options.push(withAggregations(...fields.map((field) => ({ field, verb }))));
  }

  const groupBy = parseFieldList(request.groupBy);
  if (groupBy.length > 0) {
    options.push(withGroupBy(...groupBy));
  }

  if (request.filter) {
    options.push(withFilter(parseFilterWithSchema(request.filter, schema)));
  }

  return options;
}

/**
 * Build and render a request.
 * @throws FilterParserError for unparseable filter text
 * @throws QueryBuilderError for invalid options or an unrenderable query
 */
export function compileQuery(
  schema: Schema,
  request: QueryRequest,
  config: CompilerConfig = loadCompilerConfig()
): string {
  const builder = createQueryBuilder(schema, ...buildQueryOptions(schema, request, config));
  const query = builder.render();
  if (!query) {
    throw new QueryBuilderError('failed to build query', 'render');
  }

  logger.debug('builder', 'query compiled', { verb: request.verb, version: builder.version, query });
  return query;
}
