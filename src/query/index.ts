export type {
  AggregationField,
  AggregationVerb,
  ComparisonExpr,
  Expr,
  FilterOperator,
  LeafExpr,
  LiteralValue,
  LogicalExpr,
  NotExpr,
  PatternExpr,
  SubnetExpr,
  Verb,
} from './types.js';
export {
  and,
  collectFields,
  eq,
  gt,
  gte,
  ipv4InSubnet,
  like,
  lt,
  lte,
  neq,
  not,
  notLike,
  or,
  renderExpr,
} from './expressions.js';
export type { BuilderOptionKind, FilterParserStage } from './errors.js';
export { FilterParserError, QueryBuilderError, SchemaError } from './errors.js';
export type { FieldParser, FieldType } from './FieldTypeRegistry.js';
export { DEFAULT_FIELD_REGISTRY, FieldTypeRegistry } from './FieldTypeRegistry.js';
export type { ParseFilterOptions } from './FilterParser.js';
export { parseFilter, parseFilterWithSchema, validateFilter } from './FilterParser.js';
export type { BuilderOption } from './QueryBuilder.js';
export {
  createQueryBuilder,
  DEFAULT_LIMIT,
  QueryBuilder,
  withAggregations,
  withFields,
  withFilter,
  withGroupBy,
  withLimit,
  withVerb,
  withVersion,
} from './QueryBuilder.js';
export type { QueryRequest } from './QueryRequest.js';
export { buildQueryOptions, compileQuery, parseFieldList } from './QueryRequest.js';
export type { Schema } from './schema/Schema.js';
export { DEFAULT_FLOW_LOG_VERSION, FlowLogSchema } from './schema/FlowLogSchema.js';
export { aggregationAlias, parseVerb, VERBS } from './verbs.js';
