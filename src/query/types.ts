// ============================================================================
// Expression Tree
// ============================================================================

/**
 * A literal compared against a field. Numbers render unquoted; integers beyond
 * the safe range are kept as bigint so their digits survive.
 */
export type LiteralValue = string | number | bigint;

export type ComparisonOperator = 'eq' | 'neq' | 'gt' | 'lt' | 'gte' | 'lte';

export interface ComparisonExpr {
  readonly type: ComparisonOperator;
  readonly field: string;
  readonly value: LiteralValue;
  /** Schema field name when `field` holds a computed expression (e.g. `duration`) */
  readonly source?: string;
}

export interface PatternExpr {
  readonly type: 'like' | 'notLike';
  readonly field: string;
  readonly value: string;
  readonly source?: string;
}

/** CIDR membership: `isIpv4InSubnet(field, 'cidr')` */
export interface SubnetExpr {
  readonly type: 'ipv4InSubnet';
  readonly field: string;
  readonly value: string;
}

export interface LogicalExpr {
  readonly type: 'and' | 'or';
  readonly children: readonly Expr[];
}

export interface NotExpr {
  readonly type: 'not';
  readonly child: Expr;
}

export type LeafExpr = ComparisonExpr | PatternExpr | SubnetExpr;

/**
 * Closed set of filter expression nodes. Nodes are never mutated after
 * construction; renderExpr() and validateFilter() match on `type` exhaustively.
 */
export type Expr = LeafExpr | LogicalExpr | NotExpr;

// ============================================================================
// Operators accepted in filter text
// ============================================================================

export type FilterOperator = '=' | '!=' | '>' | '<' | '>=' | '<=' | 'like' | 'not like';

// ============================================================================
// Aggregations
// ============================================================================

export type Verb = 'raw' | 'count' | 'sum' | 'avg' | 'min' | 'max';

export type AggregationVerb = Exclude<Verb, 'raw'>;

export interface AggregationField {
  field: string;
  verb: AggregationVerb;
}
