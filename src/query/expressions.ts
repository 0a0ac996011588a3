import {
  ComparisonExpr,
  ComparisonOperator,
  Expr,
  LiteralValue,
  LogicalExpr,
  NotExpr,
  PatternExpr,
  SubnetExpr,
} from './types.js';

// ============================================================================
// Factories
// ============================================================================

const comparison =
  (type: ComparisonOperator) =>
  (field: string, value: LiteralValue): ComparisonExpr => ({ type, field, value });

export const eq = comparison('eq');
export const neq = comparison('neq');
export const gt = comparison('gt');
export const lt = comparison('lt');
export const gte = comparison('gte');
export const lte = comparison('lte');

export function like(field: string, value: string): PatternExpr {
  return { type: 'like', field, value };
}

export function notLike(field: string, value: string): PatternExpr {
  return { type: 'notLike', field, value };
}

export function ipv4InSubnet(field: string, cidr: string): SubnetExpr {
  return { type: 'ipv4InSubnet', field, value: cidr };
}

export function and(...children: Expr[]): LogicalExpr {
  return { type: 'and', children };
}

export function or(...children: Expr[]): LogicalExpr {
  return { type: 'or', children };
}

export function not(child: Expr): NotExpr {
  return { type: 'not', child };
}

// ============================================================================
// Rendering
// ============================================================================

const COMPARISON_SYMBOLS: Record<ComparisonOperator, string> = {
  eq: '=',
  neq: '!=',
  gt: '>',
  lt: '<',
  gte: '>=',
  lte: '<=',
};

/**
 * Render a literal for the query language: numbers as-is, everything else
 * single-quoted with embedded single quotes escaped.
 */
export function quoteValue(value: LiteralValue): string {
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  return `'${value.replace(/'/g, "\\'")}'`;
}

// Spaces or arithmetic mean the field is an expression such as `end - start`
const COMPUTED_FIELD_PATTERN = /[ \-/*+()]/;

/**
 * Comparisons against a computed expression are wrapped in parentheses so
 * `end - start > 5` reads as `(end - start) > 5`.
 */
export function formatField(field: string): string {
  return COMPUTED_FIELD_PATTERN.test(field) ? `(${field})` : field;
}

/**
 * Serialize an expression tree to query-language filter syntax.
 *
 * `or` is always parenthesized, even with a single child; `and` never is.
 * The same tree always produces the same string.
 */
export function renderExpr(expr: Expr): string {
  switch (expr.type) {
    case 'eq':
    case 'neq':
    case 'gt':
    case 'lt':
    case 'gte':
    case 'lte':
      return `${formatField(expr.field)} ${COMPARISON_SYMBOLS[expr.type]} ${quoteValue(expr.value)}`;
    case 'like':
      return `${expr.field} like ${quoteValue(expr.value)}`;
    case 'notLike':
      return `${expr.field} not like ${quoteValue(expr.value)}`;
    case 'ipv4InSubnet':
      return `isIpv4InSubnet(${expr.field}, '${expr.value}')`;
    case 'and':
      return expr.children.map(renderExpr).join(' and ');
    case 'or':
      if (expr.children.length === 0) {
        return '';
      }
      return `(${expr.children.map(renderExpr).join(' or ')})`;
    case 'not':
      return `not ${renderExpr(expr.child)}`;
  }
}

// ============================================================================
// Tree helpers
// ============================================================================

/**
 * Mark every comparison and pattern leaf as originating from `source`.
 * Used when a computed field was expanded into its expression.
 */
export function withSource(expr: Expr, source: string): Expr {
  switch (expr.type) {
    case 'eq':
    case 'neq':
    case 'gt':
    case 'lt':
    case 'gte':
    case 'lte':
    case 'like':
    case 'notLike':
      return { ...expr, source };
    case 'ipv4InSubnet':
      return expr;
    case 'and':
    case 'or':
      return { type: expr.type, children: expr.children.map((child) => withSource(child, source)) };
    case 'not':
      return { type: 'not', child: withSource(expr.child, source) };
  }
}

/**
 * Schema field names referenced by the leaves of a tree, in order.
 */
export function collectFields(expr: Expr): string[] {
  switch (expr.type) {
    case 'and':
    case 'or':
      return expr.children.flatMap(collectFields);
    case 'not':
      return collectFields(expr.child);
    case 'ipv4InSubnet':
      return [expr.field];
    default:
      return [expr.source ?? expr.field];
  }
}
