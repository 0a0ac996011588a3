/**
 * Filter Expression Parser
 *
 * Parses the filter DSL typed on a command line (`--filter`) into a typed
 * expression tree, validating each comparison against the class of its field
 * (IP, port, protocol, numeric or generic string).
 *
 * @remarks
 * **DSL Syntax:**
 * - Comparison operators: `=`, `!=`, `>`, `<`, `>=`, `<=`, `like`, `not like`
 * - Logical operators: `and`, `or` (case-insensitive, space-delimited)
 * - Parentheses group sub-expressions
 * - Values may be bare or wrapped in single or double quotes
 * - Operators may omit surrounding spaces: `dstport=443`
 *
 * **Examples:**
 * ```
 * srcaddr = 10.0.0.0/24 and dstport = 443
 * protocol = tcp or protocol = udp
 * action = 'REJECT' and (dstport < 1024 or duration > 300)
 * ```
 *
 * **Grammar:**
 * ```
 * Expression := Or
 * Or         := And ('or' And)*
 * And        := Primary ('and' Primary)*
 * Primary    := '(' Or ')' | Clause
 * Clause     := Field Operator Value
 * ```
 *
 * A level with a single operand yields that operand directly; `and`/`or`
 * nodes only exist for two or more operands.
 */

import { FilterParserError } from './errors.js';
import { collectFields, withSource } from './expressions.js';
import { buildComparison, DEFAULT_FIELD_REGISTRY, FieldTypeRegistry } from './FieldTypeRegistry.js';
import { locateOperator, splitOnLogical } from './FilterLexer.js';
import { Schema } from './schema/Schema.js';
import { Expr } from './types.js';
import { logger } from '../utils/logger.js';

export interface ParseFilterOptions {
  /** Field classes to validate against. Defaults to the flow log registry. */
  registry?: FieldTypeRegistry;
}

interface ParseContext {
  registry: FieldTypeRegistry;
  schema?: Schema;
}

// ============================================================================
// Parser
// ============================================================================

function parseExpression(text: string, ctx: ParseContext): Expr {
  return parseOr(text.trim(), ctx);
}

function parseOr(text: string, ctx: ParseContext): Expr {
  const parts = splitOnLogical(text, 'or');
  if (parts.length === 1) {
    return parseAnd(text, ctx);
  }
  return { type: 'or', children: parts.map((part) => parseAnd(part, ctx)) };
}

function parseAnd(text: string, ctx: ParseContext): Expr {
  const parts = splitOnLogical(text, 'and');
  if (parts.length === 1) {
    return parsePrimary(text, ctx);
  }
  return { type: 'and', children: parts.map((part) => parsePrimary(part, ctx)) };
}

function parsePrimary(text: string, ctx: ParseContext): Expr {
  const trimmed = text.trim();
  if (trimmed.startsWith('(') && trimmed.endsWith(')')) {
    const inner = trimmed.slice(1, -1);
    if (inner.trim() === '') {
      throw new FilterParserError({
        message: `empty group in filter: "${trimmed}"`,
        stage: 'parser',
        snippet: trimmed,
        hint: 'Parentheses must contain at least one comparison',
      });
    }
    return parseExpression(inner, ctx);
  }
  return parseClause(trimmed, ctx);
}

/**
 * Clause := Field Operator Value
 */
function parseClause(clause: string, ctx: ParseContext): Expr {
  const parts = locateOperator(clause);
  if (!parts) {
    throw new FilterParserError({
      message: `invalid filter clause: "${clause}"`,
      stage: 'lexer',
      snippet: clause,
      hint: 'Each clause needs a field, an operator (=, !=, >, <, >=, <=, like, not like) and a value',
    });
  }

  const { field, operator, value } = parts;
  if (field === '') {
    throw new FilterParserError({
      message: `missing field name in filter clause: "${clause}"`,
      stage: 'parser',
      snippet: clause,
      hint: 'Put the field before the operator, e.g. dstport = 443',
    });
  }

  const computed = ctx.schema?.getComputedFieldExpression(field, ctx.schema.getDefaultVersion());
  const registered = ctx.registry.getFieldType(field);

  // computed fields without a registered class accept any operator
  if (computed && !registered) {
    return withSource(buildComparison(computed, operator, value), field);
  }

  const fieldType = registered ?? ctx.registry.resolve(field);
  if (!fieldType.supportedOperators.includes(operator)) {
    throw new FilterParserError({
      message: `unsupported operator for ${fieldType.name} field ${field}: "${operator}"`,
      stage: 'parser',
      snippet: clause,
      field,
      hint: `Supported operators for ${field}: ${fieldType.supportedOperators.join(', ')}`,
    });
  }

  fieldType.valueValidator?.(value);

  if (computed) {
    return withSource(fieldType.parse(computed, operator, value), field);
  }

  return fieldType.parse(field, operator, value);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse a filter expression into an expression tree.
 *
 * @returns the tree, or undefined when the text is empty (no filter)
 * @throws FilterParserError when a clause has no operator, uses an operator
 * its field class does not support, or carries an invalid value
 *
 * @example
 * ```typescript
 * parseFilter("srcaddr = '10.0.0.0/24'");
 * // { type: 'ipv4InSubnet', field: 'srcaddr', value: '10.0.0.0/24' }
 *
 * parseFilter('protocol = tcp and dstport = 443');
 * // { type: 'and', children: [
 * //   { type: 'eq', field: 'protocol', value: 6 },
 * //   { type: 'eq', field: 'dstport', value: 443 } ] }
 * ```
 */
export function parseFilter(text: string, options: ParseFilterOptions = {}): Expr | undefined {
  return parseWithContext(text, { registry: options.registry ?? DEFAULT_FIELD_REGISTRY });
}

/**
 * Parse a filter expression, expanding computed schema fields into their
 * expressions: `duration > 300` becomes `(end - start) > 300`.
 */
export function parseFilterWithSchema(
  text: string,
  schema: Schema,
  options: ParseFilterOptions = {}
): Expr | undefined {
  return parseWithContext(text, {
    registry: options.registry ?? DEFAULT_FIELD_REGISTRY,
    schema,
  });
}

function parseWithContext(text: string, ctx: ParseContext): Expr | undefined {
  const trimmed = text.trim();
  if (trimmed === '') {
    return undefined;
  }

  const expr = parseExpression(trimmed, ctx);
  logger.debug('parser', 'filter parsed', { filter: trimmed, fields: collectFields(expr) });
  return expr;
}

/**
 * Re-check every leaf field of a tree against a schema version.
 *
 * Values were validated when the text was parsed; this pass covers trees built
 * in code, which never went through the parser.
 *
 * @throws SchemaError for the first field that is not valid in the version
 * @throws FilterParserError for an `and`/`or` node without children
 */
export function validateFilter(expr: Expr | undefined, schema: Schema, version: number): void {
  if (!expr) {
    return;
  }

  switch (expr.type) {
    case 'and':
    case 'or':
      if (expr.children.length === 0) {
        throw new FilterParserError({
          message: `empty ${expr.type} expression in filter`,
          stage: 'validator',
          hint: `Give ${expr.type}() at least one condition`,
        });
      }
      for (const child of expr.children) {
        validateFilter(child, schema, version);
      }
      return;
    case 'not':
      validateFilter(expr.child, schema, version);
      return;
    case 'ipv4InSubnet':
      schema.validateField(expr.field, version);
      return;
    default:
      schema.validateField(expr.source ?? expr.field, version);
  }
}
