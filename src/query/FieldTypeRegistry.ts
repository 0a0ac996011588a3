import { isIP } from 'node:net';

import { FilterParserError } from './errors.js';
import { eq, gt, gte, ipv4InSubnet, like, lt, lte, neq, not, notLike } from './expressions.js';
import { Expr, FilterOperator, LiteralValue } from './types.js';

export const MIN_PORT = 0;
export const MAX_PORT = 65535;
const MAX_IP_OCTET = 255;

/** Bare dotted prefix like `10`, `10.0` or `192.168.1` */
const IP_PREFIX_PATTERN = /^\d{1,3}(\.\d{1,3}){0,3}$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const EQUALITY_OPERATORS: readonly FilterOperator[] = ['=', '!=', 'like', 'not like'];
const ORDERED_OPERATORS: readonly FilterOperator[] = ['=', '!=', '>', '<', '>=', '<='];

/** IANA protocol numbers for the acronyms accepted in filters */
export const PROTOCOL_NUMBERS: ReadonlyMap<string, number> = new Map([
  ['tcp', 6],
  ['udp', 17],
  ['icmp', 1],
  ['icmpv6', 58],
  ['esp', 50],
  ['ah', 51],
]);

export type FieldParser = (field: string, operator: FilterOperator, value: string) => Expr;

/**
 * Validation and parsing rules shared by every field of one class.
 */
export interface FieldType {
  /** Class name used in error messages (`ip`, `port`, ...) */
  name: string;
  supportedOperators: readonly FilterOperator[];
  /** Throws when the raw value is not acceptable for the class */
  valueValidator?: (value: string) => void;
  parse: FieldParser;
}

// ============================================================================
// Value helpers
// ============================================================================

export function parseInteger(value: string): number | undefined {
  return INTEGER_PATTERN.test(value) ? Number(value) : undefined;
}

/**
 * Integer text becomes an integer, float text a float, anything else stays a
 * string. Integers past `Number.MAX_SAFE_INTEGER` become bigint; floats that
 * overflow to Infinity are not numbers.
 */
export function coerceLiteral(value: string): LiteralValue {
  if (INTEGER_PATTERN.test(value)) {
    const integer = Number(value);
    return Number.isSafeInteger(integer) ? integer : BigInt(value);
  }
  if (FLOAT_PATTERN.test(value)) {
    const float = Number(value);
    return Number.isFinite(float) ? float : value;
  }
  return value;
}

function isNumericText(value: string): boolean {
  return typeof coerceLiteral(value) !== 'string';
}

/**
 * Build a comparison for any operator with automatic value coercion.
 * `like`/`not like` keep the raw text as the pattern.
 */
export function buildComparison(field: string, operator: FilterOperator, value: string): Expr {
  const literal = coerceLiteral(value);
  switch (operator) {
    case '=':
      return eq(field, literal);
    case '!=':
      return neq(field, literal);
    case '>':
      return gt(field, literal);
    case '<':
      return lt(field, literal);
    case '>=':
      return gte(field, literal);
    case '<=':
      return lte(field, literal);
    case 'like':
      return like(field, value);
    case 'not like':
      return notLike(field, value);
  }
}

function isValidIpPrefix(prefix: string): boolean {
  if (!IP_PREFIX_PATTERN.test(prefix)) {
    return false;
  }
  return prefix.split('.').every((part) => Number(part) <= MAX_IP_OCTET);
}

function isValidCidr(value: string): boolean {
  const slash = value.lastIndexOf('/');
  const address = value.slice(0, slash);
  const bits = value.slice(slash + 1);
  const family = isIP(address);
  if (family === 0 || !/^(0|[1-9]\d{0,2})$/.test(bits)) {
    return false;
  }
  return Number(bits) <= (family === 4 ? 32 : 128);
}

// ============================================================================
// Field class parsers
// ============================================================================

/**
 * IP fields branch on the literal shape: CIDR blocks become subnet checks,
 * full addresses equality, and dotted prefixes pattern matches.
 */
function parseIpField(field: string, operator: FilterOperator, value: string): Expr {
  const negated = operator === '!=' || operator === 'not like';

  if (value.includes('/')) {
    if (!isValidCidr(value)) {
      throw new FilterParserError({
        message: `invalid CIDR block: ${value}`,
        stage: 'parser',
        snippet: value,
        field,
        hint: 'CIDR blocks look like 10.0.0.0/24',
      });
    }
    const subnet = ipv4InSubnet(field, value);
    return negated ? not(subnet) : subnet;
  }

  if (isIP(value) !== 0) {
    // a full address has nothing to pattern-match, so like is equality
    return negated ? neq(field, value) : eq(field, value);
  }

  if (isValidIpPrefix(value)) {
    return negated ? notLike(field, value) : like(field, value);
  }

  throw new FilterParserError({
    message: `invalid IP, CIDR, or prefix value for field ${field}: ${value}`,
    stage: 'parser',
    snippet: value,
    field,
    hint: 'Use a full address (10.0.0.1), a CIDR block (10.0.0.0/24) or a prefix (10.0)',
  });
}

function validatePort(value: string): void {
  const port = parseInteger(value);
  if (port === undefined) {
    throw new FilterParserError({
      message: `invalid port value: ${value}`,
      stage: 'parser',
      snippet: value,
      hint: 'Ports are integers between 0 and 65535',
    });
  }
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new FilterParserError({
      message: `port out of range: ${port}`,
      stage: 'parser',
      snippet: value,
      hint: 'Ports are integers between 0 and 65535',
    });
  }
}

function parseProtocolField(field: string, operator: FilterOperator, value: string): Expr {
  if (INTEGER_PATTERN.test(value)) {
    return buildComparison(field, operator, value);
  }

  const known = PROTOCOL_NUMBERS.get(value.toLowerCase());
  if (known !== undefined) {
    return buildComparison(field, operator, String(known));
  }

  // unknown names pass through for custom protocol values
  return buildComparison(field, operator, value);
}

function parseNumericField(field: string, operator: FilterOperator, value: string): Expr {
  if (!isNumericText(value)) {
    throw new FilterParserError({
      message: `invalid numeric value for field ${field}: ${value}`,
      stage: 'parser',
      snippet: value,
      field,
      hint: 'Numeric fields compare against integers or decimals, e.g. bytes > 1000',
    });
  }
  return buildComparison(field, operator, value);
}

function parseStringField(field: string, operator: FilterOperator, value: string): Expr {
  switch (operator) {
    case '=':
      return eq(field, value);
    case '!=':
      return neq(field, value);
    case 'like':
      return like(field, value);
    case 'not like':
      return notLike(field, value);
    default:
      throw new FilterParserError({
        message: `unsupported operator for non-numeric field: "${operator}"`,
        stage: 'parser',
        field,
        snippet: operator,
        hint: 'String fields support =, !=, like and not like',
      });
  }
}

// ============================================================================
// Field classes
// ============================================================================

export const IP_FIELD_TYPE: FieldType = {
  name: 'ip',
  supportedOperators: EQUALITY_OPERATORS,
  parse: parseIpField,
};

export const PORT_FIELD_TYPE: FieldType = {
  name: 'port',
  supportedOperators: ORDERED_OPERATORS,
  valueValidator: validatePort,
  parse: buildComparison,
};

export const PROTOCOL_FIELD_TYPE: FieldType = {
  name: 'protocol',
  supportedOperators: ORDERED_OPERATORS,
  parse: parseProtocolField,
};

export const NUMERIC_FIELD_TYPE: FieldType = {
  name: 'numeric',
  supportedOperators: ORDERED_OPERATORS,
  parse: parseNumericField,
};

/** Applied to every field that has no registration. */
export const STRING_FIELD_TYPE: FieldType = {
  name: 'string',
  supportedOperators: EQUALITY_OPERATORS,
  parse: parseStringField,
};

const DEFAULT_REGISTRATIONS: ReadonlyArray<readonly [string, FieldType]> = [
  ['srcaddr', IP_FIELD_TYPE],
  ['dstaddr', IP_FIELD_TYPE],
  ['pkt_srcaddr', IP_FIELD_TYPE],
  ['pkt_dstaddr', IP_FIELD_TYPE],
  ['srcport', PORT_FIELD_TYPE],
  ['dstport', PORT_FIELD_TYPE],
  ['protocol', PROTOCOL_FIELD_TYPE],
  ['packets', NUMERIC_FIELD_TYPE],
  ['bytes', NUMERIC_FIELD_TYPE],
  ['start', NUMERIC_FIELD_TYPE],
  ['end', NUMERIC_FIELD_TYPE],
  ['duration', NUMERIC_FIELD_TYPE],
];

// ============================================================================
// Registry
// ============================================================================

/**
 * Immutable map from field name to field class.
 *
 * `registerField` returns a new registry, so several registries (e.g. one per
 * schema or per test) can coexist without sharing state.
 */
export class FieldTypeRegistry {
  private readonly fields: ReadonlyMap<string, FieldType>;

  constructor(entries: Iterable<readonly [string, FieldType]> = []) {
    this.fields = new Map(entries);
  }

  static createDefault(): FieldTypeRegistry {
    return new FieldTypeRegistry(DEFAULT_REGISTRATIONS);
  }

  getFieldType(field: string): FieldType | undefined {
    return this.fields.get(field);
  }

  /** Field type to apply, falling back to the generic string class. */
  resolve(field: string): FieldType {
    return this.fields.get(field) ?? STRING_FIELD_TYPE;
  }

  registerField(field: string, fieldType: FieldType): FieldTypeRegistry {
    return new FieldTypeRegistry([...this.fields, [field, fieldType]]);
  }

  get size(): number {
    return this.fields.size;
  }
}

export const DEFAULT_FIELD_REGISTRY = FieldTypeRegistry.createDefault();
