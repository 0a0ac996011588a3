import { describe, it, expect } from '@jest/globals';
import { FilterParserError, SchemaError } from '../errors.js';
import { and, eq, gt, ipv4InSubnet, not, or, renderExpr } from '../expressions.js';
import { FieldTypeRegistry, NUMERIC_FIELD_TYPE, PORT_FIELD_TYPE } from '../FieldTypeRegistry.js';
import { parseFilter, parseFilterWithSchema, validateFilter } from '../FilterParser.js';
import { FlowLogSchema } from '../schema/FlowLogSchema.js';

describe('parseFilter', () => {
  describe('empty input', () => {
    it('should return undefined for empty or blank text', () => {
      expect(parseFilter('')).toBeUndefined();
      expect(parseFilter('   ')).toBeUndefined();
    });
  });

  describe('single clauses', () => {
    it('should parse a quoted port as a number', () => {
      expect(parseFilter("dstport = '443'")).toEqual({ type: 'eq', field: 'dstport', value: 443 });
    });

    it('should parse clauses without spaces around the operator', () => {
      expect(parseFilter('dstport=22')).toEqual({ type: 'eq', field: 'dstport', value: 22 });
    });

    it('should parse CIDR values into subnet checks', () => {
      expect(parseFilter("srcaddr = '10.0.0.0/24'")).toEqual({
        type: 'ipv4InSubnet',
        field: 'srcaddr',
        value: '10.0.0.0/24',
      });
    });

    it('should keep string values as strings', () => {
      expect(parseFilter('action = "REJECT"')).toEqual({
        type: 'eq',
        field: 'action',
        value: 'REJECT',
      });
    });

    it('should map protocol acronyms', () => {
      expect(parseFilter('protocol = tcp')).toEqual({ type: 'eq', field: 'protocol', value: 6 });
    });
  });

  describe('logical operators', () => {
    it('should keep keywords inside quoted values', () => {
      const expr = parseFilter("action = 'a and b' or dstport = 22");
      expect(expr).toEqual({
        type: 'or',
        children: [
          { type: 'eq', field: 'action', value: 'a and b' },
          { type: 'eq', field: 'dstport', value: 22 },
        ],
      });
    });

    it('should build an and node for two clauses', () => {
      expect(parseFilter('protocol = tcp and dstport = 443')).toEqual({
        type: 'and',
        children: [
          { type: 'eq', field: 'protocol', value: 6 },
          { type: 'eq', field: 'dstport', value: 443 },
        ],
      });
    });

    it('should bind and tighter than or', () => {
      const expr = parseFilter('dstport = 22 or dstport = 80 and protocol = tcp');
      expect(expr).toEqual({
        type: 'or',
        children: [
          { type: 'eq', field: 'dstport', value: 22 },
          {
            type: 'and',
            children: [
              { type: 'eq', field: 'dstport', value: 80 },
              { type: 'eq', field: 'protocol', value: 6 },
            ],
          },
        ],
      });
    });

    it('should honour parentheses', () => {
      const expr = parseFilter('(dstport = 22 or dstport = 80) and protocol = tcp');
      expect(expr).toEqual({
        type: 'and',
        children: [
          {
            type: 'or',
            children: [
              { type: 'eq', field: 'dstport', value: 22 },
              { type: 'eq', field: 'dstport', value: 80 },
            ],
          },
          { type: 'eq', field: 'protocol', value: 6 },
        ],
      });
    });

    it('should match logical keywords case-insensitively', () => {
      expect(parseFilter('dstport = 22 OR dstport = 23')).toEqual({
        type: 'or',
        children: [
          { type: 'eq', field: 'dstport', value: 22 },
          { type: 'eq', field: 'dstport', value: 23 },
        ],
      });
    });

    it('should unwrap redundant parentheses', () => {
      expect(parseFilter('((dstport = 443))')).toEqual({ type: 'eq', field: 'dstport', value: 443 });
    });

    it('should render parsed filters back to query syntax', () => {
      const expr = parseFilter("srcaddr = 10.0.0.0/24 and (action = 'ACCEPT' or action = 'REJECT')");
      expect(expr).toBeDefined();
      if (expr) {
        expect(renderExpr(expr)).toBe(
          "isIpv4InSubnet(srcaddr, '10.0.0.0/24') and (action = 'ACCEPT' or action = 'REJECT')"
        );
      }
    });
  });

  describe('errors', () => {
    it('should reject clauses without an operator', () => {
      expect(() => parseFilter('srcaddr 10.0.0.1')).toThrow('invalid filter clause: "srcaddr 10.0.0.1"');
    });

    it('should report the lexer stage for missing operators', () => {
      try {
        parseFilter('srcaddr 10.0.0.1');
        throw new Error('expected parseFilter to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(FilterParserError);
        if (error instanceof FilterParserError) {
          expect(error.stage).toBe('lexer');
          expect(error.snippet).toBe('srcaddr 10.0.0.1');
        }
      }
    });

    it('should reject a missing field name', () => {
      expect(() => parseFilter('= 443')).toThrow('missing field name in filter clause: "= 443"');
    });

    it('should reject empty groups', () => {
      expect(() => parseFilter('()')).toThrow('empty group in filter: "()"');
    });

    it('should reject ordering operators on string fields', () => {
      expect(() => parseFilter("action > 'ACCEPT'")).toThrow(
        'unsupported operator for string field action: ">"'
      );
    });

    it('should reject ordering operators on IP fields', () => {
      expect(() => parseFilter('srcaddr > 10.0.0.1')).toThrow(
        'unsupported operator for ip field srcaddr: ">"'
      );
    });

    it('should reject ports out of range', () => {
      expect(() => parseFilter('dstport = 70000')).toThrow('port out of range: 70000');
    });

    it('should reject invalid CIDR blocks', () => {
      expect(() => parseFilter('srcaddr = 10.0.0.0/40')).toThrow('invalid CIDR block: 10.0.0.0/40');
    });

    it('should surface errors from any clause of a compound filter', () => {
      expect(() => parseFilter('dstport = 443 and bytes > many')).toThrow(
        'invalid numeric value for field bytes: many'
      );
    });
  });

  describe('custom registries', () => {
    it('should validate against the supplied registry', () => {
      const registry = new FieldTypeRegistry().registerField('tcp_flags', NUMERIC_FIELD_TYPE);

      expect(parseFilter('tcp_flags > 2', { registry })).toEqual({
        type: 'gt',
        field: 'tcp_flags',
        value: 2,
      });
      // srcaddr is a plain string field in this registry
      expect(parseFilter('srcaddr = 10.0', { registry })).toEqual({
        type: 'eq',
        field: 'srcaddr',
        value: '10.0',
      });
    });

    it('should apply value validators of registered fields', () => {
      const registry = new FieldTypeRegistry().registerField('port', PORT_FIELD_TYPE);
      expect(() => parseFilter('port = 99999', { registry })).toThrow('port out of range: 99999');
    });
  });
});

describe('parseFilterWithSchema', () => {
  const schema = new FlowLogSchema();

  it('should expand computed fields into their expression', () => {
    expect(parseFilterWithSchema('duration > 1000', schema)).toEqual({
      type: 'gt',
      field: 'end - start',
      value: 1000,
      source: 'duration',
    });
  });

  it('should render computed comparisons with parentheses', () => {
    const expr = parseFilterWithSchema('duration >= 60 and protocol = udp', schema);
    expect(expr).toBeDefined();
    if (expr) {
      expect(renderExpr(expr)).toBe('(end - start) >= 60 and protocol = 17');
    }
  });

  it('should validate computed values with the registered class', () => {
    expect(() => parseFilterWithSchema('duration > soon', schema)).toThrow(
      'invalid numeric value for field end - start: soon'
    );
  });

  it('should accept any operator on computed fields without a registered class', () => {
    const registry = new FieldTypeRegistry();
    expect(parseFilterWithSchema('duration like 6', schema, { registry })).toEqual({
      type: 'like',
      field: 'end - start',
      value: '6',
      source: 'duration',
    });
  });

  it('should parse ordinary fields as parseFilter does', () => {
    expect(parseFilterWithSchema('dstport = 443', schema)).toEqual(parseFilter('dstport = 443'));
  });
});

describe('validateFilter', () => {
  const schema = new FlowLogSchema();

  it('should accept undefined', () => {
    expect(() => validateFilter(undefined, schema, 2)).not.toThrow();
  });

  it('should accept fields of the version', () => {
    expect(() => validateFilter(eq('dstport', 443), schema, 2)).not.toThrow();
    expect(() => validateFilter(eq('vpc_id', 'vpc-1'), schema, 3)).not.toThrow();
  });

  it('should reject fields missing from the version', () => {
    expect(() => validateFilter(eq('vpc_id', 'vpc-1'), schema, 2)).toThrow(
      "invalid field 'vpc_id' for version 2"
    );
  });

  it('should check every leaf', () => {
    const expr = {
      type: 'and' as const,
      children: [ipv4InSubnet('srcaddr', '10.0.0.0/8'), { type: 'not' as const, child: eq('flow_direction', 'ingress') }],
    };
    expect(() => validateFilter(expr, schema, 2)).toThrow(SchemaError);
    expect(() => validateFilter(expr, schema, 5)).not.toThrow();
  });

  it('should reject logical nodes without children', () => {
    expect(() => validateFilter(and(), schema, 2)).toThrow('empty and expression in filter');
    expect(() => validateFilter(not(or()), schema, 2)).toThrow(FilterParserError);
  });

  it('should validate computed leaves by their source name', () => {
    const expr = parseFilterWithSchema('duration > 5', schema);
    expect(() => validateFilter(expr, schema, 2)).not.toThrow();
    expect(() => validateFilter(gt('end - start', 5), schema, 2)).toThrow(SchemaError);
  });
});
