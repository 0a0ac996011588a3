import { describe, it, expect } from '@jest/globals';
import { CompilerConfig } from '../../config/compiler.js';
import { FilterParserError, QueryBuilderError } from '../errors.js';
import { buildQueryOptions, compileQuery, parseFieldList } from '../QueryRequest.js';
import { FlowLogSchema } from '../schema/FlowLogSchema.js';

const schema = new FlowLogSchema();
const config: CompilerConfig = { defaultLimit: 20, defaultVersion: 2 };
const V2 = schema.getParsePattern(2);
const V5 = schema.getParsePattern(5);

describe('parseFieldList', () => {
  it('should return an empty list for missing values', () => {
    expect(parseFieldList(undefined)).toEqual([]);
    expect(parseFieldList([])).toEqual([]);
  });

  it('should split comma-separated values and trim entries', () => {
    expect(parseFieldList(['srcaddr, dstaddr', ' bytes '])).toEqual(['srcaddr', 'dstaddr', 'bytes']);
  });

  it('should drop empty entries', () => {
    expect(parseFieldList(['srcaddr,,', ' , dstport'])).toEqual(['srcaddr', 'dstport']);
  });
});

describe('buildQueryOptions', () => {
  it('should apply defaults before the verb', () => {
    expect(buildQueryOptions(schema, { verb: 'count' }, config)).toEqual([
      { kind: 'version', version: 2 },
      { kind: 'limit', limit: 20 },
      { kind: 'verb', verb: 'count' },
    ]);
  });

  it('should turn fields into one aggregation each', () => {
    const options = buildQueryOptions(
      schema,
      { verb: 'SUM', fields: ['bytes,packets'], groupBy: ['srcaddr'], limit: 5, version: 3 },
      config
    );
    expect(options).toEqual([
      { kind: 'version', version: 3 },
      { kind: 'limit', limit: 5 },
      { kind: 'verb', verb: 'sum' },
      {
        kind: 'aggregations',
        aggregations: [
          { field: 'bytes', verb: 'sum' },
          { field: 'packets', verb: 'sum' },
        ],
      },
      { kind: 'groupBy', fields: ['srcaddr'] },
    ]);
  });

  it('should pass fields through for raw', () => {
    const options = buildQueryOptions(schema, { verb: 'raw', fields: ['srcaddr', 'action'] }, config);
    expect(options[3]).toEqual({ kind: 'fields', fields: ['srcaddr', 'action'] });
  });

  it('should parse the filter with the schema', () => {
    const options = buildQueryOptions(schema, { verb: 'count', filter: 'duration > 10' }, config);
    expect(options[options.length - 1]).toEqual({
      kind: 'filter',
      filter: { type: 'gt', field: 'end - start', value: 10, source: 'duration' },
    });
  });

  it('should name the request verb when it is unknown', () => {
    expect(() => buildQueryOptions(schema, { verb: 'median' }, config)).toThrow(
      "invalid verb 'median': unknown verb: median. Must be one of: raw, count, sum, avg, min, max"
    );
  });
});

describe('compileQuery', () => {
  it('should count flows with the configured defaults', () => {
    expect(compileQuery(schema, { verb: 'count' }, config)).toBe(
      `${V2} | stats count(*) as flows | sort flows desc | limit 20`
    );
  });

  it('should compile a grouped, filtered aggregation', () => {
    const query = compileQuery(
      schema,
      {
        verb: 'sum',
        fields: ['bytes'],
        groupBy: ['srcaddr, dstport'],
        filter: "srcaddr = 10.0.0.0/16 and action = 'REJECT'",
        limit: 10,
      },
      config
    );
    expect(query).toBe(
      `${V2} | filter isIpv4InSubnet(srcaddr, '10.0.0.0/16') and action = 'REJECT' | stats sum(bytes) as bytes_sum by srcaddr, dstport | sort bytes_sum desc | limit 10`
    );
  });

  it('should compile raw listings', () => {
    expect(
      compileQuery(schema, { verb: 'raw', fields: ['srcaddr', 'flow_direction'], version: 5 }, config)
    ).toBe(`${V5} | display srcaddr, flow_direction | limit 20`);
  });

  it('should use the configured version', () => {
    const v5: CompilerConfig = { defaultLimit: 50, defaultVersion: 5 };
    expect(compileQuery(schema, { verb: 'count', groupBy: ['vpc_id'] }, v5)).toBe(
      `${V5} | stats count(*) as flows by vpc_id | sort flows desc | limit 50`
    );
  });

  it('should propagate filter errors', () => {
    expect(() => compileQuery(schema, { verb: 'count', filter: 'dstport = 99999' }, config)).toThrow(
      FilterParserError
    );
  });

  it('should propagate builder errors', () => {
    expect(() => compileQuery(schema, { verb: 'avg', fields: ['action'] }, config)).toThrow(
      QueryBuilderError
    );
    expect(() => compileQuery(schema, { verb: 'count', groupBy: ['vpc_id'] }, config)).toThrow(
      "invalid group by field 'vpc_id': invalid field 'vpc_id' for version 2"
    );
  });
});
