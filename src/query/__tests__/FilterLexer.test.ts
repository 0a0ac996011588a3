import { describe, it, expect } from '@jest/globals';
import { locateOperator, splitOnLogical, stripQuotes } from '../FilterLexer.js';

describe('splitOnLogical', () => {
  it('should return a single part when the keyword is absent', () => {
    expect(splitOnLogical('dstport = 443', 'and')).toEqual(['dstport = 443']);
  });

  it('should split on the keyword case-insensitively', () => {
    expect(splitOnLogical('a = 1 AND b = 2 and c = 3', 'and')).toEqual(['a = 1', 'b = 2', 'c = 3']);
  });

  it('should not split inside parentheses', () => {
    expect(splitOnLogical('(a = 1 or b = 2) or c = 3', 'or')).toEqual(['(a = 1 or b = 2)', 'c = 3']);
  });

  it('should only match the keyword between spaces', () => {
    expect(splitOnLogical("action = 'brand'", 'and')).toEqual(["action = 'brand'"]);
    expect(splitOnLogical('region = oregon', 'or')).toEqual(['region = oregon']);
  });

  it('should not split inside quoted values', () => {
    expect(splitOnLogical("action = 'a and b' and dstport = 22", 'and')).toEqual([
      "action = 'a and b'",
      'dstport = 22',
    ]);
    expect(splitOnLogical('tag = "x (or) y" or tag = z', 'or')).toEqual(['tag = "x (or) y"', 'tag = z']);
  });
});

describe('stripQuotes', () => {
  it('should remove wrapping quotes of either kind', () => {
    expect(stripQuotes("'ACCEPT'")).toBe('ACCEPT');
    expect(stripQuotes('"10.0.0.1"')).toBe('10.0.0.1');
    expect(stripQuotes('443')).toBe('443');
  });
});

describe('locateOperator', () => {
  it('should find spaced operators', () => {
    expect(locateOperator('dstport = 443')).toEqual({ field: 'dstport', operator: '=', value: '443' });
  });

  it('should prefer longer operators', () => {
    expect(locateOperator('bytes >= 100')).toEqual({ field: 'bytes', operator: '>=', value: '100' });
    expect(locateOperator("action != 'REJECT'")).toEqual({
      field: 'action',
      operator: '!=',
      value: 'REJECT',
    });
  });

  it('should find unspaced operators', () => {
    expect(locateOperator('dstport=443')).toEqual({ field: 'dstport', operator: '=', value: '443' });
    expect(locateOperator('bytes<=10')).toEqual({ field: 'bytes', operator: '<=', value: '10' });
  });

  it('should find word operators', () => {
    expect(locateOperator("srcaddr not like '10.0'")).toEqual({
      field: 'srcaddr',
      operator: 'not like',
      value: '10.0',
    });
    expect(locateOperator('srcaddr LIKE 10.0')).toEqual({
      field: 'srcaddr',
      operator: 'like',
      value: '10.0',
    });
  });

  it('should return undefined without an operator', () => {
    expect(locateOperator('srcaddr 10.0.0.1')).toBeUndefined();
  });
});
