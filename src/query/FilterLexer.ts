import { FilterOperator } from './types.js';

/**
 * Comparison operators in scan order. Longer operators come before the
 * shorter ones they contain, so `>=` is found before `>` and `!=` before `=`.
 */
export const OPERATOR_SCAN_ORDER: readonly FilterOperator[] = [
  '!=',
  'not like',
  '>=',
  '<=',
  '>',
  '<',
  '=',
  'like',
];

export type LogicalKeyword = 'and' | 'or';

export interface ClauseParts {
  field: string;
  operator: FilterOperator;
  value: string;
}

/**
 * Split `text` on a logical keyword at parenthesis depth zero.
 *
 * The keyword matches case-insensitively and only when surrounded by single
 * spaces, never inside a quoted value. Each part is trimmed. Text without a top-level keyword comes back as
 * a single part.
 */
export function splitOnLogical(text: string, keyword: LogicalKeyword): string[] {
  const parts: string[] = [];
  const lower = text.toLowerCase();
  const needle = ` ${keyword} `;
  let depth = 0;
  let lastSplit = 0;

  let quote: string | undefined;

  for (let i = 0; i + needle.length <= text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) {
        quote = undefined;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
    }

    if (depth === 0 && lower.startsWith(needle, i)) {
      parts.push(text.slice(lastSplit, i).trim());
      lastSplit = i + needle.length;
    }
  }

  parts.push(text.slice(lastSplit).trim());
  return parts;
}

/**
 * Remove any quote characters wrapping a value: `'10.0.0.1'` → `10.0.0.1`.
 */
export function stripQuotes(value: string): string {
  return value.replace(/^['"]+|['"]+$/g, '');
}

/**
 * Find the comparison operator of a single clause.
 *
 * A space-delimited operator wins (`srcaddr = 10.0.0.1`); only when none is
 * present is the clause scanned without spaces (`srcaddr=10.0.0.1`).
 *
 * @returns the field, operator and unquoted value, or undefined when the clause
 * has no operator
 */
export function locateOperator(clause: string): ClauseParts | undefined {
  const lower = clause.toLowerCase();

  for (const operator of OPERATOR_SCAN_ORDER) {
    const idx = lower.indexOf(` ${operator} `);
    if (idx !== -1) {
      return {
        field: clause.slice(0, idx).trim(),
        operator,
        value: stripQuotes(clause.slice(idx + operator.length + 2).trim()),
      };
    }
  }

  for (const operator of OPERATOR_SCAN_ORDER) {
    const idx = lower.indexOf(operator);
    if (idx !== -1) {
      return {
        field: clause.slice(0, idx).trim(),
        operator,
        value: stripQuotes(clause.slice(idx + operator.length).trim()),
      };
    }
  }

  return undefined;
}
