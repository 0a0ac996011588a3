import { QueryBuilderError } from './errors.js';
import { AggregationField, AggregationVerb, Verb } from './types.js';

export const VERBS: readonly Verb[] = ['raw', 'count', 'sum', 'avg', 'min', 'max'];

/** Alias used for `count(*)`, the default aggregation */
export const FLOW_COUNT_ALIAS = 'flows';

function isVerb(value: string): value is Verb {
  return VERBS.some((verb) => verb === value);
}

export function isAggregationVerb(verb: Verb): verb is AggregationVerb {
  return verb !== 'raw';
}

/**
 * Parse a verb name case-insensitively: `Sum` → `sum`.
 * @throws QueryBuilderError for unknown names
 */
export function parseVerb(text: string): Verb {
  const normalized = text.trim().toLowerCase();
  if (!isVerb(normalized)) {
    throw new QueryBuilderError(
      `unknown verb: ${text}. Must be one of: ${VERBS.join(', ')}`,
      'verb'
    );
  }
  return normalized;
}

/**
 * Column alias of an aggregation in the `stats` output:
 * `flows` for `count(*)`, otherwise `<field>_<verb>`.
 */
export function aggregationAlias(aggregation: AggregationField): string {
  if (aggregation.field === '*' && aggregation.verb === 'count') {
    return FLOW_COUNT_ALIAS;
  }
  return `${aggregation.field}_${aggregation.verb}`;
}
