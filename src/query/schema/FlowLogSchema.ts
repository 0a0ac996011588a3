import { SchemaError } from '../errors.js';
import { Schema } from './Schema.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_FLOW_LOG_VERSION = 2;

const V2_FIELDS = [
  'version',
  'account_id',
  'interface_id',
  'srcaddr',
  'dstaddr',
  'srcport',
  'dstport',
  'protocol',
  'packets',
  'bytes',
  'start',
  'end',
  'action',
  'log_status',
] as const;

const V3_FIELDS = [
  ...V2_FIELDS,
  'vpc_id',
  'subnet_id',
  'instance_id',
  'tcp_flags',
  'type',
  'pkt_srcaddr',
  'pkt_dstaddr',
  'region',
  'az_id',
  'sublocation_type',
  'sublocation_id',
  'pkt_src_aws_service',
  'pkt_dst_aws_service',
  'flow_direction',
  'traffic_path',
] as const;

/** Versions 3 and 5 share the extended custom-format field list. */
const VERSION_FIELDS: ReadonlyMap<number, readonly string[]> = new Map<number, readonly string[]>([
  [2, V2_FIELDS],
  [3, V3_FIELDS],
  [5, V3_FIELDS],
]);

const NUMERIC_FIELDS: ReadonlySet<string> = new Set([
  'srcport',
  'dstport',
  'protocol',
  'packets',
  'bytes',
  'start',
  'end',
  'duration',
]);

const COMPUTED_FIELDS: ReadonlyMap<string, string> = new Map([
  // seconds between the first and last packet of the window
  ['duration', 'end - start'],
]);

/**
 * Build the `parse` statement: one `*` per field, space-separated, mapped to
 * the field names in record order.
 */
function buildParsePattern(fields: readonly string[]): string {
  const placeholders = fields.map(() => '*').join(' ');
  return `parse @message "${placeholders}" as ${fields.join(', ')}`;
}

/**
 * Schema for VPC flow log records (versions 2, 3 and 5).
 */
export class FlowLogSchema implements Schema {
  private readonly parsePatterns: ReadonlyMap<number, string>;

  constructor() {
    const patterns = new Map<number, string>();
    for (const [version, fields] of VERSION_FIELDS) {
      patterns.set(version, buildParsePattern(fields));
    }
    this.parsePatterns = patterns;

    logger.debug('schema', 'flow log schema ready', {
      versions: [...patterns.keys()],
      defaultVersion: DEFAULT_FLOW_LOG_VERSION,
    });
  }

  getParsePattern(version: number): string {
    const pattern = this.parsePatterns.get(version);
    if (pattern === undefined) {
      throw new SchemaError(
        `unsupported VPC Flow Log version for parse pattern: ${version}`,
        version
      );
    }
    return pattern;
  }

  validateField(field: string, version: number): void {
    const fields = VERSION_FIELDS.get(version);
    if (!fields) {
      throw new SchemaError(`invalid flow log version: ${version}`, version, field);
    }

    if (field === '*' || COMPUTED_FIELDS.has(field)) {
      return;
    }

    if (!fields.includes(field)) {
      throw new SchemaError(`invalid field '${field}' for version ${version}`, version, field);
    }
  }

  validateVersion(version: number): void {
    if (!VERSION_FIELDS.has(version)) {
      throw new SchemaError(`invalid flow log version: ${version}`, version);
    }
  }

  getDefaultVersion(): number {
    return DEFAULT_FLOW_LOG_VERSION;
  }

  isNumeric(field: string): boolean {
    return NUMERIC_FIELDS.has(field);
  }

  getComputedFieldExpression(field: string, _version: number): string {
    return COMPUTED_FIELDS.get(field) ?? '';
  }

  getFields(version: number): readonly string[] {
    this.validateVersion(version);
    return VERSION_FIELDS.get(version) ?? [];
  }

  getComputedFields(): readonly string[] {
    return [...COMPUTED_FIELDS.keys()];
  }

  /** Supported record versions, ascending. */
  getVersions(): number[] {
    return [...VERSION_FIELDS.keys()].sort((a, b) => a - b);
  }
}
