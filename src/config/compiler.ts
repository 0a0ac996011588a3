import { DEFAULT_FLOW_LOG_VERSION, FlowLogSchema } from '../query/schema/FlowLogSchema.js';

export interface CompilerConfig {
  /** Limit applied when a request does not set one */
  defaultLimit: number;
  /** Flow log version applied when a request does not set one */
  defaultVersion: number;
}

export const DEFAULT_REQUEST_LIMIT = 20;

const SUPPORTED_VERSIONS = new FlowLogSchema().getVersions();

function readInteger(name: string): number | undefined {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return undefined;
  }

  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

export function loadCompilerConfig(): CompilerConfig {
  const defaultLimit = readInteger('FLOWQ_DEFAULT_LIMIT') ?? DEFAULT_REQUEST_LIMIT;
  if (defaultLimit === 0) {
    throw new Error('FLOWQ_DEFAULT_LIMIT must be greater than zero');
  }

  const defaultVersion = readInteger('FLOWQ_DEFAULT_VERSION') ?? DEFAULT_FLOW_LOG_VERSION;
  if (!SUPPORTED_VERSIONS.includes(defaultVersion)) {
    throw new Error(
      `FLOWQ_DEFAULT_VERSION must be one of ${SUPPORTED_VERSIONS.join(', ')}, got ${defaultVersion}`
    );
  }

  return { defaultLimit, defaultVersion };
}
