import { QueryRequest } from '../query/QueryRequest.js';

export interface ValidateFilterArgs {
  filter: string;
  version?: number;
}

export interface ListFieldsArgs {
  version?: number;
}

/**
 * Checks tool arguments received over MCP before they reach the compiler.
 * Arguments arrive untyped; each method narrows them or throws ValidationError.
 */
export class QueryRequestValidator {
  private static readonly REQUEST_KEYS = ['verb', 'fields', 'groupBy', 'filter', 'limit', 'version'];

  /**
   * @throws ValidationError if args is not a well-formed compile request
   */
  static validateCompileArgs(args: unknown): QueryRequest {
    const record = this.requireObject(args);

    for (const key of Object.keys(record)) {
      if (!this.REQUEST_KEYS.includes(key)) {
        throw new ValidationError(
          `Unknown argument: "${key}". Must be one of: ${this.REQUEST_KEYS.join(', ')}`
        );
      }
    }

    const verb = record.verb;
    if (typeof verb !== 'string' || verb.trim() === '') {
      throw new ValidationError('verb is required and must be a non-empty string');
    }

    const request: QueryRequest = { verb };

    const fields = this.optionalStringList(record.fields, 'fields');
    if (fields !== undefined) {
      request.fields = fields;
    }

    const groupBy = this.optionalStringList(record.groupBy, 'groupBy');
    if (groupBy !== undefined) {
      request.groupBy = groupBy;
    }

    const filter = this.optionalString(record.filter, 'filter');
    if (filter !== undefined) {
      request.filter = filter;
    }

    if (record.limit !== undefined) {
      const limit = record.limit;
      if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 0) {
        throw new ValidationError(`limit must be a non-negative integer, got ${String(limit)}`);
      }
      request.limit = limit;
    }

    const version = this.optionalVersion(record.version);
    if (version !== undefined) {
      request.version = version;
    }

    return request;
  }

  /**
   * @throws ValidationError if the filter is missing or the version malformed
   */
  static validateFilterArgs(args: unknown): ValidateFilterArgs {
    const record = this.requireObject(args);

    const filter = record.filter;
    if (typeof filter !== 'string') {
      throw new ValidationError('filter is required and must be a string');
    }

    const version = this.optionalVersion(record.version);
    return version === undefined ? { filter } : { filter, version };
  }

  static validateListFieldsArgs(args: unknown): ListFieldsArgs {
    if (args === undefined) {
      return {};
    }

    const version = this.optionalVersion(this.requireObject(args).version);
    return version === undefined ? {} : { version };
  }

  private static requireObject(value: unknown): Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ValidationError('Arguments must be an object');
    }
    return Object.fromEntries(Object.entries(value));
  }

  private static optionalString(value: unknown, name: string): string | undefined {
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new ValidationError(`${name} must be a string`);
    }
    return value;
  }

  /** Accepts an array of strings or a single comma-separated string. */
  private static optionalStringList(value: unknown, name: string): string[] | undefined {
    if (value === undefined) {
      return undefined;
    }
    if (typeof value === 'string') {
      return [value];
    }
    if (!Array.isArray(value)) {
      throw new ValidationError(`${name} must be a string or an array of strings`);
    }

    const list: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') {
        throw new ValidationError(`${name} must contain only strings`);
      }
      list.push(item);
    }
    return list;
  }

  private static optionalVersion(value: unknown): number | undefined {
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ValidationError(`version must be an integer, got ${String(value)}`);
    }
    return value;
  }
}

/**
 * Custom error for malformed tool arguments
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
