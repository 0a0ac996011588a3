import { CompilerConfig, loadCompilerConfig } from '../config/compiler.js';
import { ListFieldsArgs, ValidateFilterArgs } from '../validators/QueryRequestValidator.js';
import { collectFields, renderExpr } from './expressions.js';
import { parseFilterWithSchema, validateFilter } from './FilterParser.js';
import { compileQuery, QueryRequest } from './QueryRequest.js';
import { Schema } from './schema/Schema.js';

/**
 * MCP Content format for responses
 */
export type McpContent = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

export interface FilterValidationResult {
  valid: true;
  version: number;
  /** Filter as it appears in a compiled query; empty for an empty filter */
  rendered: string;
  fields: string[];
}

export interface FieldDescription {
  name: string;
  numeric: boolean;
  /** Expression the field is computed from, for derived fields */
  expression?: string;
}

export interface ListFieldsResult {
  version: number;
  fields: FieldDescription[];
}

/**
 * Turns tool calls into compiler calls and formats the results as MCP content.
 * Arguments must already be validated; failures propagate as thrown errors.
 */
export class QueryController {
  constructor(
    private readonly schema: Schema,
    private readonly config: CompilerConfig = loadCompilerConfig()
  ) {}

  handleCompileQueryTool(args: QueryRequest): McpContent {
    return this.formatText(compileQuery(this.schema, args, this.config));
  }

  handleValidateFilterTool(args: ValidateFilterArgs): McpContent {
    const version = args.version ?? this.config.defaultVersion;
    this.schema.validateVersion(version);

    const expr = parseFilterWithSchema(args.filter, this.schema);
    validateFilter(expr, this.schema, version);

    const result: FilterValidationResult = {
      valid: true,
      version,
      rendered: expr ? renderExpr(expr) : '',
      fields: expr ? collectFields(expr) : [],
    };
    return this.formatJson(result);
  }

  handleListFieldsTool(args: ListFieldsArgs): McpContent {
    const version = args.version ?? this.config.defaultVersion;

    const fields: FieldDescription[] = this.schema.getFields(version).map((name) => ({
      name,
      numeric: this.schema.isNumeric(name),
    }));

    for (const name of this.schema.getComputedFields()) {
      fields.push({
        name,
        numeric: this.schema.isNumeric(name),
        expression: this.schema.getComputedFieldExpression(name, version),
      });
    }

    const result: ListFieldsResult = { version, fields };
    return this.formatJson(result);
  }

  private formatText(text: string): McpContent {
    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
    };
  }

  private formatJson(payload: unknown): McpContent {
    return this.formatText(JSON.stringify(payload, null, 2));
  }
}
