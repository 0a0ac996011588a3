import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { CompilerConfig, loadCompilerConfig } from '../config/compiler.js';
import { McpContent, QueryController } from '../query/QueryController.js';
import { FlowLogSchema } from '../query/schema/FlowLogSchema.js';
import { Schema } from '../query/schema/Schema.js';
import { logger } from '../utils/logger.js';
import { QueryRequestValidator } from '../validators/QueryRequestValidator.js';

export const SERVER_NAME = 'flow-query-compiler';
export const SERVER_VERSION = '0.1.0';

export interface QueryServerOptions {
  /** Log source dialect; defaults to VPC flow logs */
  schema?: Schema;
  /** Request defaults; read from the environment when omitted */
  config?: CompilerConfig;
}

const VERSION_PROPERTY = {
  type: 'number',
  description: 'Flow log record version (2, 3 or 5). Defaults to FLOWQ_DEFAULT_VERSION.',
};

export function createQueryServer(options?: QueryServerOptions): Server {
  const schema = options?.schema ?? new FlowLogSchema();
  const config = options?.config ?? loadCompilerConfig();
  const controller = new QueryController(schema, config);

  logger.info('configuration loaded', {
    defaultLimit: config.defaultLimit,
    defaultVersion: config.defaultVersion,
  });

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: 'compile_query',
          description:
            'Compile a flow log query into CloudWatch Logs Insights syntax. Aggregates with count/sum/avg/min/max, or lists records with raw.',
          inputSchema: {
            type: 'object',
            properties: {
              verb: {
                type: 'string',
                description: 'One of raw, count, sum, avg, min, max.',
              },
              fields: {
                type: 'array',
                items: { type: 'string' },
                description:
                  'Fields to aggregate, or to display for raw. Entries may be comma-separated.',
              },
              groupBy: {
                type: 'array',
                items: { type: 'string' },
                description: 'Fields to group aggregations by.',
              },
              filter: {
                type: 'string',
                description:
                  "Filter expression, e.g. \"srcaddr = 10.0.0.0/24 and (dstport = 443 or protocol = udp)\".",
              },
              limit: {
                type: 'number',
                description: 'Maximum rows; 0 disables the limit. Defaults to FLOWQ_DEFAULT_LIMIT.',
              },
              version: VERSION_PROPERTY,
            },
            required: ['verb'],
          },
        },
        {
          name: 'validate_filter',
          description:
            'Check a filter expression against a flow log version and return its compiled form.',
          inputSchema: {
            type: 'object',
            properties: {
              filter: {
                type: 'string',
                description: 'Filter expression to validate.',
              },
              version: VERSION_PROPERTY,
            },
            required: ['filter'],
          },
        },
        {
          name: 'list_fields',
          description:
            'List the fields of a flow log version, marking numeric and computed fields.',
          inputSchema: {
            type: 'object',
            properties: {
              version: VERSION_PROPERTY,
            },
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const argsSize = args ? JSON.stringify(args).length : 0;
    const timer = logger.startTimer(`tool:${name}`);

    logger.debug('server', 'request:start', { tool: name, argumentsSize: argsSize });

    try {
      let result: McpContent;
      switch (name) {
        case 'compile_query':
          result = controller.handleCompileQueryTool(
            QueryRequestValidator.validateCompileArgs(args ?? {})
          );
          break;
        case 'validate_filter':
          result = controller.handleValidateFilterTool(
            QueryRequestValidator.validateFilterArgs(args ?? {})
          );
          break;
        case 'list_fields':
          result = controller.handleListFieldsTool(
            QueryRequestValidator.validateListFieldsArgs(args)
          );
          break;
        default:
          throw new Error(`Unknown tool: ${name}`);
      }

      timer.end({ tool: name, status: 'success' });

      return result;
    } catch (error) {
      timer.end({ tool: name, status: 'error' });

      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Error handling tool "${name}"`, { tool: name, error });

      return {
        content: [
          {
            type: 'text',
            text: `Error: ${message}`,
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}
