#!/usr/bin/env node
// Loaded first so FLOWQ_* settings from .env are visible to the config loaders
import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createQueryServer } from './server/QueryServer.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const server = createQueryServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('flow query compiler listening on stdio');
}

main().catch((error: unknown) => {
  logger.error('server failed to start', { error });
  process.exitCode = 1;
});
