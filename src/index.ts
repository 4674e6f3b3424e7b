#!/usr/bin/env node

/**
 * NEO Approach Database MCP Server
 *
 * Main entry point - reads configuration and starts the MCP server.
 * The data files are loaded on the first tool call.
 */

import { NeoQueryServer } from './server/mcp-server.js';
import { initServerConfig } from './server/server-config.js';
import { inspectNeo, queryApproaches } from './tools/index.js';
import { getLogger } from './shared/services/logging.service.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = initServerConfig(process.argv.slice(2));
  const logger = getLogger();

  const server = new NeoQueryServer(
    {
      name: 'neo-approach-db',
      version: '0.1.0',
      capabilities: {
        tools: {},
        logging: {},
      },
    },
    {
      inspect: inspectNeo,
      query: queryApproaches,
    },
  );

  await server.start();
  logger.info('Serving close-approach queries', { neoFile: config.neoFile, cadFile: config.cadFile });

  const shutdown = (): void => {
    console.error('Shutting down...');
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
