#!/usr/bin/env node

/**
 * Worklog Tracker MCP Server
 *
 * Tracks a work day, its meeting timers and manually logged time entries,
 * and reports on them, exposed as MCP tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { getConfig } from './config/index.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';
import { getTrackingEngine, resetTrackingEngine } from './services/tracking/index.js';
import { startHttpTransport, stopHttpTransport, isHttpEnabled } from './transports/index.js';

async function main(): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.logLevel);

  logger.info('Starting Worklog Tracker MCP Server', {
    store: config.store,
    dbPath: config.store === 'sqlite' ? config.dbPath : undefined,
    owner: config.owner,
    configFile: config.configPath,
    logLevel: config.logLevel,
  });

  // Open the store up front so configuration problems surface at startup
  getTrackingEngine();

  const server = new Server(
    {
      name: 'worklog-tracker',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool listing handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    try {
      const result = await handleToolCall(name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    } catch (error) {
      logger.error(`Tool error: ${name}`, error);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: error instanceof Error ? error.message : String(error),
            }),
          },
        ],
        isError: true,
      };
    }
  });

  // Start HTTP transport if enabled, otherwise use stdio
  if (isHttpEnabled()) {
    await startHttpTransport();
    logger.info('Server running with HTTP transport');
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('Server connected with stdio transport');
  }
}

// Graceful shutdown handler
async function shutdown(): Promise<void> {
  logger.info('Shutting down...');
  try {
    if (isHttpEnabled()) {
      await stopHttpTransport();
    }
    await resetTrackingEngine();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', error);
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

// Run the server
main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
