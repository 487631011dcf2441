#!/usr/bin/env node

/**
 * LinearB Read-Only MCP Server
 *
 * Exposes the read endpoints of the LinearB public API as MCP tools over
 * stdio, plus discovery tools over the bundled OpenAPI document and the
 * metric and team reference tables.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { LinearBClient } from './clients/linearb-client.js';
import { describeSettings, resolveSettings } from './config/settings.js';
import { SERVER_VERSION } from './constants.js';
import { createContext } from './context.js';
import { createShutdownHandler } from './lifecycle.js';
import { makeLogger } from './logging/logger.js';
import { createServer } from './server.js';
import { createToolRegistry } from './tools/catalog.js';

async function main(): Promise<void> {
  const { settings, warnings } = resolveSettings();
  const log = makeLogger(settings.logLevel);
  for (const warning of warnings) {
    log.warn(warning);
  }
  log.info({ settings: describeSettings(settings) }, 'Starting LinearB MCP server');

  const client = new LinearBClient({
    baseUrl: settings.baseUrl,
    apiKey: settings.apiKey,
    timeoutMs: settings.timeoutMs,
    log,
  });
  const ctx = createContext({ settings, log, client });
  const registry = createToolRegistry();
  const server = createServer(ctx, registry);

  const shutdown = createShutdownHandler({
    closeClient: () => client.close(),
    closeServer: () => server.close(),
    log,
    exit: (code) => process.exit(code),
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    void shutdown(signal);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  process.on('uncaughtException', (error) => {
    log.fatal({ err: error }, 'Uncaught exception');
    void shutdown('uncaughtException', 1);
  });
  process.on('unhandledRejection', (reason) => {
    log.fatal({ err: reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection', 1);
  });
  server.onclose = () => {
    void shutdown('transport closed');
  };

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ version: SERVER_VERSION, tools: registry.names().length }, 'MCP server started');
}

main().catch((error: unknown) => {
  console.error('[linearb-readonly-mcp] Fatal error:', error);
  process.exit(1);
});
