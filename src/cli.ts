#!/usr/bin/env node

/**
 * linearb-readonly CLI
 *
 * Prints the server's discovery data in a terminal. Never calls the API.
 *
 * Usage:
 *   linearb-readonly discover
 *   linearb-readonly endpoint /api/v1/deployments [--method GET]
 *   linearb-readonly examples [--category metrics] [--tool post_metrics]
 *   linearb-readonly status
 */

import 'dotenv/config';

import { parseArgs } from './commands/args.js';
import {
  runCategories,
  runDiscover,
  runDocs,
  runEndpoint,
  runExamples,
  runMetrics,
  runStatus,
  runTeams,
  type CommandOutput,
} from './commands/discovery.js';
import { resolveSettings } from './config/settings.js';
import { SERVER_VERSION } from './constants.js';
import { loadDiscoveryState } from './context.js';
import { makeLogger } from './logging/logger.js';

const MAIN_HELP = `linearb-readonly - LinearB API discovery from the command line

Usage:
  linearb-readonly <command> [options]

Commands:
  discover                          Endpoint count, API version, base URL and endpoint categories
  categories                        Tools of the MCP server grouped by category
  endpoint <path> [--method M]      Parameters, request body and responses of one endpoint
  examples [--category C] [--tool T] Example tool invocations
  docs                              Bundled documentation files
  metrics [--category C]            Metric categories, or the metrics of one category
  teams [--type T]                  Team types, or the teams of one type
  status                            Resolved configuration and OpenAPI status
  help                              Show this help

Environment Variables:
  LINEARB_API_KEY       LinearB API key (used by the MCP server only)
  LINEARB_BASE_URL      API base URL (default: https://public-api.linearb.io)
  LINEARB_OPENAPI_PATH  OpenAPI document (default: openapi.json in the package)
  LINEARB_DOCS_DIR      Documentation directory (default: docs/ in the package)
  LINEARB_MCP_HOME      Config directory (default: ~/.linearb-mcp)
  LOG_LEVEL             trace, debug, info, warn, error, fatal or silent`;

function main(): void {
  const { command, positionals, flags } = parseArgs(process.argv);

  if (command === 'help' || command === '--help' || command === '-h') {
    console.log(MAIN_HELP);
    return;
  }

  const { settings, warnings } = resolveSettings();
  // Only warnings and errors: the command output goes to stdout
  const log = makeLogger(settings.logLevel === 'info' ? 'warn' : settings.logLevel);
  for (const warning of warnings) {
    log.warn(warning);
  }
  const state = loadDiscoveryState(settings, log);

  let output: CommandOutput;
  switch (command) {
    case 'discover':
      output = runDiscover(state);
      break;
    case 'categories':
      output = runCategories();
      break;
    case 'endpoint':
      output = runEndpoint(state, positionals, flags);
      break;
    case 'examples':
      output = runExamples(state, flags);
      break;
    case 'docs':
      output = runDocs(state);
      break;
    case 'metrics':
      output = runMetrics(state, flags);
      break;
    case 'teams':
      output = runTeams(state, flags);
      break;
    case 'status':
      output = runStatus(state, SERVER_VERSION);
      break;
    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(MAIN_HELP);
      process.exitCode = 1;
      return;
  }

  console.log(output.text);
  if (output.failed) {
    process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`Error: ${message}`);
  process.exit(1);
}
