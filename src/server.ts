/**
 * MCP Server
 *
 * Wires the tool registry into the MCP request handlers. Transport and
 * process lifecycle live in index.ts.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import type { ServerContext } from './context.js';
import type { ToolRegistry } from './tools/registry.js';

export const SERVER_INSTRUCTIONS = `Read-only access to the LinearB engineering metrics API.

Use these tools when the user asks about:
- Deployments, deployment frequency, recent releases → list_deployments
- Cycle time, PR size, review time, merge frequency, rework → post_metrics or export_metrics (check get_supported_metrics and get_metric_examples first)
- Teams, users, services, incidents → search_teams_v2, search_users, get_services, get_service, search_incidents, get_incident
- Which teams can be compared, team focus areas → get_active_teams, get_comparable_teams, search_teams_by_focus
- What the API offers, endpoint parameters → discover_api, get_endpoint_details, get_api_categories, get_usage_examples

No tool creates, updates or deletes anything in LinearB.`;

export function createServer(ctx: ServerContext, registry: ToolRegistry): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {} },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => ({ tools: registry.list() }));

  server.setRequestHandler(CallToolRequestSchema, (request) =>
    registry.call(request.params.name, request.params.arguments, ctx)
  );

  return server;
}
