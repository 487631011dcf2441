/**
 * Discovery and reference tools. None of these call the remote API.
 */

import { z } from 'zod';
import { NoArgs } from '../adapter/arguments.js';
import { getApiCategories } from '../discovery/api-categories.js';
import { discoverApi, getEndpointDetails } from '../discovery/api-discovery.js';
import { getDocumentationFiles } from '../discovery/documentation.js';
import { getUsageExamples } from '../discovery/usage-examples.js';
import { getMetricExamples } from '../reference/metric-examples.js';
import { getMetricsByCategory, listMetrics, searchMetrics } from '../reference/metrics.js';
import { getComparableTeams, getTeamsByType, listTeams, searchTeamsByFocus } from '../reference/teams.js';
import { METRIC_CATEGORY_IDS, TEAM_TYPE_IDS } from '../reference/types.js';
import { defineTool, type RegisteredTool } from './registry.js';

const EMPTY_SCHEMA = { type: 'object' as const, properties: {} };

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const optionalFlag = z
  .boolean()
  .nullish()
  .transform((v) => v ?? undefined);

export const DISCOVERY_TOOLS: readonly RegisteredTool[] = [
  defineTool({
    name: 'discover_api',
    description:
      'Get comprehensive API information and available endpoints, derived from the LinearB OpenAPI specification.',
    inputSchema: EMPTY_SCHEMA,
    args: NoArgs,
    handler: (_args, ctx) => discoverApi(ctx.model),
  }),
  defineTool({
    name: 'get_endpoint_details',
    description:
      'Get detailed information about a specific API endpoint: parameters, request body, responses and the tool that calls it.',
    inputSchema: {
      type: 'object',
      properties: {
        endpoint_path: {
          type: 'string',
          description: "The API endpoint path exactly as documented (e.g., '/api/v1/deployments')",
        },
        method: {
          type: 'string',
          description: 'HTTP method (GET, POST, PUT, DELETE, ...). Default: GET',
        },
      },
      required: ['endpoint_path'],
    },
    args: z.object({
      endpoint_path: z.string(),
      method: z
        .string()
        .nullish()
        .transform((v) => v ?? 'GET'),
    }),
    handler: (args, ctx) => getEndpointDetails(ctx.model, args.endpoint_path, args.method),
  }),
  defineTool({
    name: 'get_api_categories',
    description: 'Get the tools of this server organized by functional category.',
    inputSchema: EMPTY_SCHEMA,
    args: NoArgs,
    handler: () => getApiCategories(),
  }),
  defineTool({
    name: 'get_usage_examples',
    description: 'Get example invocations for the tools, optionally for one category or one tool.',
    inputSchema: {
      type: 'object',
      properties: {
        category: {
          type: 'string',
          description: 'Example category (deployments, teams, users, services, metrics, incidents, health, ...)',
        },
        tool_name: { type: 'string', description: 'Return the examples of this tool only' },
      },
    },
    args: z.object({ category: optionalText, tool_name: optionalText }),
    handler: (args, ctx) => getUsageExamples(ctx.usageExamples, args),
  }),
  defineTool({
    name: 'get_documentation_files',
    description: 'List the documentation files (PDF guides) bundled with the server.',
    inputSchema: EMPTY_SCHEMA,
    args: NoArgs,
    handler: (_args, ctx) => getDocumentationFiles(ctx.settings.docsDir, ctx.rootDir),
  }),
  defineTool({
    name: 'get_supported_metrics',
    description:
      'Get the complete list of metrics supported by the measurements API, with aggregations, units and categories.',
    inputSchema: EMPTY_SCHEMA,
    args: NoArgs,
    handler: (_args, ctx) => listMetrics(ctx.tables),
  }),
  defineTool({
    name: 'get_metrics_by_category',
    description: 'Get the metrics of one category, or an overview of all categories when none is given.',
    inputSchema: {
      type: 'object',
      properties: {
        category: {
          type: 'string',
          enum: [...METRIC_CATEGORY_IDS],
          description: 'Metric category id',
        },
      },
    },
    args: z.object({ category: optionalText }),
    handler: (args, ctx) => getMetricsByCategory(ctx.tables, args.category),
  }),
  defineTool({
    name: 'search_metrics',
    description: 'Search metrics by name or description, optionally filtered by category and aggregation support.',
    inputSchema: {
      type: 'object',
      properties: {
        search_term: { type: 'string', description: 'At least 2 characters, case-insensitive' },
        category: { type: 'string', enum: [...METRIC_CATEGORY_IDS], description: 'Only metrics of this category' },
        has_aggregation: {
          type: 'boolean',
          description: 'true: only metrics with p75/p50/avg aggregations; false: only metrics without',
        },
      },
      required: ['search_term'],
    },
    args: z.object({ search_term: z.string(), category: optionalText, has_aggregation: optionalFlag }),
    handler: (args, ctx) => searchMetrics(ctx.tables, args),
  }),
  defineTool({
    name: 'get_metric_examples',
    description: 'Get example measurement queries, an aggregation guide and best practices for post_metrics.',
    inputSchema: EMPTY_SCHEMA,
    args: NoArgs,
    handler: () => getMetricExamples(),
  }),
  defineTool({
    name: 'get_active_teams',
    description: 'Get the list of active teams available for analysis.',
    inputSchema: EMPTY_SCHEMA,
    args: NoArgs,
    handler: (_args, ctx) => listTeams(ctx.tables),
  }),
  defineTool({
    name: 'get_teams_by_type',
    description: 'Get the teams of one type (engineering or qa), or an overview of all types when none is given.',
    inputSchema: {
      type: 'object',
      properties: {
        team_type: { type: 'string', enum: [...TEAM_TYPE_IDS], description: 'Team type id' },
      },
    },
    args: z.object({ team_type: optionalText }),
    handler: (args, ctx) => getTeamsByType(ctx.tables, args.team_type),
  }),
  defineTool({
    name: 'get_comparable_teams',
    description: 'Get the teams whose metrics can be compared with each other, and the teams excluded from comparison.',
    inputSchema: EMPTY_SCHEMA,
    args: NoArgs,
    handler: (_args, ctx) => getComparableTeams(ctx.tables),
  }),
  defineTool({
    name: 'search_teams_by_focus',
    description: 'Search teams by name, description or focus area.',
    inputSchema: {
      type: 'object',
      properties: {
        search_term: { type: 'string', description: 'At least 2 characters, case-insensitive' },
        team_type: { type: 'string', enum: [...TEAM_TYPE_IDS], description: 'Only teams of this type' },
        comparable_only: { type: 'boolean', description: 'Only comparable teams. Default: false' },
      },
      required: ['search_term'],
    },
    args: z.object({ search_term: z.string(), team_type: optionalText, comparable_only: optionalFlag }),
    handler: (args, ctx) => searchTeamsByFocus(ctx.tables, args),
  }),
];
