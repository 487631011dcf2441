/**
 * Remote API tools. Each one maps to exactly one read endpoint of the
 * LinearB public API; write endpoints have no tool.
 */

import {
  EXPORT_FORMATS,
  ExportMetricsArgs,
  GetIncidentArgs,
  GetServiceArgs,
  GetServicesArgs,
  ListDeploymentsArgs,
  MAX_SEARCH_TERM_LENGTH,
  MetricsQueryArgs,
  NoArgs,
  ORDER_DIRECTIONS,
  SearchIncidentsArgs,
  SearchTeamsArgs,
  SearchUsersArgs,
  SORT_DIRECTIONS,
  USER_FIELDS,
  USER_ROLES,
} from '../adapter/arguments.js';
import {
  exportMetrics,
  getIncident,
  getService,
  getServices,
  healthCheck,
  listDeployments,
  postMetrics,
  searchIncidents,
  searchTeams,
  searchUsers,
} from '../adapter/remote-calls.js';
import { defineTool, type RegisteredTool } from './registry.js';

const offsetProperty = { type: 'integer', minimum: 0, description: 'Pagination offset. Default: 0' };

const searchTermProperty = {
  type: 'string',
  maxLength: MAX_SEARCH_TERM_LENGTH,
  description: `Search term (1-${MAX_SEARCH_TERM_LENGTH} characters)`,
};

const measurementProperties = {
  group_by: {
    type: 'string',
    description: "Grouping level (e.g., 'organization', 'team', 'repository', 'contributor')",
  },
  roll_up: { type: 'string', description: "Time aggregation (e.g., '1d', '1w', '1mo', 'custom')" },
  requested_metrics: {
    type: 'array',
    minItems: 1,
    items: {
      type: 'object',
      properties: { name: { type: 'string' }, agg: { type: 'string', enum: ['p75', 'p50', 'avg'] } },
      required: ['name'],
    },
    description: 'Metrics to query, e.g. [{"name": "branch.computed.cycle_time", "agg": "p75"}]',
  },
  time_ranges: {
    type: 'array',
    minItems: 1,
    items: {
      type: 'object',
      properties: { after: { type: 'string' }, before: { type: 'string' } },
      required: ['after', 'before'],
    },
    description: 'Time ranges, e.g. [{"after": "2024-01-01", "before": "2024-01-31"}]',
  },
  repository_ids: { type: 'array', items: { type: 'integer' }, description: 'Only these repositories' },
  team_ids: { type: 'array', items: { type: 'integer' }, description: 'Only these teams' },
};

const MEASUREMENT_REQUIRED = ['group_by', 'roll_up', 'requested_metrics', 'time_ranges'];

export const API_TOOLS: readonly RegisteredTool[] = [
  defineTool({
    name: 'list_deployments',
    description: 'List deployments with optional filtering parameters.',
    inputSchema: {
      type: 'object',
      properties: {
        repository_id: { type: 'integer', description: 'Filter by repository ID' },
        after: { type: 'string', description: 'Deployments after this date (ISO format)' },
        before: { type: 'string', description: 'Deployments before this date (ISO format)' },
        limit: { type: 'integer', minimum: 1, maximum: 100, description: 'Maximum number of results. Default: 10' },
        offset: offsetProperty,
        stage: { type: 'string', description: 'Filter by deployment stage' },
        sort_by: { type: 'string', description: 'Sort field. Default: published_at' },
        sort_dir: { type: 'string', enum: [...SORT_DIRECTIONS], description: 'Sort direction. Default: desc' },
        commit_sha: { type: 'string', description: 'Filter by commit SHA' },
      },
    },
    args: ListDeploymentsArgs,
    handler: (args, ctx) => listDeployments(ctx.client, args),
  }),
  defineTool({
    name: 'search_teams_v2',
    description: 'Search teams with pagination (V2 API).',
    inputSchema: {
      type: 'object',
      properties: {
        offset: offsetProperty,
        page_size: { type: 'integer', minimum: 1, maximum: 50, description: 'Teams per page. Default: 50' },
        search_term: searchTermProperty,
        nonmerged_members_only: {
          type: 'boolean',
          description: 'Only contributors without parent contributors. Default: false',
        },
      },
    },
    args: SearchTeamsArgs,
    handler: (args, ctx) => searchTeams(ctx.client, args),
  }),
  defineTool({
    name: 'search_users',
    description: 'Search users with pagination and filtering.',
    inputSchema: {
      type: 'object',
      properties: {
        offset: offsetProperty,
        page_size: { type: 'integer', minimum: 1, maximum: 50, description: 'Users per page. Default: 50' },
        order_by: { type: 'string', enum: [...USER_FIELDS], description: 'Field to order by' },
        order_dir: { type: 'string', enum: [...ORDER_DIRECTIONS], description: 'Order direction' },
        search_by_field: { type: 'string', enum: [...USER_FIELDS], description: 'Field to search by' },
        search_term: searchTermProperty,
        user_role: { type: 'string', enum: [...USER_ROLES], description: 'Filter by role' },
        include_user_children: { type: 'boolean', description: 'Include user children. Default: false' },
      },
    },
    args: SearchUsersArgs,
    handler: (args, ctx) => searchUsers(ctx.client, args),
  }),
  defineTool({
    name: 'get_services',
    description: 'Get all services, optionally filtered by repository.',
    inputSchema: {
      type: 'object',
      properties: {
        repository_id: { type: 'integer', description: 'Only services of this repository' },
      },
    },
    args: GetServicesArgs,
    handler: (args, ctx) => getServices(ctx.client, args),
  }),
  defineTool({
    name: 'get_service',
    description: 'Get a specific service by ID.',
    inputSchema: {
      type: 'object',
      properties: {
        service_id: { type: 'integer', minimum: 1, description: 'The service ID' },
      },
      required: ['service_id'],
    },
    args: GetServiceArgs,
    handler: (args, ctx) => getService(ctx.client, args),
  }),
  defineTool({
    name: 'get_incident',
    description: 'Get a specific incident by provider ID.',
    inputSchema: {
      type: 'object',
      properties: {
        provider_id: { type: 'string', description: 'The incident provider ID (e.g., INC-001)' },
      },
      required: ['provider_id'],
    },
    args: GetIncidentArgs,
    handler: (args, ctx) => getIncident(ctx.client, args),
  }),
  defineTool({
    name: 'search_incidents',
    description: 'Search incidents with filtering.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'integer', minimum: 1, maximum: 100, description: 'Maximum number of results. Default: 10' },
        offset: offsetProperty,
        status: { type: 'string', description: 'Filter by incident status' },
        severity: { type: 'string', description: 'Filter by incident severity' },
        after: { type: 'string', description: 'Incidents after this date (ISO format)' },
        before: { type: 'string', description: 'Incidents before this date (ISO format)' },
      },
    },
    args: SearchIncidentsArgs,
    handler: (args, ctx) => searchIncidents(ctx.client, args),
  }),
  defineTool({
    name: 'post_metrics',
    description:
      'Query metrics data from LinearB. See get_supported_metrics for metric names and get_metric_examples for sample queries.',
    inputSchema: {
      type: 'object',
      properties: measurementProperties,
      required: MEASUREMENT_REQUIRED,
    },
    args: MetricsQueryArgs,
    handler: (args, ctx) => postMetrics(ctx.client, args),
  }),
  defineTool({
    name: 'export_metrics',
    description: 'Export metrics data in CSV or JSON format.',
    inputSchema: {
      type: 'object',
      properties: {
        ...measurementProperties,
        file_format: { type: 'string', enum: [...EXPORT_FORMATS], description: 'Export format. Default: csv' },
      },
      required: MEASUREMENT_REQUIRED,
    },
    args: ExportMetricsArgs,
    handler: (args, ctx) => exportMetrics(ctx.client, args),
  }),
  defineTool({
    name: 'health_check',
    description: 'Check API health status.',
    inputSchema: { type: 'object', properties: {} },
    args: NoArgs,
    handler: (_args, ctx) => healthCheck(ctx.client),
  }),
];
