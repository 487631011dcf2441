/**
 * Curated API Categories
 *
 * Hand-authored taxonomy of the tools this server exposes. Independent of
 * the tag-derived categories in the endpoint model and available even when
 * the OpenAPI document is not.
 */

export interface CuratedEndpoint {
  tool: string;
  /** HTTP method, or "N/A" for tools that never call the remote API. */
  method: string;
  path: string;
  description: string;
}

export interface CuratedCategory {
  description: string;
  endpoints: CuratedEndpoint[];
}

export interface ApiCategoriesResult {
  total_categories: number;
  total_endpoints: number;
  categories: Record<string, CuratedCategory>;
}

const LOCAL = 'N/A';

function local(tool: string, description: string): CuratedEndpoint {
  return { tool, method: LOCAL, path: LOCAL, description };
}

const CURATED_CATEGORIES: ReadonlyArray<[string, CuratedCategory]> = [
  [
    'deployments',
    {
      description: 'View deployment information (read-only)',
      endpoints: [
        { tool: 'list_deployments', method: 'GET', path: '/api/v1/deployments', description: 'List deployments with filtering' },
      ],
    },
  ],
  [
    'teams',
    {
      description: 'View team information using V2 API (read-only)',
      endpoints: [
        { tool: 'search_teams_v2', method: 'GET', path: '/api/v2/teams', description: 'Search teams with pagination' },
      ],
    },
  ],
  [
    'users',
    {
      description: 'View user information (read-only)',
      endpoints: [
        { tool: 'search_users', method: 'GET', path: '/api/v1/users', description: 'Search users with pagination' },
      ],
    },
  ],
  [
    'services',
    {
      description: 'Retrieve service information',
      endpoints: [
        { tool: 'get_services', method: 'GET', path: '/api/v1/services/', description: 'Get all services' },
        { tool: 'get_service', method: 'GET', path: '/api/v1/services/{service_id}', description: 'Get specific service by ID' },
      ],
    },
  ],
  [
    'incidents',
    {
      description: 'View incident information (read-only)',
      endpoints: [
        { tool: 'get_incident', method: 'GET', path: '/api/v1/incidents/{provider_id}', description: 'Get specific incident' },
        { tool: 'search_incidents', method: 'POST', path: '/api/v1/incidents/search', description: 'Search incidents with filtering' },
      ],
    },
  ],
  [
    'metrics',
    {
      description: 'Query and export metrics data (read-only)',
      endpoints: [
        { tool: 'post_metrics', method: 'POST', path: '/api/v2/measurements', description: 'Query metrics data' },
        { tool: 'export_metrics', method: 'POST', path: '/api/v2/measurements/export', description: 'Export metrics in CSV/JSON' },
      ],
    },
  ],
  [
    'health',
    {
      description: 'Monitor API health',
      endpoints: [
        { tool: 'health_check', method: 'GET', path: '/api/v1/health', description: 'Check API health status' },
      ],
    },
  ],
  [
    'discovery',
    {
      description: 'API discovery and reference tools',
      endpoints: [
        local('discover_api', 'Get comprehensive API information'),
        local('get_endpoint_details', 'Get detailed endpoint information'),
        local('get_api_categories', 'Get API endpoints by categories'),
        local('get_usage_examples', 'Get usage examples'),
        local('get_documentation_files', 'List documentation files'),
        local('get_supported_metrics', 'Get all supported metrics'),
        local('get_metrics_by_category', 'Get metrics by category'),
        local('search_metrics', 'Search metrics by name/description'),
        local('get_metric_examples', 'Get metric usage examples'),
        local('get_active_teams', 'Get all active teams'),
        local('get_teams_by_type', 'Get teams by type (engineering/qa)'),
        local('get_comparable_teams', 'Get comparable engineering teams'),
        local('search_teams_by_focus', 'Search teams by focus area'),
      ],
    },
  ],
];

export function getApiCategories(): ApiCategoriesResult {
  const categories: Record<string, CuratedCategory> = {};
  let totalEndpoints = 0;

  for (const [id, category] of CURATED_CATEGORIES) {
    categories[id] = {
      description: category.description,
      endpoints: category.endpoints.map((endpoint) => ({ ...endpoint })),
    };
    totalEndpoints += category.endpoints.length;
  }

  return {
    total_categories: CURATED_CATEGORIES.length,
    total_endpoints: totalEndpoints,
    categories,
  };
}
