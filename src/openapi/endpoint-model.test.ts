import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { buildEndpointModel, categorizeTag } from './endpoint-model.js';
import { OpenApiDocumentSchema, type OpenApiDocument } from './types.js';

function documentOf(raw: unknown): OpenApiDocument {
  return OpenApiDocumentSchema.parse(raw);
}

const FIXTURE = documentOf({
  info: { title: 'Fixture API', version: '2.1.0' },
  servers: [{ url: 'https://fixture.example.test' }],
  paths: {
    '/api/v1/deployments': {
      get: {
        tags: ['Deployments'],
        summary: 'List deployments',
        operationId: 'list_deployments',
        parameters: [
          { name: 'limit', in: 'query', schema: { type: 'integer', default: 10, minimum: 1, maximum: 100 } },
          { name: 'sort_dir', in: 'query', schema: { type: 'string', enum: ['asc', 'desc'] } },
          { name: 'x-trace', in: 'header', description: 'Trace id' },
          { name: 'session', in: 'cookie' },
          { $ref: '#/components/parameters/Offset' },
        ],
        responses: {
          '200': {
            description: 'Deployments',
            content: { 'application/json': { schema: { type: 'object' } } },
          },
          '401': { description: 'Unauthorized' },
        },
      },
      post: {
        tags: ['Deployments'],
        requestBody: {
          required: true,
          content: {
            'text/plain': { schema: { type: 'string' } },
            'application/json': {
              schema: { type: 'object' },
              examples: { basic: { value: { ref_name: 'main' } } },
            },
          },
        },
      },
    },
    '/api/v2/teams/{team_id}': {
      parameters: [{ name: 'team_id', in: 'path', required: true }],
      summary: 'A team',
      delete: { tags: ['Teams V2', 'Team Admin'] },
    },
    '/api/v2/measurements': {
      post: { tags: ['Measurements V2', 'Custom Metrics'] },
    },
    '/api/v1/cycle-time-stages': {
      post: { tags: ['Cycle Time Stages'] },
    },
    '/api/v1/broken': {
      get: 'not an operation',
    },
  },
});

describe('buildEndpointModel', () => {
  const model = buildEndpointModel(FIXTURE, 'https://fallback.example.test');

  it('builds one descriptor per method, ignoring path-level keys', () => {
    expect([...model.endpoints.keys()]).toEqual([
      'GET /api/v1/deployments',
      'POST /api/v1/deployments',
      'DELETE /api/v2/teams/{team_id}',
      'POST /api/v2/measurements',
      'POST /api/v1/cycle-time-stages',
    ]);
    expect([...(model.paths.get('/api/v2/teams/{team_id}')?.keys() ?? [])]).toEqual(['DELETE']);
  });

  it('skips malformed operations but keeps the path', () => {
    expect(model.paths.get('/api/v1/broken')?.size).toBe(0);
  });

  it('partitions parameters by location and drops unmodeled ones', () => {
    const descriptor = model.endpoints.get('GET /api/v1/deployments');

    expect(descriptor?.parameters.query).toEqual([
      {
        name: 'limit',
        type: 'integer',
        required: false,
        description: '',
        default: 10,
        enum: null,
        minimum: 1,
        maximum: 100,
      },
      {
        name: 'sort_dir',
        type: 'string',
        required: false,
        description: '',
        default: null,
        enum: ['asc', 'desc'],
        minimum: null,
        maximum: null,
      },
    ]);
    expect(descriptor?.parameters.header.map((p) => p.name)).toEqual(['x-trace']);
    expect(descriptor?.parameters.header[0]?.type).toBe('string');
    expect(descriptor?.parameters.path).toEqual([]);
  });

  it('takes responses from the JSON media type', () => {
    expect(model.endpoints.get('GET /api/v1/deployments')?.responses).toEqual({
      '200': { description: 'Deployments', schema: { type: 'object' } },
      '401': { description: 'Unauthorized', schema: {} },
    });
  });

  it('prefers application/json for the request body', () => {
    expect(model.endpoints.get('POST /api/v1/deployments')?.request_body).toEqual({
      required: true,
      content_type: 'application/json',
      content_types: ['text/plain', 'application/json'],
      schema: { type: 'object' },
      examples: { basic: { value: { ref_name: 'main' } } },
    });
    expect(model.endpoints.get('GET /api/v1/deployments')?.request_body).toBeNull();
  });

  it('names the tool only for implemented endpoints', () => {
    expect(model.endpoints.get('GET /api/v1/deployments')?.mcp_tool_name).toBe('list_deployments');
    expect(model.endpoints.get('POST /api/v1/deployments')?.mcp_tool_name).toBeNull();
    expect(model.endpoints.get('POST /api/v2/measurements')?.mcp_tool_name).toBe('post_metrics');
    expect(model.endpoints.get('DELETE /api/v2/teams/{team_id}')?.mcp_tool_name).toBeNull();
  });

  it('derives categories from tags without duplicates', () => {
    expect(model.categories).toEqual({
      deployments: ['GET /api/v1/deployments', 'POST /api/v1/deployments'],
      teams: ['DELETE /api/v2/teams/{team_id}'],
      services: [],
      incidents: [],
      measurements: ['POST /api/v2/measurements'],
      health: [],
    });
  });

  it('takes the base URL from the first server', () => {
    expect(model.baseUrl).toBe('https://fixture.example.test');
    expect(model.apiInfo).toEqual({ title: 'Fixture API', version: '2.1.0' });
  });

  it('falls back to the configured base URL without servers', () => {
    const bare = buildEndpointModel(documentOf({ paths: {} }), 'https://fallback.example.test');
    expect(bare.baseUrl).toBe('https://fallback.example.test');
    expect(bare.endpoints.size).toBe(0);
  });
});

describe('categorizeTag', () => {
  it.each([
    ['Deployments', 'deployments'],
    ['Teams V2', 'teams'],
    ['Services', 'services'],
    ['Incidents', 'incidents'],
    ['Measurements V2', 'measurements'],
    ['Custom Metrics', 'measurements'],
    ['Health', 'health'],
  ])('%s → %s', (tag, category) => {
    expect(categorizeTag(tag)).toBe(category);
  });

  it('uses the first matching bucket', () => {
    expect(categorizeTag('Team Deployment Settings')).toBe('deployments');
  });

  it('leaves unmatched tags uncategorized', () => {
    expect(categorizeTag('Cycle Time Stages')).toBeNull();
    expect(categorizeTag('Users')).toBeNull();
  });
});

describe('bundled openapi.json', () => {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../openapi.json', import.meta.url), 'utf-8'));
  const model = buildEndpointModel(documentOf(raw), 'https://fallback.example.test');

  it('maps every implemented route to its tool', () => {
    const mapped = [...model.endpoints.values()]
      .filter((e) => e.mcp_tool_name !== null)
      .map((e) => `${e.method} ${e.path} → ${e.mcp_tool_name ?? ''}`);

    expect(mapped.sort()).toEqual(
      [
        'GET /api/v1/deployments → list_deployments',
        'GET /api/v2/teams → search_teams_v2',
        'GET /api/v1/users → search_users',
        'GET /api/v1/services/ → get_services',
        'GET /api/v1/services/{service_id} → get_service',
        'GET /api/v1/incidents/{provider_id} → get_incident',
        'GET /api/v1/health → health_check',
        'POST /api/v1/incidents/search → search_incidents',
        'POST /api/v2/measurements → post_metrics',
        'POST /api/v2/measurements/export → export_metrics',
      ].sort()
    );
  });
});
