/**
 * Endpoint → tool name map.
 *
 * Only the read endpoints this server implements are listed. Write endpoints
 * of the provider have no entry and therefore no tool.
 */

import type { HttpMethod } from './types.js';

export interface ApiToolRoute {
  tool: string;
  method: Extract<HttpMethod, 'GET' | 'POST'>;
  path: string;
}

export const API_TOOL_ROUTES: readonly ApiToolRoute[] = [
  { tool: 'list_deployments', method: 'GET', path: '/api/v1/deployments' },
  { tool: 'search_teams_v2', method: 'GET', path: '/api/v2/teams' },
  { tool: 'search_users', method: 'GET', path: '/api/v1/users' },
  { tool: 'get_services', method: 'GET', path: '/api/v1/services/' },
  { tool: 'get_service', method: 'GET', path: '/api/v1/services/{service_id}' },
  { tool: 'get_incident', method: 'GET', path: '/api/v1/incidents/{provider_id}' },
  { tool: 'health_check', method: 'GET', path: '/api/v1/health' },
  { tool: 'search_incidents', method: 'POST', path: '/api/v1/incidents/search' },
  { tool: 'post_metrics', method: 'POST', path: '/api/v2/measurements' },
  { tool: 'export_metrics', method: 'POST', path: '/api/v2/measurements/export' },
];

const TOOL_BY_ENDPOINT = new Map(API_TOOL_ROUTES.map((r) => [endpointKey(r.method, r.path), r.tool]));

/** Names reported by discover_api when the OpenAPI document is unavailable. */
export const FALLBACK_TOOL_NAMES: readonly string[] = API_TOOL_ROUTES.map((r) => r.tool);

export function endpointKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

/** Exact (method, path) lookup; the method is case-insensitive, the path is not. */
export function toolNameFor(method: string, path: string): string | null {
  return TOOL_BY_ENDPOINT.get(endpointKey(method, path)) ?? null;
}
