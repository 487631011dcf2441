/**
 * API Discovery
 *
 * Queries over the endpoint model built from the provider's OpenAPI
 * document. Lookups that miss return NotFound values; nothing here throws.
 */

import { notFound, type NotFoundResult } from '../errors.js';
import { endpointKey, FALLBACK_TOOL_NAMES } from '../openapi/tool-map.js';
import {
  parseHttpMethod,
  type DerivedCategory,
  type EndpointDescriptor,
  type EndpointModel,
} from '../openapi/types.js';

export const SPECIFICATION_UNAVAILABLE = 'OpenAPI specification not available';

export interface ConfigurationDegraded {
  error: string;
  code: 'configuration_degraded';
  available_tools: string[];
}

export interface ApiDiscoveryResult {
  api_info: Record<string, unknown>;
  base_url: string;
  endpoints: Record<string, EndpointDescriptor>;
  categories: Record<DerivedCategory, string[]>;
}

export type EndpointDetails = EndpointDescriptor & { endpoint: string };

export type EndpointDetailsResult =
  | EndpointDetails
  | NotFoundResult<{ available_endpoints: string[] }>
  | NotFoundResult<{ available_methods: string[] }>
  | ConfigurationDegraded;

export function specificationUnavailable(): ConfigurationDegraded {
  return {
    error: SPECIFICATION_UNAVAILABLE,
    code: 'configuration_degraded',
    available_tools: [...FALLBACK_TOOL_NAMES],
  };
}

export function discoverApi(model: EndpointModel | null): ApiDiscoveryResult | ConfigurationDegraded {
  if (!model) return specificationUnavailable();

  const { categories } = model;
  return {
    api_info: model.apiInfo,
    base_url: model.baseUrl,
    endpoints: Object.fromEntries(model.endpoints),
    categories: {
      deployments: [...categories.deployments],
      teams: [...categories.teams],
      services: [...categories.services],
      incidents: [...categories.incidents],
      measurements: [...categories.measurements],
      health: [...categories.health],
    },
  };
}

/**
 * Details for one endpoint. The path must match a document path exactly;
 * the method is case-insensitive and defaults to GET.
 */
export function getEndpointDetails(
  model: EndpointModel | null,
  path: string,
  method = 'GET'
): EndpointDetailsResult {
  if (!model) return specificationUnavailable();

  const methods = model.paths.get(path);
  if (!methods) {
    return notFound(`Endpoint '${path}' not found`, {
      available_endpoints: [...model.paths.keys()],
    });
  }

  const normalized = method.toUpperCase();
  const httpMethod = parseHttpMethod(normalized);
  const descriptor = httpMethod ? methods.get(httpMethod) : undefined;
  if (!descriptor) {
    return notFound(`Method '${normalized}' not available for '${path}'`, {
      available_methods: [...methods.keys()],
    });
  }

  return { endpoint: endpointKey(descriptor.method, path), ...descriptor };
}
