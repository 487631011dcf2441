/**
 * Endpoint Model Builder
 *
 * Turns the loaded OpenAPI document into one descriptor per (method, path)
 * pair and a coarse tag-based categorization. Built once; read-only after.
 */

import type { Logger } from '../logging/logger.js';
import { endpointKey, toolNameFor } from './tool-map.js';
import {
  OperationSchema,
  ParameterSchema,
  RequestBodySchema,
  ResponseSchema,
  parseHttpMethod,
  type DerivedCategory,
  type EndpointDescriptor,
  type EndpointModel,
  type HttpMethod,
  type MediaType,
  type OpenApiDocument,
  type OpenApiOperation,
  type ParameterDescriptor,
  type ParameterLocation,
  type RequestBodyDescriptor,
  type ResponseDescriptor,
} from './types.js';

const JSON_CONTENT_TYPE = 'application/json';

/**
 * Tag keyword → bucket, in priority order. Within one tag only the first
 * matching bucket is used.
 */
const CATEGORY_KEYWORDS: ReadonlyArray<{ category: DerivedCategory; keywords: readonly string[] }> = [
  { category: 'deployments', keywords: ['deployment'] },
  { category: 'teams', keywords: ['team'] },
  { category: 'services', keywords: ['service'] },
  { category: 'incidents', keywords: ['incident'] },
  { category: 'measurements', keywords: ['measurement', 'metric'] },
  { category: 'health', keywords: ['health'] },
];

export function buildEndpointModel(
  document: OpenApiDocument,
  fallbackBaseUrl: string,
  log?: Logger
): EndpointModel {
  const endpoints = new Map<string, EndpointDescriptor>();
  const paths = new Map<string, Map<HttpMethod, EndpointDescriptor>>();
  const categories = emptyCategories();

  for (const [path, pathItem] of Object.entries(document.paths)) {
    const methods = new Map<HttpMethod, EndpointDescriptor>();

    for (const [rawMethod, rawOperation] of Object.entries(pathItem)) {
      const method = parseHttpMethod(rawMethod);
      if (!method) continue; // path-level keys such as `parameters` or `summary`

      const operation = OperationSchema.safeParse(rawOperation);
      if (!operation.success) {
        log?.warn({ method, path }, 'Skipping malformed OpenAPI operation');
        continue;
      }

      const descriptor = buildDescriptor(path, method, operation.data);
      const key = endpointKey(method, path);
      endpoints.set(key, descriptor);
      methods.set(method, descriptor);

      for (const category of categorizeTags(descriptor.tags)) {
        const bucket = categories[category];
        if (!bucket.includes(key)) bucket.push(key);
      }
    }

    paths.set(path, methods);
  }

  return {
    apiInfo: document.info,
    baseUrl: document.servers[0]?.url ?? fallbackBaseUrl,
    endpoints,
    paths,
    categories,
  };
}

/** Bucket for one tag, or null when no keyword matches. */
export function categorizeTag(tag: string): DerivedCategory | null {
  const lower = tag.toLowerCase();
  for (const { category, keywords } of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return category;
    }
  }
  return null;
}

function categorizeTags(tags: readonly string[]): DerivedCategory[] {
  const result: DerivedCategory[] = [];
  for (const tag of tags) {
    const category = categorizeTag(tag);
    if (category && !result.includes(category)) result.push(category);
  }
  return result;
}

function emptyCategories(): Record<DerivedCategory, string[]> {
  return {
    deployments: [],
    teams: [],
    services: [],
    incidents: [],
    measurements: [],
    health: [],
  };
}

// ─── Descriptor Construction ─────────────────────────────────

function buildDescriptor(
  path: string,
  method: HttpMethod,
  operation: OpenApiOperation
): EndpointDescriptor {
  return {
    path,
    method,
    summary: operation.summary,
    description: operation.description,
    tags: [...operation.tags],
    operation_id: operation.operationId,
    parameters: partitionParameters(operation.parameters),
    request_body: buildRequestBody(operation.requestBody),
    responses: buildResponses(operation.responses),
    mcp_tool_name: toolNameFor(method, path),
  };
}

function partitionParameters(raw: readonly unknown[]): Record<ParameterLocation, ParameterDescriptor[]> {
  const result: Record<ParameterLocation, ParameterDescriptor[]> = { query: [], path: [], header: [] };

  for (const entry of raw) {
    const parsed = ParameterSchema.safeParse(entry);
    // `$ref` parameters and cookie parameters are not modeled
    if (!parsed.success) continue;
    const param = parsed.data;
    if (param.in !== 'query' && param.in !== 'path' && param.in !== 'header') continue;

    result[param.in].push({
      name: param.name,
      type: param.schema.type ?? 'string',
      required: param.required,
      description: param.description,
      default: param.schema.default ?? null,
      enum: param.schema.enum ?? null,
      minimum: param.schema.minimum ?? null,
      maximum: param.schema.maximum ?? null,
    });
  }

  return result;
}

function buildRequestBody(raw: unknown): RequestBodyDescriptor | null {
  if (raw === undefined) return null;

  const parsed = RequestBodySchema.safeParse(raw);
  if (!parsed.success) return null;

  const contentTypes = Object.keys(parsed.data.content);
  const contentType = contentTypes.includes(JSON_CONTENT_TYPE)
    ? JSON_CONTENT_TYPE
    : (contentTypes[0] ?? JSON_CONTENT_TYPE);
  const media = parsed.data.content[contentType];

  return {
    required: parsed.data.required,
    content_type: contentType,
    content_types: contentTypes,
    schema: media?.schema ?? {},
    examples: media?.examples ?? {},
  };
}

function buildResponses(raw: Record<string, unknown>): Record<string, ResponseDescriptor> {
  const result: Record<string, ResponseDescriptor> = {};

  for (const [status, response] of Object.entries(raw)) {
    const parsed = ResponseSchema.safeParse(response);
    if (!parsed.success) {
      result[status] = { description: '', schema: {} };
      continue;
    }
    result[status] = {
      description: parsed.data.description,
      schema: jsonSchemaOf(parsed.data.content),
    };
  }

  return result;
}

function jsonSchemaOf(content: Record<string, MediaType>): unknown {
  return content[JSON_CONTENT_TYPE]?.schema ?? {};
}
