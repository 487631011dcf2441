/**
 * OpenAPI Types
 *
 * Zod schemas for the parts of an OpenAPI 3 document the discovery layer
 * reads, and the normalized endpoint descriptors built from them. Schemas are
 * lenient: unknown keys pass through and missing fields take defaults, so a
 * partially-authored document still yields a model.
 */

import { z } from 'zod';

// ─── Document Schemas ────────────────────────────────────────

export const MediaTypeSchema = z
  .object({
    schema: z.unknown().optional(),
    examples: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ParameterSchema = z
  .object({
    name: z.string(),
    in: z.string().default('query'),
    required: z.boolean().default(false),
    description: z.string().default(''),
    schema: z
      .object({
        type: z.string().optional(),
        default: z.unknown().optional(),
        enum: z.array(z.unknown()).optional(),
        minimum: z.number().optional(),
        maximum: z.number().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export const RequestBodySchema = z
  .object({
    required: z.boolean().default(false),
    content: z.record(MediaTypeSchema).default({}),
  })
  .passthrough();

export const ResponseSchema = z
  .object({
    description: z.string().default(''),
    content: z.record(MediaTypeSchema).default({}),
  })
  .passthrough();

export const OperationSchema = z
  .object({
    summary: z.string().default(''),
    description: z.string().default(''),
    tags: z.array(z.string()).default([]),
    parameters: z.array(z.unknown()).default([]),
    requestBody: z.unknown().optional(),
    responses: z.record(z.unknown()).default({}),
    operationId: z.string().default(''),
  })
  .passthrough();

export const OpenApiDocumentSchema = z
  .object({
    info: z.record(z.unknown()).default({}),
    servers: z.array(z.object({ url: z.string() }).passthrough()).default([]),
    paths: z.record(z.record(z.unknown())).default({}),
  })
  .passthrough();

export type OpenApiDocument = z.infer<typeof OpenApiDocumentSchema>;
export type OpenApiOperation = z.infer<typeof OperationSchema>;
export type MediaType = z.infer<typeof MediaTypeSchema>;

// ─── Endpoint Model ──────────────────────────────────────────

export const HTTP_METHODS = ['GET', 'PUT', 'POST', 'DELETE', 'OPTIONS', 'HEAD', 'PATCH', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Case-insensitive; null for anything that is not an HTTP method. */
export function parseHttpMethod(raw: string): HttpMethod | null {
  const upper = raw.toUpperCase();
  return HTTP_METHODS.find((method) => method === upper) ?? null;
}

export const PARAMETER_LOCATIONS = ['query', 'path', 'header'] as const;

export type ParameterLocation = (typeof PARAMETER_LOCATIONS)[number];

export interface ParameterDescriptor {
  name: string;
  type: string;
  required: boolean;
  description: string;
  default: unknown;
  enum: unknown[] | null;
  minimum: number | null;
  maximum: number | null;
}

export interface RequestBodyDescriptor {
  required: boolean;
  /** The media type `schema` and `examples` were taken from. */
  content_type: string;
  content_types: string[];
  schema: unknown;
  examples: Record<string, unknown>;
}

export interface ResponseDescriptor {
  description: string;
  schema: unknown;
}

export interface EndpointDescriptor {
  path: string;
  method: HttpMethod;
  summary: string;
  description: string;
  tags: string[];
  operation_id: string;
  parameters: Record<ParameterLocation, ParameterDescriptor[]>;
  request_body: RequestBodyDescriptor | null;
  responses: Record<string, ResponseDescriptor>;
  /** Tool implementing this endpoint, null when the server does not expose it. */
  mcp_tool_name: string | null;
}

export const DERIVED_CATEGORIES = [
  'deployments',
  'teams',
  'services',
  'incidents',
  'measurements',
  'health',
] as const;

export type DerivedCategory = (typeof DERIVED_CATEGORIES)[number];

export interface EndpointModel {
  apiInfo: Record<string, unknown>;
  baseUrl: string;
  /** Keyed by "METHOD path", in document order. */
  endpoints: ReadonlyMap<string, EndpointDescriptor>;
  /** path → method → descriptor, in document order. */
  paths: ReadonlyMap<string, ReadonlyMap<HttpMethod, EndpointDescriptor>>;
  /** Tag-derived buckets of endpoint keys. */
  categories: Readonly<Record<DerivedCategory, readonly string[]>>;
}
