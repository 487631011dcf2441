/**
 * Specification Loader
 *
 * Reads the provider's OpenAPI document once at startup. A missing or
 * unparseable document never throws: the result is `degraded` and discovery
 * falls back to the static tool list.
 */

import { existsSync, readFileSync } from 'node:fs';
import type { Logger } from '../logging/logger.js';
import { formatZodError } from '../errors.js';
import { OpenApiDocumentSchema, type OpenApiDocument } from './types.js';

export type SpecificationLoadResult =
  | { status: 'loaded'; path: string; document: OpenApiDocument }
  | { status: 'degraded'; path: string; reason: string };

export function loadSpecification(filePath: string, log: Logger): SpecificationLoadResult {
  if (!existsSync(filePath)) {
    log.warn({ path: filePath }, 'OpenAPI specification file not found');
    return { status: 'degraded', path: filePath, reason: 'OpenAPI specification file not found' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ path: filePath, err: error }, 'Failed to load OpenAPI specification');
    return {
      status: 'degraded',
      path: filePath,
      reason: `Failed to load OpenAPI specification: ${message}`,
    };
  }

  const result = OpenApiDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const message = formatZodError(result.error);
    log.error({ path: filePath, issues: message }, 'OpenAPI specification has an invalid shape');
    return {
      status: 'degraded',
      path: filePath,
      reason: `Invalid OpenAPI specification: ${message}`,
    };
  }

  log.info({ path: filePath }, 'OpenAPI specification loaded successfully');
  return { status: 'loaded', path: filePath, document: result.data };
}
