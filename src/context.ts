/**
 * Server Context
 *
 * Everything a tool invocation reads, built once at startup. Only the HTTP
 * client holds mutable state; the rest is read-only for the process lifetime.
 */

import type { RemoteClient } from './adapter/remote-calls.js';
import { LinearBClient } from './clients/linearb-client.js';
import { packageRoot } from './config/paths.js';
import type { ServerSettings } from './config/types.js';
import { loadUsageExamples, type UsageExamples } from './discovery/usage-examples.js';
import type { Logger } from './logging/logger.js';
import { buildEndpointModel } from './openapi/endpoint-model.js';
import { loadSpecification, type SpecificationLoadResult } from './openapi/loader.js';
import type { EndpointModel } from './openapi/types.js';
import { buildReferenceTables } from './reference/tables.js';
import type { ReferenceTables } from './reference/types.js';

/** The read-only part of the context; enough for the CLI. */
export interface DiscoveryState {
  settings: ServerSettings;
  tables: ReferenceTables;
  specification: SpecificationLoadResult;
  /** Null when the OpenAPI document could not be loaded. */
  model: EndpointModel | null;
  usageExamples: UsageExamples;
  rootDir: string;
}

export interface ServerContext extends DiscoveryState {
  log: Logger;
  client: RemoteClient;
}

export interface CreateContextOptions {
  settings: ServerSettings;
  log: Logger;
  /** Defaults to a LinearBClient built from `settings`. */
  client?: RemoteClient;
  rootDir?: string;
}

export function loadDiscoveryState(settings: ServerSettings, log: Logger, rootDir = packageRoot()): DiscoveryState {
  const specification = loadSpecification(settings.openApiPath, log.child({ component: 'openapi' }));
  const model =
    specification.status === 'loaded'
      ? buildEndpointModel(specification.document, settings.baseUrl, log.child({ component: 'openapi' }))
      : null;

  if (model) {
    log.info({ endpoints: model.endpoints.size }, 'Endpoint model built');
  }

  return {
    settings,
    tables: buildReferenceTables(),
    specification,
    model,
    usageExamples: loadUsageExamples(),
    rootDir,
  };
}

export function createContext(options: CreateContextOptions): ServerContext {
  const { settings, log } = options;
  return {
    ...loadDiscoveryState(settings, log, options.rootDir),
    log,
    client:
      options.client ??
      new LinearBClient({
        baseUrl: settings.baseUrl,
        apiKey: settings.apiKey,
        timeoutMs: settings.timeoutMs,
        log,
      }),
  };
}
