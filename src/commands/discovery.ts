/**
 * linearb-readonly discovery commands
 *
 *   discover    Endpoint count, API version, base URL, derived categories
 *   categories  Curated tool taxonomy
 *   endpoint    Details of one endpoint
 *   examples    Usage examples
 *   docs        Documentation files
 *   metrics     Metric categories, or the metrics of one category
 *   teams       Team types, or the teams of one type
 *   status      Resolved configuration and specification status
 *
 * All output is computed locally; none of these commands call the API.
 */

import { describeSettings } from '../config/settings.js';
import type { DiscoveryState } from '../context.js';
import { getApiCategories } from '../discovery/api-categories.js';
import { discoverApi, getEndpointDetails } from '../discovery/api-discovery.js';
import { getDocumentationFiles } from '../discovery/documentation.js';
import { getUsageExamples } from '../discovery/usage-examples.js';
import { isErrorPayload } from '../errors.js';
import { getMetricsByCategory } from '../reference/metrics.js';
import { getTeamsByType } from '../reference/teams.js';

export interface CommandOutput {
  text: string;
  /** True when the result is an error payload; the CLI exits non-zero. */
  failed: boolean;
}

function json(payload: unknown): CommandOutput {
  return { text: JSON.stringify(payload, null, 2), failed: isErrorPayload(payload) };
}

export function runDiscover(state: DiscoveryState): CommandOutput {
  const result = discoverApi(state.model);
  if ('code' in result) {
    return json(result);
  }

  const version = typeof result.api_info['version'] === 'string' ? result.api_info['version'] : 'unknown';
  const lines: string[] = [];
  lines.push(`Endpoints:   ${Object.keys(result.endpoints).length}`);
  lines.push(`API version: ${version}`);
  lines.push(`Base URL:    ${result.base_url}`);
  lines.push('');
  lines.push('Categories:');
  for (const [category, keys] of Object.entries(result.categories)) {
    if (keys.length === 0) continue;
    lines.push(`  ${category} (${keys.length})`);
    for (const key of keys) {
      lines.push(`    - ${key}`);
    }
  }
  return { text: lines.join('\n'), failed: false };
}

export function runCategories(): CommandOutput {
  return json(getApiCategories());
}

export function runEndpoint(
  state: DiscoveryState,
  positionals: readonly string[],
  flags: Record<string, string>
): CommandOutput {
  const path = positionals[0];
  if (!path) {
    return { text: 'Usage: linearb-readonly endpoint <path> [--method GET]', failed: true };
  }
  return json(getEndpointDetails(state.model, path, flags['method'] || 'GET'));
}

export function runExamples(state: DiscoveryState, flags: Record<string, string>): CommandOutput {
  return json(
    getUsageExamples(state.usageExamples, {
      category: flags['category'] || undefined,
      tool_name: flags['tool'] || undefined,
    })
  );
}

export function runDocs(state: DiscoveryState): CommandOutput {
  return json(getDocumentationFiles(state.settings.docsDir, state.rootDir));
}

export function runMetrics(state: DiscoveryState, flags: Record<string, string>): CommandOutput {
  return json(getMetricsByCategory(state.tables, flags['category'] || undefined));
}

export function runTeams(state: DiscoveryState, flags: Record<string, string>): CommandOutput {
  return json(getTeamsByType(state.tables, flags['type'] || undefined));
}

export function runStatus(state: DiscoveryState, version: string): CommandOutput {
  const settings = describeSettings(state.settings);
  const spec = state.specification;

  const lines: string[] = [];
  lines.push(`linearb-readonly-mcp v${version}`);
  lines.push('');
  lines.push(`API key:     ${settings['apiKey']} (${settings['apiKeySource']})`);
  lines.push(`Base URL:    ${settings['baseUrl']}`);
  lines.push(`Timeout:     ${settings['timeoutMs']}ms`);
  lines.push(`Log level:   ${settings['logLevel']}`);
  lines.push(
    `OpenAPI:     ${spec.path} (${spec.status === 'loaded' ? `${state.model?.endpoints.size ?? 0} endpoints` : spec.reason})`
  );
  lines.push(`Docs dir:    ${state.settings.docsDir}`);
  return { text: lines.join('\n'), failed: false };
}
