/**
 * Remote Calls
 *
 * One function per read endpoint of the provider. Arguments arrive already
 * validated (see arguments.ts); unset optionals are stripped before sending.
 */

import type { LinearBClient } from '../clients/linearb-client.js';
import type {
  ExportMetricsInput,
  GetIncidentInput,
  GetServiceInput,
  GetServicesInput,
  ListDeploymentsInput,
  MetricsQueryInput,
  SearchIncidentsInput,
  SearchTeamsInput,
  SearchUsersInput,
} from './arguments.js';

export type RemoteClient = Pick<LinearBClient, 'get' | 'post'>;

export function listDeployments(client: RemoteClient, args: ListDeploymentsInput): Promise<unknown> {
  return client.get('/api/v1/deployments', {
    repository_id: args.repository_id,
    after: args.after,
    before: args.before,
    limit: args.limit,
    offset: args.offset,
    stage: args.stage,
    sort_by: args.sort_by,
    sort_dir: args.sort_dir,
    commit_sha: args.commit_sha,
  });
}

export function searchTeams(client: RemoteClient, args: SearchTeamsInput): Promise<unknown> {
  return client.get('/api/v2/teams', {
    offset: args.offset,
    page_size: args.page_size,
    nonmerged_members_only: args.nonmerged_members_only,
    search_term: args.search_term,
  });
}

export function searchUsers(client: RemoteClient, args: SearchUsersInput): Promise<unknown> {
  return client.get('/api/v1/users', {
    offset: args.offset,
    page_size: args.page_size,
    include_user_children: args.include_user_children,
    order_by: args.order_by,
    order_dir: args.order_dir,
    search_by_field: args.search_by_field,
    search_term: args.search_term,
    user_role: args.user_role,
  });
}

export function getServices(client: RemoteClient, args: GetServicesInput): Promise<unknown> {
  return client.get('/api/v1/services/', { repository_id: args.repository_id });
}

export function getService(client: RemoteClient, args: GetServiceInput): Promise<unknown> {
  return client.get(`/api/v1/services/${args.service_id}`);
}

export function getIncident(client: RemoteClient, args: GetIncidentInput): Promise<unknown> {
  return client.get(`/api/v1/incidents/${encodeURIComponent(args.provider_id)}`);
}

export function searchIncidents(client: RemoteClient, args: SearchIncidentsInput): Promise<unknown> {
  return client.post(
    '/api/v1/incidents/search',
    stripUnset({
      limit: args.limit,
      offset: args.offset,
      status: args.status,
      severity: args.severity,
      after: args.after,
      before: args.before,
    })
  );
}

export function healthCheck(client: RemoteClient): Promise<unknown> {
  return client.get('/api/v1/health');
}

export function postMetrics(client: RemoteClient, args: MetricsQueryInput): Promise<unknown> {
  return client.post('/api/v2/measurements', measurementsPayload(args));
}

export function exportMetrics(client: RemoteClient, args: ExportMetricsInput): Promise<unknown> {
  return client.post('/api/v2/measurements/export', measurementsPayload(args), {
    file_format: args.file_format,
  });
}

function measurementsPayload(args: MetricsQueryInput): Record<string, unknown> {
  return stripUnset({
    group_by: args.group_by,
    roll_up: args.roll_up,
    requested_metrics: args.requested_metrics,
    time_ranges: args.time_ranges,
    repository_ids: args.repository_ids,
    team_ids: args.team_ids,
  });
}

/** JSON bodies carry only the keys that were set. */
export function stripUnset(body: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(body).filter(([, value]) => value !== undefined));
}
