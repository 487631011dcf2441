/**
 * Reference Tables
 *
 * Builds the metric and team catalogs once. Category and team-type membership
 * is derived by grouping the descriptors, so a metric's `category` and its
 * category's member list cannot disagree.
 */

import { METRIC_CATALOG, METRIC_CATEGORY_INFO } from './metric-catalog.js';
import { TEAM_CATALOG, TEAM_TYPE_INFO } from './team-catalog.js';
import type {
  MetricCategory,
  MetricCategoryInfo,
  MetricDescriptor,
  ReferenceTables,
  TeamDescriptor,
  TeamType,
  TeamTypeInfo,
} from './types.js';

export interface ReferenceSources {
  metrics: readonly MetricDescriptor[];
  metricCategories: readonly MetricCategoryInfo[];
  teams: readonly TeamDescriptor[];
  teamTypes: readonly TeamTypeInfo[];
}

const DEFAULT_SOURCES: ReferenceSources = {
  metrics: METRIC_CATALOG,
  metricCategories: METRIC_CATEGORY_INFO,
  teams: TEAM_CATALOG,
  teamTypes: TEAM_TYPE_INFO,
};

/**
 * Build the immutable reference tables.
 * Throws on duplicate ids or on a descriptor pointing at an undeclared
 * category/type.
 */
export function buildReferenceTables(sources: ReferenceSources = DEFAULT_SOURCES): ReferenceTables {
  assertUnique(sources.metrics.map((m) => m.name), 'metric');
  assertUnique(sources.metricCategories.map((c) => c.id), 'metric category');
  assertUnique(sources.teams.map((t) => t.id), 'team');
  assertUnique(sources.teamTypes.map((t) => t.id), 'team type');

  const metricCategories: MetricCategory[] = groupMembers(
    sources.metricCategories,
    sources.metrics,
    (metric) => metric.category,
    (metric) => metric.name,
    'metric'
  ).map(({ info, members }) => ({ ...info, metrics: members }));

  const teamTypes: TeamType[] = groupMembers(
    sources.teamTypes,
    sources.teams,
    (team) => team.type,
    (team) => team.id,
    'team'
  ).map(({ info, members }) => ({ ...info, teams: members }));

  return deepFreeze({
    metrics: sources.metrics.map(cloneMetric),
    metricCategories,
    teams: sources.teams.map(cloneTeam),
    teamTypes,
  });
}

// ─── Helpers ─────────────────────────────────────────────────

/**
 * Single grouping pass: each group's members are the ids of the items whose
 * key equals the group id, in catalog order.
 */
function groupMembers<Info extends { id: string }, Item>(
  groups: readonly Info[],
  items: readonly Item[],
  keyOf: (item: Item) => string,
  idOf: (item: Item) => string,
  label: string
): Array<{ info: Info; members: string[] }> {
  const buckets = new Map<string, string[]>(groups.map((g) => [g.id, []]));

  for (const item of items) {
    const bucket = buckets.get(keyOf(item));
    if (!bucket) {
      throw new Error(`${label} "${idOf(item)}" references unknown group "${keyOf(item)}"`);
    }
    bucket.push(idOf(item));
  }

  return groups.map((info) => ({ info, members: buckets.get(info.id) ?? [] }));
}

function assertUnique(ids: readonly string[], label: string): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new Error(`Duplicate ${label} id: ${id}`);
    }
    seen.add(id);
  }
}

function cloneMetric(metric: MetricDescriptor): MetricDescriptor {
  return { ...metric, aggregations: [...metric.aggregations] };
}

function cloneTeam(team: TeamDescriptor): TeamDescriptor {
  return { ...team, focus_areas: [...team.focus_areas] };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
