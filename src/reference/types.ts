/**
 * Reference Table Types
 *
 * Metric and team catalogs. Field names are the wire names returned by the
 * tools, which is why they are snake_case.
 */

export const METRIC_CATEGORY_IDS = [
  'cycle_time',
  'pull_requests',
  'commits',
  'releases',
  'activity',
  'branches',
  'incidents',
] as const;

export type MetricCategoryId = (typeof METRIC_CATEGORY_IDS)[number];

export const AGGREGATIONS = ['p75', 'p50', 'avg'] as const;

export type Aggregation = (typeof AGGREGATIONS)[number];

export interface MetricDescriptor {
  readonly name: string;
  /** Empty when the metric takes no aggregation. */
  readonly aggregations: readonly Aggregation[];
  readonly description: string;
  readonly units: string;
  readonly category: MetricCategoryId;
}

/** Authored part of a category; members are derived. */
export interface MetricCategoryInfo {
  readonly id: MetricCategoryId;
  readonly name: string;
  readonly description: string;
}

export interface MetricCategory extends MetricCategoryInfo {
  readonly metrics: readonly string[];
}

export const TEAM_TYPE_IDS = ['engineering', 'qa'] as const;

export type TeamTypeId = (typeof TEAM_TYPE_IDS)[number];

export interface TeamDescriptor {
  readonly id: string;
  readonly name: string;
  readonly short_name: string;
  readonly type: TeamTypeId;
  readonly description: string;
  readonly color: string;
  /** Independent of `type`: only comparable teams enter cross-team comparisons. */
  readonly comparable: boolean;
  readonly focus_areas: readonly string[];
}

export interface TeamTypeInfo {
  readonly id: TeamTypeId;
  readonly name: string;
  readonly description: string;
  readonly comparable: boolean;
}

export interface TeamType extends TeamTypeInfo {
  readonly teams: readonly string[];
}

/** Immutable catalogs built once at startup and passed to every query. */
export interface ReferenceTables {
  readonly metrics: readonly MetricDescriptor[];
  readonly metricCategories: readonly MetricCategory[];
  readonly teams: readonly TeamDescriptor[];
  readonly teamTypes: readonly TeamType[];
}
