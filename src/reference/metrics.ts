/**
 * Metric Queries
 *
 * Read-only lookups over the metric catalog. Results are freshly built plain
 * objects, keyed by metric name in catalog order.
 */

import { notFound, type NotFoundResult } from '../errors.js';
import { matchesAny, normalizeSearchTerm } from './search.js';
import type { MetricCategoryId, MetricDescriptor, ReferenceTables } from './types.js';

export const METRICS_USAGE_NOTE =
  'Use these metric names in post_metrics() calls. Specify aggregation (p75, p50, avg) where supported.';

export interface CategorySummary {
  name: string;
  description: string;
  metrics: string[];
}

export interface SupportedMetricsResult {
  total_metrics: number;
  categories: number;
  metrics: Record<string, MetricDescriptor>;
  categories_info: Record<string, CategorySummary>;
  usage_note: string;
}

export interface MetricCategoryDetail {
  category: MetricCategoryId;
  name: string;
  description: string;
  total_metrics: number;
  metrics: Record<string, MetricDescriptor>;
}

export interface MetricCategoryIndex {
  total_categories: number;
  categories: Record<string, CategorySummary & { metric_count: number }>;
}

export type MetricCategoryNotFound = NotFoundResult<{ available_categories: string[] }>;

export interface MetricSearchOptions {
  search_term: string;
  category?: string;
  has_aggregation?: boolean;
}

export interface MetricSearchResult {
  search_term: string;
  filters: { category: string | null; has_aggregation: boolean | null };
  total_matches: number;
  metrics: Record<string, MetricDescriptor>;
}

/** Every supported metric plus the category index. */
export function listMetrics(tables: ReferenceTables): SupportedMetricsResult {
  const categoriesInfo: Record<string, CategorySummary> = {};
  for (const category of tables.metricCategories) {
    categoriesInfo[category.id] = {
      name: category.name,
      description: category.description,
      metrics: [...category.metrics],
    };
  }

  return {
    total_metrics: tables.metrics.length,
    categories: tables.metricCategories.length,
    metrics: keyByName(tables.metrics),
    categories_info: categoriesInfo,
    usage_note: METRICS_USAGE_NOTE,
  };
}

/**
 * One category's metrics, or the index of all categories when no id is given.
 * An unknown id yields a NotFound result listing the valid ids.
 */
export function getMetricsByCategory(
  tables: ReferenceTables,
  categoryId?: string
): MetricCategoryDetail | MetricCategoryIndex | MetricCategoryNotFound {
  if (categoryId) {
    const category = tables.metricCategories.find((c) => c.id === categoryId);
    if (!category) {
      return notFound(`Category '${categoryId}' not found`, {
        available_categories: tables.metricCategories.map((c) => c.id),
      });
    }

    const members = new Set(category.metrics);
    return {
      category: category.id,
      name: category.name,
      description: category.description,
      total_metrics: category.metrics.length,
      metrics: keyByName(tables.metrics.filter((m) => members.has(m.name))),
    };
  }

  const categories: MetricCategoryIndex['categories'] = {};
  for (const category of tables.metricCategories) {
    categories[category.id] = {
      name: category.name,
      description: category.description,
      metric_count: category.metrics.length,
      metrics: [...category.metrics],
    };
  }
  return { total_categories: tables.metricCategories.length, categories };
}

/**
 * Substring search over metric names and descriptions, then the category and
 * aggregation filters. Throws InvalidArgumentError for terms under 2 characters.
 */
export function searchMetrics(
  tables: ReferenceTables,
  options: MetricSearchOptions
): MetricSearchResult {
  const term = normalizeSearchTerm(options.search_term);
  const category = options.category || null;
  const hasAggregation = options.has_aggregation ?? null;

  const matches = tables.metrics.filter((metric) => {
    if (!matchesAny(term, [metric.name, metric.description])) return false;
    if (category !== null && metric.category !== category) return false;
    if (hasAggregation !== null && (metric.aggregations.length > 0) !== hasAggregation) return false;
    return true;
  });

  return {
    search_term: term,
    filters: { category, has_aggregation: hasAggregation },
    total_matches: matches.length,
    metrics: keyByName(matches),
  };
}

function keyByName(metrics: readonly MetricDescriptor[]): Record<string, MetricDescriptor> {
  const result: Record<string, MetricDescriptor> = {};
  for (const metric of metrics) {
    result[metric.name] = metric;
  }
  return result;
}
