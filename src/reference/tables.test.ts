import { describe, it, expect } from 'vitest';
import { METRIC_CATALOG, METRIC_CATEGORY_INFO } from './metric-catalog.js';
import { buildReferenceTables } from './tables.js';
import { TEAM_CATALOG, TEAM_TYPE_INFO } from './team-catalog.js';
import type { MetricDescriptor } from './types.js';

const sources = {
  metrics: METRIC_CATALOG,
  metricCategories: METRIC_CATEGORY_INFO,
  teams: TEAM_CATALOG,
  teamTypes: TEAM_TYPE_INFO,
};

describe('buildReferenceTables', () => {
  const tables = buildReferenceTables();

  it('derives category membership that agrees with each metric', () => {
    for (const metric of tables.metrics) {
      const owners = tables.metricCategories.filter((c) => c.metrics.includes(metric.name));
      expect(owners.map((c) => c.id)).toEqual([metric.category]);
    }
    for (const category of tables.metricCategories) {
      for (const name of category.metrics) {
        expect(tables.metrics.find((m) => m.name === name)?.category).toBe(category.id);
      }
    }
  });

  it('derives team type membership that agrees with each team', () => {
    for (const type of tables.teamTypes) {
      const expected = tables.teams.filter((t) => t.type === type.id).map((t) => t.id);
      expect(type.teams).toEqual(expected);
    }
  });

  it('keeps catalog order within a category', () => {
    const cycleTime = tables.metricCategories.find((c) => c.id === 'cycle_time');
    expect(cycleTime?.metrics).toEqual([
      'branch.computed.cycle_time',
      'branch.time_to_pr',
      'branch.time_to_review',
      'branch.review_time',
      'branch.time_to_prod',
    ]);
  });

  it('freezes the tables', () => {
    expect(Object.isFrozen(tables)).toBe(true);
    expect(Object.isFrozen(tables.metrics)).toBe(true);
    expect(Object.isFrozen(tables.metrics[0]?.aggregations)).toBe(true);
    expect(Object.isFrozen(tables.teamTypes[0]?.teams)).toBe(true);
  });

  it('does not share arrays with the catalog', () => {
    expect(tables.metrics[0]?.aggregations).not.toBe(METRIC_CATALOG[0]?.aggregations);
    expect(Object.isFrozen(METRIC_CATALOG[0]?.aggregations)).toBe(false);
  });

  it('rejects duplicate metric names', () => {
    const first = METRIC_CATALOG[0];
    if (!first) throw new Error('empty catalog');
    expect(() => buildReferenceTables({ ...sources, metrics: [...METRIC_CATALOG, { ...first }] })).toThrow(
      'Duplicate metric id: branch.computed.cycle_time'
    );
  });

  it('rejects a metric pointing at an undeclared category', () => {
    const stray: MetricDescriptor = {
      name: 'deploy.frequency',
      aggregations: [],
      description: 'Deployments per day',
      units: 'count',
      category: 'releases',
    };
    expect(() =>
      buildReferenceTables({
        ...sources,
        metrics: [stray],
        metricCategories: METRIC_CATEGORY_INFO.filter((c) => c.id !== 'releases'),
      })
    ).toThrow('metric "deploy.frequency" references unknown group "releases"');
  });
});
