import { describe, it, expect } from 'vitest';
import { getApiCategories } from './api-categories.js';

describe('getApiCategories', () => {
  const result = getApiCategories();

  it('counts categories and endpoints', () => {
    expect(result.total_categories).toBe(8);
    expect(result.total_endpoints).toBe(23);
    expect(Object.keys(result.categories)).toEqual([
      'deployments',
      'teams',
      'users',
      'services',
      'incidents',
      'metrics',
      'health',
      'discovery',
    ]);
  });

  it('marks local tools with N/A', () => {
    const discovery = result.categories['discovery'];
    expect(discovery?.endpoints.every((e) => e.method === 'N/A' && e.path === 'N/A')).toBe(true);
  });

  it('lists only read endpoints', () => {
    const remote = Object.values(result.categories)
      .flatMap((c) => c.endpoints)
      .filter((e) => e.method !== 'N/A');
    expect(new Set(remote.map((e) => e.method))).toEqual(new Set(['GET', 'POST']));
    expect(remote).toHaveLength(10);
  });

  it('returns a fresh copy each call', () => {
    const first = getApiCategories();
    first.categories['health']?.endpoints.pop();
    expect(getApiCategories().categories['health']?.endpoints).toHaveLength(1);
  });
});
