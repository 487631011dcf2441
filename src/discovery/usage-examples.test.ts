import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { API_TOOL_ROUTES } from '../openapi/tool-map.js';
import { getUsageExamples, loadUsageExamples } from './usage-examples.js';

describe('bundled usage examples', () => {
  const corpus = loadUsageExamples();

  it('has examples for every remote tool', () => {
    const tools = new Set(Object.values(corpus).flatMap((tools) => Object.keys(tools)));
    for (const route of API_TOOL_ROUTES) {
      expect(tools.has(route.tool)).toBe(true);
    }
  });
});

describe('getUsageExamples', () => {
  const corpus = loadUsageExamples();

  it('finds a tool across categories', () => {
    const result = getUsageExamples(corpus, { tool_name: 'get_incident' });

    expect(result).toEqual({
      tool: 'get_incident',
      category: 'incidents',
      examples: {
        description: 'Get specific incident details (read-only)',
        examples: [{ title: 'Get incident by provider ID', arguments: { provider_id: 'INC-001' } }],
      },
    });
  });

  it('prefers the tool lookup over the category', () => {
    const result = getUsageExamples(corpus, { category: 'teams', tool_name: 'search_metrics' });
    expect(result).toHaveProperty('category', 'metrics_discovery');
  });

  it('returns NotFound for a tool without examples', () => {
    const result = getUsageExamples(corpus, { tool_name: 'delete_incident' });
    expect(result).toMatchObject({ error: "No examples found for tool 'delete_incident'", code: 'not_found' });
  });

  it('returns one category', () => {
    const result = getUsageExamples(corpus, { category: 'services' });
    if (!('tools' in result)) throw new Error('expected a category');
    expect(Object.keys(result.tools)).toEqual(['get_services', 'get_service']);
  });

  it('returns NotFound listing the categories for an unknown category', () => {
    expect(getUsageExamples(corpus, { category: 'billing' })).toEqual({
      error: "Category 'billing' not found",
      code: 'not_found',
      available_categories: Object.keys(corpus),
    });
  });

  it('does not treat inherited object members as tools', () => {
    expect(getUsageExamples(corpus, { tool_name: 'constructor' })).toMatchObject({
      error: "No examples found for tool 'constructor'",
      code: 'not_found',
    });
  });

  it('does not treat inherited object members as categories', () => {
    expect(getUsageExamples(corpus, { category: 'toString' })).toEqual({
      error: "Category 'toString' not found",
      code: 'not_found',
      available_categories: Object.keys(corpus),
    });
  });

  it('returns the whole corpus without a filter', () => {
    const result = getUsageExamples(corpus);
    expect(result).toEqual({ all_categories: Object.keys(corpus), examples: corpus });
  });
});

describe('loadUsageExamples', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'linearb-examples-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('rejects a tool without examples', () => {
    const path = join(dir, 'examples.json');
    writeFileSync(path, JSON.stringify({ health: { health_check: { description: 'Ping', examples: [] } } }));

    expect(() => loadUsageExamples(path)).toThrow(`Invalid usage examples in ${path}`);
  });
});
