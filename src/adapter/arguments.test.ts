import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../errors.js';
import {
  ExportMetricsArgs,
  GetIncidentArgs,
  GetServiceArgs,
  ListDeploymentsArgs,
  MetricsQueryArgs,
  parseArguments,
  SearchIncidentsArgs,
  SearchTeamsArgs,
  SearchUsersArgs,
} from './arguments.js';

const metricsQuery = {
  group_by: 'team',
  roll_up: '1w',
  requested_metrics: [{ name: 'branch.computed.cycle_time', agg: 'p75' }],
  time_ranges: [{ after: '2024-01-01', before: '2024-01-31' }],
};

describe('parseArguments', () => {
  it('treats missing arguments as an empty object', () => {
    expect(parseArguments(SearchIncidentsArgs, undefined)).toEqual({
      limit: 10,
      offset: 0,
      status: undefined,
      severity: undefined,
      after: undefined,
      before: undefined,
    });
  });

  it('reports type errors as InvalidArgument with the field name', () => {
    expect(() => parseArguments(ListDeploymentsArgs, { limit: 'ten' })).toThrow(InvalidArgumentError);
    expect(() => parseArguments(ListDeploymentsArgs, { limit: 'ten' })).toThrow(
      'limit: Expected number, received string'
    );
  });
});

describe('search_incidents arguments', () => {
  it('treats empty filters as unset', () => {
    expect(parseArguments(SearchIncidentsArgs, { status: '', severity: 'high' })).toMatchObject({
      status: undefined,
      severity: 'high',
    });
  });
});

describe('list_deployments arguments', () => {
  it('applies the defaults', () => {
    expect(parseArguments(ListDeploymentsArgs, {})).toMatchObject({
      limit: 10,
      offset: 0,
      sort_by: 'published_at',
      sort_dir: 'desc',
    });
  });

  it.each([
    [0, 1],
    [250, 100],
    [-3, 1],
    [42, 42],
  ])('clamps limit %i to %i', (limit, expected) => {
    expect(parseArguments(ListDeploymentsArgs, { limit }).limit).toBe(expected);
  });

  it('floors the offset at zero', () => {
    expect(parseArguments(ListDeploymentsArgs, { offset: -20 }).offset).toBe(0);
  });

  it('drops an unknown sort direction', () => {
    expect(parseArguments(ListDeploymentsArgs, { sort_dir: 'sideways' }).sort_dir).toBeUndefined();
    expect(parseArguments(ListDeploymentsArgs, { sort_dir: 'asc' }).sort_dir).toBe('asc');
  });

  it('treats null like an omitted value', () => {
    expect(parseArguments(ListDeploymentsArgs, { limit: null, stage: null })).toMatchObject({
      limit: 10,
      stage: undefined,
    });
  });
});

describe('search_teams_v2 arguments', () => {
  it('clamps page_size into [1, 50]', () => {
    expect(parseArguments(SearchTeamsArgs, { page_size: 500 }).page_size).toBe(50);
    expect(parseArguments(SearchTeamsArgs, { page_size: 0 }).page_size).toBe(1);
  });

  it('trims the search term and drops a blank one', () => {
    expect(parseArguments(SearchTeamsArgs, { search_term: '  platform ' }).search_term).toBe('platform');
    expect(parseArguments(SearchTeamsArgs, { search_term: '   ' }).search_term).toBeUndefined();
  });

  it('rejects a search term over 100 characters', () => {
    expect(() => parseArguments(SearchTeamsArgs, { search_term: 'x'.repeat(101) })).toThrow(
      'search_term: must be between 1 and 100 characters'
    );
    expect(parseArguments(SearchTeamsArgs, { search_term: 'x'.repeat(100) }).search_term).toHaveLength(100);
  });

  it('defaults nonmerged_members_only to false', () => {
    expect(parseArguments(SearchTeamsArgs, {}).nonmerged_members_only).toBe(false);
  });
});

describe('search_users arguments', () => {
  it('keeps values from the allowed sets', () => {
    expect(
      parseArguments(SearchUsersArgs, {
        order_by: 'email',
        order_dir: 'DESC',
        search_by_field: 'name',
        user_role: 'viewer',
      })
    ).toMatchObject({ order_by: 'email', order_dir: 'DESC', search_by_field: 'name', user_role: 'viewer' });
  });

  it('silently drops values outside the allowed sets', () => {
    expect(
      parseArguments(SearchUsersArgs, {
        order_by: 'created_at',
        order_dir: 'desc',
        search_by_field: 'id',
        user_role: 'owner',
      })
    ).toMatchObject({ order_by: undefined, order_dir: undefined, search_by_field: undefined, user_role: undefined });
  });

  it('defaults include_user_children to false', () => {
    expect(parseArguments(SearchUsersArgs, {}).include_user_children).toBe(false);
  });
});

describe('get_service arguments', () => {
  it.each([0, -4])('rejects service_id %i', (serviceId) => {
    expect(() => parseArguments(GetServiceArgs, { service_id: serviceId })).toThrow(
      'service_id: service_id must be a positive integer'
    );
  });

  it('rejects a non-integer service_id', () => {
    expect(() => parseArguments(GetServiceArgs, { service_id: 1.5 })).toThrow(InvalidArgumentError);
  });

  it('requires service_id', () => {
    expect(() => parseArguments(GetServiceArgs, {})).toThrow('service_id: Required');
  });
});

describe('get_incident arguments', () => {
  it('trims the provider id', () => {
    expect(parseArguments(GetIncidentArgs, { provider_id: ' INC-7 ' }).provider_id).toBe('INC-7');
  });

  it('rejects a blank provider id', () => {
    expect(() => parseArguments(GetIncidentArgs, { provider_id: '   ' })).toThrow(
      'provider_id: provider_id is required and cannot be empty'
    );
  });
});

describe('measurement arguments', () => {
  it('rejects empty metric and time range lists', () => {
    expect(() => parseArguments(MetricsQueryArgs, { ...metricsQuery, requested_metrics: [] })).toThrow(
      'requested_metrics: requested_metrics is required and cannot be empty'
    );
    expect(() => parseArguments(MetricsQueryArgs, { ...metricsQuery, time_ranges: [] })).toThrow(
      'time_ranges: time_ranges is required and cannot be empty'
    );
  });

  it('requires group_by and roll_up', () => {
    expect(() => parseArguments(MetricsQueryArgs, { ...metricsQuery, group_by: undefined })).toThrow(
      'group_by: Required'
    );
  });

  it('drops empty id lists', () => {
    const args = parseArguments(MetricsQueryArgs, { ...metricsQuery, repository_ids: [], team_ids: [7] });
    expect(args.repository_ids).toBeUndefined();
    expect(args.team_ids).toEqual([7]);
  });

  it('defaults the export format to csv', () => {
    expect(parseArguments(ExportMetricsArgs, metricsQuery).file_format).toBe('csv');
  });

  it('rejects an unknown export format', () => {
    expect(() => parseArguments(ExportMetricsArgs, { ...metricsQuery, file_format: 'xlsx' })).toThrow(
      "file_format: file_format must be 'csv' or 'json'"
    );
  });
});
