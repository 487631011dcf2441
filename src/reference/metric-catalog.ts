/**
 * Supported LinearB metrics, as accepted by the measurements API.
 */

import type { MetricCategoryInfo, MetricDescriptor } from './types.js';

const WITH_AGGREGATION = ['p75', 'p50', 'avg'] as const;

export const METRIC_CATALOG: readonly MetricDescriptor[] = [
  {
    name: 'branch.computed.cycle_time',
    aggregations: WITH_AGGREGATION,
    description:
      'Full cycle time (Coding time + Pickup time + Review time + Time to production)',
    units: 'min',
    category: 'cycle_time',
  },
  {
    name: 'branch.time_to_pr',
    aggregations: WITH_AGGREGATION,
    description: 'Coding time (Time to PR)',
    units: 'min',
    category: 'cycle_time',
  },
  {
    name: 'branch.time_to_review',
    aggregations: WITH_AGGREGATION,
    description: 'Pickup time (Time to review)',
    units: 'min',
    category: 'cycle_time',
  },
  {
    name: 'branch.review_time',
    aggregations: WITH_AGGREGATION,
    description: 'Review time',
    units: 'min',
    category: 'cycle_time',
  },
  {
    name: 'branch.time_to_prod',
    aggregations: WITH_AGGREGATION,
    description: 'Time to production (Time to deploy)',
    units: 'min',
    category: 'cycle_time',
  },
  {
    name: 'pr.merged.size',
    aggregations: WITH_AGGREGATION,
    description: 'The sum of PR sizes of merged PRs',
    units: 'lines of code',
    category: 'pull_requests',
  },
  {
    name: 'pr.merged',
    aggregations: [],
    description: 'The number of PRs that got merged',
    units: 'count',
    category: 'pull_requests',
  },
  {
    name: 'pr.review_depth',
    aggregations: [],
    description: 'The sum of comments divided by the sum of PRs',
    units: 'lines of comments',
    category: 'pull_requests',
  },
  {
    name: 'commit.activity.new_work.count',
    aggregations: [],
    description: 'The total new lines of code',
    units: 'count',
    category: 'commits',
  },
  {
    name: 'commit.total_changes',
    aggregations: [],
    description: 'The total lines of code that have been replaced',
    units: 'lines of code',
    category: 'commits',
  },
  {
    name: 'commit.activity.refactor.count',
    aggregations: [],
    description: 'The total lines of code that have been replaced that are older then 25 days',
    units: 'lines of code',
    category: 'commits',
  },
  {
    name: 'commit.activity.rework.count',
    aggregations: [],
    description:
      'The total lines of code that have replaced code written within the last 25 days, but outside this branch',
    units: 'lines of code',
    category: 'commits',
  },
  {
    name: 'pr.merged.without.review.count',
    aggregations: [],
    description: 'The number of PRs that got merged without review',
    units: 'count',
    category: 'pull_requests',
  },
  {
    name: 'commit.total.count',
    aggregations: [],
    description: 'The sum of commits',
    units: 'count',
    category: 'commits',
  },
  {
    name: 'pr.new',
    aggregations: [],
    description: 'The number of opened PRs',
    units: 'count',
    category: 'pull_requests',
  },
  {
    name: 'pr.reviews',
    aggregations: [],
    description: 'The number of reviews on all PRs',
    units: 'count',
    category: 'pull_requests',
  },
  {
    name: 'releases.count',
    aggregations: [],
    description: 'The number of releases',
    units: 'count',
    category: 'releases',
  },
  {
    name: 'commit.activity_days',
    aggregations: [],
    description: 'The amount of day of developer activity (commit/comment/PR/merge/review)',
    units: 'days',
    category: 'activity',
  },
  {
    name: 'branch.state.computed.done',
    aggregations: [],
    description: 'Number of branches that reached state done',
    units: 'count',
    category: 'branches',
  },
  {
    name: 'branch.state.active',
    aggregations: [],
    description: 'Number of active branches',
    units: 'count',
    category: 'branches',
  },
  {
    name: 'pm.mttr',
    aggregations: [],
    description: 'Mean time to repair',
    units: 'min',
    category: 'incidents',
  },
  {
    name: 'pm.cfr.issues.done',
    aggregations: [],
    description: 'The sum of issues that are considered as incidents that reached a done state',
    units: 'count',
    category: 'incidents',
  },
];

export const METRIC_CATEGORY_INFO: readonly MetricCategoryInfo[] = [
  {
    id: 'cycle_time',
    name: 'Cycle Time Metrics',
    description: 'Metrics related to development cycle time and flow',
  },
  {
    id: 'pull_requests',
    name: 'Pull Request Metrics',
    description: 'Metrics related to pull requests and code reviews',
  },
  {
    id: 'commits',
    name: 'Commit Metrics',
    description: 'Metrics related to commits and code changes',
  },
  {
    id: 'releases',
    name: 'Release Metrics',
    description: 'Metrics related to software releases',
  },
  {
    id: 'activity',
    name: 'Activity Metrics',
    description: 'Metrics related to developer activity',
  },
  {
    id: 'branches',
    name: 'Branch Metrics',
    description: 'Metrics related to branch states',
  },
  {
    id: 'incidents',
    name: 'Incident Metrics',
    description: 'Metrics related to incidents and reliability',
  },
];
