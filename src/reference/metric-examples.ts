/**
 * Example measurement queries for post_metrics, with guidance on picking
 * aggregations and roll-up periods.
 */

interface MetricQueryExample {
  description: string;
  arguments: {
    group_by: string;
    roll_up: string;
    requested_metrics: Array<{ name: string; agg?: string }>;
    time_ranges: Array<{ after: string; before: string }>;
  };
}

const EXAMPLES: Record<string, MetricQueryExample> = {
  cycle_time_analysis: {
    description: 'Analyze development cycle time with different aggregations',
    arguments: {
      group_by: 'team',
      roll_up: '1w',
      requested_metrics: [
        { name: 'branch.computed.cycle_time', agg: 'p75' },
        { name: 'branch.time_to_pr', agg: 'p50' },
        { name: 'branch.review_time', agg: 'avg' },
      ],
      time_ranges: [{ after: '2023-01-01', before: '2023-01-31' }],
    },
  },
  pr_quality_metrics: {
    description: 'Analyze pull request quality and review patterns',
    arguments: {
      group_by: 'repository',
      roll_up: '1mo',
      requested_metrics: [
        { name: 'pr.merged' },
        { name: 'pr.review_depth' },
        { name: 'pr.merged.without.review.count' },
        { name: 'pr.merged.size', agg: 'p75' },
      ],
      time_ranges: [{ after: '2023-01-01', before: '2023-12-31' }],
    },
  },
  activity_overview: {
    description: 'Get overview of development activity',
    arguments: {
      group_by: 'organization',
      roll_up: '1d',
      requested_metrics: [
        { name: 'commit.total.count' },
        { name: 'pr.new' },
        { name: 'pr.reviews' },
        { name: 'commit.activity_days' },
      ],
      time_ranges: [{ after: '2023-12-01', before: '2023-12-31' }],
    },
  },
  code_quality_analysis: {
    description: 'Analyze code quality through rework and refactor metrics',
    arguments: {
      group_by: 'team',
      roll_up: '1w',
      requested_metrics: [
        { name: 'commit.activity.new_work.count' },
        { name: 'commit.activity.rework.count' },
        { name: 'commit.activity.refactor.count' },
        { name: 'commit.total_changes' },
      ],
      time_ranges: [{ after: '2023-01-01', before: '2023-03-31' }],
    },
  },
  reliability_metrics: {
    description: 'Monitor system reliability and incident metrics',
    arguments: {
      group_by: 'organization',
      roll_up: '1mo',
      requested_metrics: [
        { name: 'pm.mttr' },
        { name: 'pm.cfr.issues.done' },
        { name: 'releases.count' },
      ],
      time_ranges: [{ after: '2023-01-01', before: '2023-12-31' }],
    },
  },
};

const AGGREGATION_GUIDE = {
  p75: '75th percentile - good for understanding typical high-end performance',
  p50: '50th percentile (median) - represents typical performance',
  avg: 'Average - useful for overall trends but can be skewed by outliers',
};

const BEST_PRACTICES = [
  'Use p75 for cycle time metrics to understand realistic delivery times',
  'Use p50 for median performance analysis',
  'Combine count metrics with time-based metrics for comprehensive analysis',
  'Use appropriate roll_up periods: 1d for detailed analysis, 1w for trends, 1mo for high-level overview',
];

export interface MetricExample {
  description: string;
  code: string;
  arguments: MetricQueryExample['arguments'];
  metrics_used: string[];
}

export interface MetricExamplesResult {
  examples: Record<string, MetricExample>;
  aggregation_guide: Record<string, string>;
  best_practices: string[];
}

export function getMetricExamples(): MetricExamplesResult {
  const examples: Record<string, MetricExample> = {};
  for (const [key, example] of Object.entries(EXAMPLES)) {
    examples[key] = {
      description: example.description,
      code: `post_metrics(${JSON.stringify(example.arguments, null, 2)})`,
      arguments: example.arguments,
      metrics_used: example.arguments.requested_metrics.map((m) => m.name),
    };
  }

  return {
    examples,
    aggregation_guide: { ...AGGREGATION_GUIDE },
    best_practices: [...BEST_PRACTICES],
  };
}
