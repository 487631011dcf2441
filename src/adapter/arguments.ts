/**
 * Argument Schemas
 *
 * Zod schemas for the remote tools. Out-of-range paging values are clamped
 * and unrecognized enum values are dropped rather than rejected; type errors
 * and missing required values are InvalidArgument. `null` is treated the
 * same as an omitted value.
 */

import { z } from 'zod';
import { formatZodError, InvalidArgumentError } from '../errors.js';

export const MAX_SEARCH_TERM_LENGTH = 100;

export const SORT_DIRECTIONS = ['asc', 'desc'] as const;
export const USER_FIELDS = ['name', 'email'] as const;
export const ORDER_DIRECTIONS = ['ASC', 'DESC'] as const;
export const USER_ROLES = ['admin', 'editor', 'viewer', 'external', 'basic'] as const;
export const EXPORT_FORMATS = ['csv', 'json'] as const;

/** Parse raw tool arguments; a missing argument object is treated as `{}`. */
export function parseArguments<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidArgumentError(formatZodError(result.error));
  }
  return result.data;
}

// ─── Building Blocks ─────────────────────────────────────────

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function pick<T extends string>(allowed: readonly T[], value: string | null | undefined): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

const optionalInt = z
  .number()
  .int()
  .nullish()
  .transform((v) => v ?? undefined);

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

/** Integer with a default, clamped into [min, max]. */
function boundedInt(defaultValue: number, min: number, max: number) {
  return z
    .number()
    .int()
    .nullish()
    .transform((v) => clamp(v ?? defaultValue, min, max));
}

const offset = boundedInt(0, 0, Number.MAX_SAFE_INTEGER);

/** String restricted to a set; anything else is silently dropped. */
function droppedUnless<T extends string>(allowed: readonly T[]) {
  return z
    .string()
    .nullish()
    .transform((v) => pick(allowed, v));
}

/** Search filter; an empty string means no filter. */
const optionalFilter = z
  .string()
  .nullish()
  .transform((v) => (v ? v : undefined));

const flag = z
  .boolean()
  .nullish()
  .transform((v) => v ?? false);

/** Trimmed; blank means unset. */
const searchTerm = z
  .string()
  .nullish()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  })
  .refine((v) => v === undefined || v.length <= MAX_SEARCH_TERM_LENGTH, {
    message: `must be between 1 and ${MAX_SEARCH_TERM_LENGTH} characters`,
  });

const idList = z
  .array(z.number().int())
  .nullish()
  .transform((v) => (v && v.length > 0 ? v : undefined));

// ─── Tool Schemas ────────────────────────────────────────────

export const ListDeploymentsArgs = z.object({
  repository_id: optionalInt,
  after: optionalString,
  before: optionalString,
  limit: boundedInt(10, 1, 100),
  offset,
  stage: optionalString,
  sort_by: z
    .string()
    .nullish()
    .transform((v) => v ?? 'published_at'),
  sort_dir: z
    .string()
    .nullish()
    .transform((v) => pick(SORT_DIRECTIONS, v ?? 'desc')),
  commit_sha: optionalString,
});

export const SearchTeamsArgs = z.object({
  offset,
  page_size: boundedInt(50, 1, 50),
  search_term: searchTerm,
  nonmerged_members_only: flag,
});

export const SearchUsersArgs = z.object({
  offset,
  page_size: boundedInt(50, 1, 50),
  order_by: droppedUnless(USER_FIELDS),
  order_dir: droppedUnless(ORDER_DIRECTIONS),
  search_by_field: droppedUnless(USER_FIELDS),
  search_term: searchTerm,
  user_role: droppedUnless(USER_ROLES),
  include_user_children: flag,
});

export const GetServicesArgs = z.object({
  repository_id: optionalInt,
});

export const GetServiceArgs = z.object({
  service_id: z.number().int().positive({ message: 'service_id must be a positive integer' }),
});

export const GetIncidentArgs = z.object({
  provider_id: z
    .string()
    .transform((v) => v.trim())
    .refine((v) => v.length > 0, { message: 'provider_id is required and cannot be empty' }),
});

export const SearchIncidentsArgs = z.object({
  limit: boundedInt(10, 1, 100),
  offset,
  status: optionalFilter,
  severity: optionalFilter,
  after: optionalFilter,
  before: optionalFilter,
});

const RequestedMetric = z
  .object({
    name: z.string().min(1),
    agg: z.string().optional(),
  })
  .passthrough();

const TimeRange = z
  .object({
    after: z.string(),
    before: z.string(),
  })
  .passthrough();

export const MetricsQueryArgs = z.object({
  group_by: z.string().min(1),
  roll_up: z.string().min(1),
  requested_metrics: z.array(RequestedMetric).min(1, 'requested_metrics is required and cannot be empty'),
  time_ranges: z.array(TimeRange).min(1, 'time_ranges is required and cannot be empty'),
  repository_ids: idList,
  team_ids: idList,
});

export const ExportMetricsArgs = MetricsQueryArgs.extend({
  file_format: z
    .enum(EXPORT_FORMATS, { errorMap: () => ({ message: "file_format must be 'csv' or 'json'" }) })
    .nullish()
    .transform((v) => v ?? 'csv'),
});

export const NoArgs = z.object({});

export type ListDeploymentsInput = z.output<typeof ListDeploymentsArgs>;
export type SearchTeamsInput = z.output<typeof SearchTeamsArgs>;
export type SearchUsersInput = z.output<typeof SearchUsersArgs>;
export type GetServicesInput = z.output<typeof GetServicesArgs>;
export type GetServiceInput = z.output<typeof GetServiceArgs>;
export type GetIncidentInput = z.output<typeof GetIncidentArgs>;
export type SearchIncidentsInput = z.output<typeof SearchIncidentsArgs>;
export type MetricsQueryInput = z.output<typeof MetricsQueryArgs>;
export type ExportMetricsInput = z.output<typeof ExportMetricsArgs>;
