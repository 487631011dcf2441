/**
 * Team Queries
 *
 * Read-only lookups over the active-team catalog. Comparability comes from the
 * team's own `comparable` flag, not from its type.
 */

import { notFound, type NotFoundResult } from '../errors.js';
import { matchesAny, normalizeSearchTerm } from './search.js';
import type { ReferenceTables, TeamDescriptor, TeamTypeId } from './types.js';

export const TEAMS_USAGE_NOTE =
  'Use team names in metrics queries. Engineering teams are comparable, QA teams should be analyzed separately.';

export const COMPARABLE_USAGE_NOTE =
  'These teams can be compared in metrics analysis. QA teams are tracked separately.';

export interface TeamTypeSummary {
  name: string;
  description: string;
  comparable: boolean;
  teams: string[];
}

export interface ActiveTeamsResult {
  total_teams: number;
  team_types: number;
  teams: Record<string, TeamDescriptor>;
  types: Record<string, TeamTypeSummary>;
  usage_note: string;
}

export interface TeamTypeDetail {
  team_type: TeamTypeId;
  name: string;
  description: string;
  comparable: boolean;
  total_teams: number;
  teams: Record<string, TeamDescriptor>;
}

export interface TeamTypeIndex {
  total_types: number;
  types: Record<string, TeamTypeSummary & { team_count: number }>;
}

export type TeamTypeNotFound = NotFoundResult<{ available_types: string[] }>;

export interface ComparableTeamsResult {
  total_comparable_teams: number;
  teams: Record<string, TeamDescriptor>;
  excluded_teams: Record<string, TeamDescriptor>;
  usage_note: string;
}

export interface TeamSearchOptions {
  search_term: string;
  team_type?: string;
  comparable_only?: boolean;
}

export interface TeamSearchResult {
  search_term: string;
  filters: { team_type: string | null; comparable_only: boolean };
  total_matches: number;
  teams: Record<string, TeamDescriptor>;
}

export function listTeams(tables: ReferenceTables): ActiveTeamsResult {
  const types: Record<string, TeamTypeSummary> = {};
  for (const type of tables.teamTypes) {
    types[type.id] = {
      name: type.name,
      description: type.description,
      comparable: type.comparable,
      teams: [...type.teams],
    };
  }

  return {
    total_teams: tables.teams.length,
    team_types: tables.teamTypes.length,
    teams: keyById(tables.teams),
    types,
    usage_note: TEAMS_USAGE_NOTE,
  };
}

/**
 * Teams of one type, or the index of all types when no id is given.
 * An unknown id yields a NotFound result listing the valid ids.
 */
export function getTeamsByType(
  tables: ReferenceTables,
  typeId?: string
): TeamTypeDetail | TeamTypeIndex | TeamTypeNotFound {
  if (typeId) {
    const type = tables.teamTypes.find((t) => t.id === typeId);
    if (!type) {
      return notFound(`Team type '${typeId}' not found`, {
        available_types: tables.teamTypes.map((t) => t.id),
      });
    }

    const members = new Set(type.teams);
    return {
      team_type: type.id,
      name: type.name,
      description: type.description,
      comparable: type.comparable,
      total_teams: type.teams.length,
      teams: keyById(tables.teams.filter((t) => members.has(t.id))),
    };
  }

  const types: TeamTypeIndex['types'] = {};
  for (const type of tables.teamTypes) {
    types[type.id] = {
      name: type.name,
      description: type.description,
      comparable: type.comparable,
      team_count: type.teams.length,
      teams: [...type.teams],
    };
  }
  return { total_types: tables.teamTypes.length, types };
}

/** Partition every team by its comparability flag. */
export function getComparableTeams(tables: ReferenceTables): ComparableTeamsResult {
  const comparable = tables.teams.filter((t) => t.comparable);
  const excluded = tables.teams.filter((t) => !t.comparable);

  return {
    total_comparable_teams: comparable.length,
    teams: keyById(comparable),
    excluded_teams: keyById(excluded),
    usage_note: COMPARABLE_USAGE_NOTE,
  };
}

/**
 * Substring search over team display names, descriptions and focus areas,
 * then the type and comparability filters.
 */
export function searchTeamsByFocus(
  tables: ReferenceTables,
  options: TeamSearchOptions
): TeamSearchResult {
  const term = normalizeSearchTerm(options.search_term);
  const teamType = options.team_type || null;
  const comparableOnly = options.comparable_only ?? false;

  const matches = tables.teams.filter((team) => {
    if (!matchesAny(term, [team.name, team.description, ...team.focus_areas])) return false;
    if (teamType !== null && team.type !== teamType) return false;
    if (comparableOnly && !team.comparable) return false;
    return true;
  });

  return {
    search_term: term,
    filters: { team_type: teamType, comparable_only: comparableOnly },
    total_matches: matches.length,
    teams: keyById(matches),
  };
}

function keyById(teams: readonly TeamDescriptor[]): Record<string, TeamDescriptor> {
  const result: Record<string, TeamDescriptor> = {};
  for (const team of teams) {
    result[team.id] = team;
  }
  return result;
}
