import { InvalidArgumentError } from '../errors.js';

export const MIN_SEARCH_TERM_LENGTH = 2;

/**
 * Lower-case and trim a reference-table search term.
 * Fewer than two characters left after trimming is rejected.
 */
export function normalizeSearchTerm(term: string): string {
  const normalized = term.trim().toLowerCase();
  if (normalized.length < MIN_SEARCH_TERM_LENGTH) {
    throw new InvalidArgumentError(
      `search_term must be at least ${MIN_SEARCH_TERM_LENGTH} characters long`
    );
  }
  return normalized;
}

export function matchesAny(term: string, fields: readonly string[]): boolean {
  return fields.some((field) => field.toLowerCase().includes(term));
}
