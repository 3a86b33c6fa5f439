/**
 * Shared Zod validation schemas for PropQuery
 * Used by the HTTP layer and by any client building search requests
 */

import { z } from 'zod';

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_MAX_SEARCH_LIMIT = 50;

// ============================================
// Search Schemas
// ============================================

/** Free-text query: 1-200 chars after trimming */
export const searchQueryTextSchema = z
  .string()
  .trim()
  .min(1, 'Query is required')
  .max(200, 'Query must be at most 200 characters');

/** Result count, coerced from the query string */
export function searchLimitSchema(maxLimit: number = DEFAULT_MAX_SEARCH_LIMIT) {
  return z.coerce
    .number()
    .int('Limit must be a whole number')
    .min(1, 'Limit must be at least 1')
    .max(maxLimit, `Limit must be at most ${maxLimit}`)
    .default(DEFAULT_SEARCH_LIMIT);
}

/** Search request; `maxLimit` caps the result count */
export function createSearchQuerySchema(maxLimit: number = DEFAULT_MAX_SEARCH_LIMIT) {
  return z.object({
    q: searchQueryTextSchema.describe('Free-text query, e.g. "2BHK in Mumbai ready to move under 80 lakh"'),
    limit: searchLimitSchema(maxLimit),
  });
}

export const parseQuerySchema = z.object({
  q: searchQueryTextSchema,
});

export type SearchQueryInput = z.infer<ReturnType<typeof createSearchQuerySchema>>;
