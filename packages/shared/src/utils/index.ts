/**
 * Utility exports for @propquery/shared
 */

// Validation schemas
export {
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_MAX_SEARCH_LIMIT,
  searchQueryTextSchema,
  searchLimitSchema,
  createSearchQuerySchema,
  parseQuerySchema,
  type SearchQueryInput,
} from './validation.js';

// Formatting utilities
export {
  CRORE,
  LAKH,
  toFixedHalfEven,
  formatPrice,
  formatBudget,
  formatPriceRange,
  formatArea,
  titleCase,
  truncateText,
} from './formatting.js';
