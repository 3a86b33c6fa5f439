/**
 * Type exports for @propquery/shared
 */

// Property types
export type {
  PropertyRecord,
  PossessionStatus,
  PropertyKind,
  FurnishingType,
  SearchFilters,
  PropertyCard,
} from './property.js';

// API types
export type {
  ApiError,
  SearchResponse,
  ParseQueryResponse,
  HealthResponse,
} from './api.js';
