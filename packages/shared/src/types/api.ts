/**
 * API request/response types for PropQuery
 * These types define the contract between the search service and its UI/CLI consumers
 */

import type { PropertyCard, SearchFilters } from './property.js';

/**
 * Standard API error response
 */
export interface ApiError {
  error: string;
  message: string;
  details?: unknown;
}

// ============================================
// Search API Types
// ============================================

export interface SearchResponse {
  query: string;
  filters: SearchFilters;
  summary: string;
  count: number;
  results: PropertyCard[];
}

export interface ParseQueryResponse {
  query: string;
  filters: SearchFilters;
  /** Human-readable "Label: value" lines, one per filter */
  description: string[];
}

// ============================================
// Health API Types
// ============================================

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  version: string;
  uptime: number;
  /** Number of denormalized records held in memory */
  records: number;
}
