/**
 * @propquery/shared
 *
 * Shared TypeScript types and utilities for PropQuery
 * Used by the search service (Fastify) and its CLI
 */

// Re-export all types
export * from './types/index.js';

// Re-export all utilities
export * from './utils/index.js';

// Package metadata
export const PACKAGE_VERSION = '0.1.0';
