import {
  DEFAULT_SEARCH_LIMIT,
  type FurnishingType,
  type PossessionStatus,
  type PropertyRecord,
  type SearchFilters,
} from '@propquery/shared';
import type { Dataset } from '../data/dataset.js';
import { parseQuery } from './query-parser.js';

// --- Types ---

export interface SearchResult {
  records: PropertyRecord[];
  /** The filters the records were selected with */
  filters: SearchFilters;
}

// --- Predicates ---

export const STATUS_MATCH_KEYWORDS: Record<PossessionStatus, readonly string[]> = {
  ready: ['ready', 'completed', 'ready to move'],
  under_construction: ['under construction', 'ongoing', 'upcoming'],
};

function containsIgnoreCase(value: string | null, needle: string): boolean {
  return value !== null && value.toLowerCase().includes(needle.toLowerCase());
}

export function hasPrice(record: PropertyRecord): boolean {
  return record.price !== null;
}

/**
 * Bedroom match on either the numeric type code or the free-text label.
 */
export function matchesBedroomCount(record: PropertyRecord, bedroomCount: number): boolean {
  if (record.type === bedroomCount) return true;
  return (
    containsIgnoreCase(record.customBHK, `${bedroomCount}BHK`) ||
    containsIgnoreCase(record.customBHK, `${bedroomCount} BHK`)
  );
}

export function matchesBudget(record: PropertyRecord, maxBudget: number): boolean {
  return record.price !== null && record.price <= maxBudget;
}

/**
 * True when any city keyword appears in the address, the landmark or the
 * project name.
 */
export function matchesCity(record: PropertyRecord, keywords: readonly string[]): boolean {
  const fields = [record.fullAddress, record.landmark, record.projectName];
  return keywords.some((keyword) => fields.some((field) => containsIgnoreCase(field, keyword)));
}

export function matchesStatus(record: PropertyRecord, status: PossessionStatus): boolean {
  return STATUS_MATCH_KEYWORDS[status].some((keyword) => containsIgnoreCase(record.status, keyword));
}

export function matchesFurnishing(record: PropertyRecord, furnishing: FurnishingType): boolean {
  return record.furnishedType !== null && record.furnishedType.toUpperCase() === furnishing;
}

// --- Ranking ---

export function isReady(record: PropertyRecord): boolean {
  return containsIgnoreCase(record.status, 'ready');
}

/**
 * Ready-to-move first, then cheapest. Without a status column only price
 * counts. The sort is stable, so equal keys keep dataset order.
 */
export function rankRecords(records: readonly PropertyRecord[], byReadiness: boolean): PropertyRecord[] {
  return [...records].sort((a, b) => {
    if (byReadiness) {
      const readiness = Number(isReady(b)) - Number(isReady(a));
      if (readiness !== 0) return readiness;
    }
    return (a.price ?? 0) - (b.price ?? 0);
  });
}

/**
 * Keep the first record for each slug. Records without a slug share one key.
 */
export function dedupeBySlug(records: readonly PropertyRecord[]): PropertyRecord[] {
  const seen = new Set<string | null>();
  return records.filter((record) => {
    if (seen.has(record.slug)) return false;
    seen.add(record.slug);
    return true;
  });
}

// --- Search ---

/**
 * Apply filters in a fixed order. Each step is skipped when its filter is
 * absent; status and furnishing are also skipped when the dataset has no
 * column to test against.
 */
export function applyFilters(dataset: Dataset, filters: SearchFilters): PropertyRecord[] {
  const { bedroomCount, maxBudget, cityKeywords, city, status, furnishing } = filters;
  let records = dataset.records.filter(hasPrice);

  if (bedroomCount !== undefined) {
    records = records.filter((r) => matchesBedroomCount(r, bedroomCount));
  }

  if (maxBudget !== undefined) {
    records = records.filter((r) => matchesBudget(r, maxBudget));
  }

  if (city !== undefined) {
    const keywords = cityKeywords ?? [city];
    records = records.filter((r) => matchesCity(r, keywords));
  }

  if (status !== undefined && dataset.columns.has('status')) {
    records = records.filter((r) => matchesStatus(r, status));
  }

  if (furnishing !== undefined && dataset.columns.has('furnishedType')) {
    records = records.filter((r) => matchesFurnishing(r, furnishing));
  }

  return records;
}

/**
 * Parse a free-text query and return the best matching records, ranked,
 * one per slug, at most `limit` of them.
 */
export function searchProperties(
  dataset: Dataset,
  query: string,
  limit: number = DEFAULT_SEARCH_LIMIT
): SearchResult {
  const filters = parseQuery(query);
  const filtered = applyFilters(dataset, filters);
  const ranked = rankRecords(filtered, dataset.columns.has('status'));
  const records = dedupeBySlug(ranked).slice(0, Math.max(0, limit));

  return { records, filters };
}
