import {
  formatBudget,
  formatPriceRange,
  titleCase,
  type PossessionStatus,
  type PropertyRecord,
  type SearchFilters,
} from '@propquery/shared';

const NO_MATCH = 'No properties found matching your criteria.';

const STATUS_LABELS: Record<PossessionStatus, string> = {
  ready: 'ready to move',
  under_construction: 'under construction',
};

/**
 * Suggestions for an empty result: relax the status filter, raise the budget.
 */
function relaxationHints(filters: SearchFilters): string[] {
  const hints: string[] = [];
  if (filters.status) {
    hints.push(`removing the '${STATUS_LABELS[filters.status]}' filter`);
  }
  if (filters.maxBudget !== undefined) {
    hints.push('increasing your budget');
  }
  return hints;
}

/**
 * A short natural-language summary of a search result.
 */
export function generateSummary(records: readonly PropertyRecord[], filters: SearchFilters): string {
  if (records.length === 0) {
    const hints = relaxationHints(filters);
    if (hints.length === 0) {
      return `${NO_MATCH} Try adjusting your search parameters.`;
    }
    return `${NO_MATCH} Try ${hints.join(', and ')} for better results.`;
  }

  const count = records.length;
  const bhk = filters.bedroomCount !== undefined ? `${filters.bedroomCount}BHK ` : '';
  const noun = count > 1 ? 'properties' : 'property';
  const city = titleCase(filters.city ?? 'various cities');
  const budget = filters.maxBudget !== undefined ? formatBudget(filters.maxBudget) : 'your budget';

  const prices = records.flatMap((r) => (r.price === null ? [] : [r.price]));
  const range = formatPriceRange(Math.min(...prices), Math.max(...prices));

  let summary = `Found ${count} ${bhk}${noun} in ${city} under ${budget}. `;
  summary += `Prices range from ${range}. `;

  if (count > 5) {
    summary += `Showing top ${count} matches with the best value for your requirements.`;
  } else {
    summary += 'These properties offer great value with modern amenities and convenient locations.';
  }

  return summary;
}

// Display order for describeFilters; cityKeywords is an internal helper
const FILTER_LABELS: ReadonlyArray<[keyof SearchFilters, string]> = [
  ['bedroomCount', 'Bedrooms'],
  ['maxBudget', 'Max Budget'],
  ['city', 'City'],
  ['status', 'Status'],
  ['propertyType', 'Property Type'],
  ['furnishing', 'Furnishing'],
];

function describeValue(key: keyof SearchFilters, filters: SearchFilters): string | null {
  switch (key) {
    case 'bedroomCount':
      return filters.bedroomCount !== undefined ? `${filters.bedroomCount}BHK` : null;
    case 'maxBudget':
      return filters.maxBudget !== undefined ? formatBudget(filters.maxBudget) : null;
    case 'city':
      return filters.city ? titleCase(filters.city) : null;
    case 'status':
      return filters.status ? titleCase(STATUS_LABELS[filters.status]) : null;
    case 'propertyType':
      return filters.propertyType ? titleCase(filters.propertyType) : null;
    case 'furnishing':
      return filters.furnishing ?? null;
    default:
      return null;
  }
}

/**
 * One "Label: value" line per extracted filter, for explaining a search.
 */
export function describeFilters(filters: SearchFilters): string[] {
  const lines: string[] = [];
  for (const [key, label] of FILTER_LABELS) {
    const value = describeValue(key, filters);
    if (value !== null) lines.push(`${label}: ${value}`);
  }
  return lines;
}
