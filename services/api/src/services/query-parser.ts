// ---------------------------------------------------------------------------
// Query parser
//
// Turns free text ("3BHK flat in Pune under ₹1.2 Cr") into structured search
// filters. Every rule family is an ordered table; the first entry that
// matches wins, so priority is defined by position.
// ---------------------------------------------------------------------------

import {
  CRORE,
  LAKH,
  type FurnishingType,
  type PossessionStatus,
  type PropertyKind,
  type SearchFilters,
} from '@propquery/shared';

// ---------------------------------------------------------------------------
// Rule tables
// ---------------------------------------------------------------------------

export interface CityKeywords {
  city: string;
  keywords: readonly string[];
}

export const CITY_KEYWORDS: readonly CityKeywords[] = [
  { city: 'pune', keywords: ['pune', 'pimpri', 'chinchwad', 'wakad', 'hinjewadi', 'mamurdi'] },
  { city: 'mumbai', keywords: ['mumbai', 'bombay', 'andheri', 'bandra', 'chembur', 'thane', 'navi mumbai'] },
  { city: 'bangalore', keywords: ['bangalore', 'bengaluru', 'whitefield', 'electronic city'] },
  { city: 'delhi', keywords: ['delhi', 'new delhi', 'gurgaon', 'noida', 'dwarka'] },
  { city: 'hyderabad', keywords: ['hyderabad', 'secunderabad', 'gachibowli', 'hitech city'] },
  { city: 'chennai', keywords: ['chennai', 'madras', 'tambaram'] },
  { city: 'kolkata', keywords: ['kolkata', 'calcutta', 'salt lake'] },
];

export interface BudgetRule {
  pattern: RegExp;
  multiplier: number;
}

// Optional rupee sign, then an amount with optional decimals and separators
const AMOUNT = String.raw`₹?\s*(\d[\d,]*\.?\d*)\s*`;

export const BUDGET_RULES: readonly BudgetRule[] = [
  { pattern: new RegExp(`${AMOUNT}cr(?:ore)?s?`), multiplier: CRORE },
  { pattern: new RegExp(`${AMOUNT}la(?:kh|c)s?`), multiplier: LAKH },
  { pattern: new RegExp(String.raw`${AMOUNT}l\b`), multiplier: LAKH },
  { pattern: new RegExp(`${AMOUNT}million`), multiplier: CRORE },
];

export interface KeywordRule<T> {
  keywords: readonly string[];
  value: T;
}

export const STATUS_RULES: readonly KeywordRule<PossessionStatus>[] = [
  { keywords: ['ready', 'immediate', 'ready to move'], value: 'ready' },
  { keywords: ['under construction', 'upcoming'], value: 'under_construction' },
];

export const PROPERTY_TYPE_RULES: readonly KeywordRule<PropertyKind>[] = [
  { keywords: ['apartment', 'flat'], value: 'apartment' },
  { keywords: ['villa'], value: 'villa' },
  { keywords: ['plot'], value: 'plot' },
];

// "unfurnished" contains "furnished", so the plain keyword must come last
export const FURNISHING_RULES: readonly KeywordRule<FurnishingType>[] = [
  { keywords: ['semi'], value: 'SEMI-FURNISHED' },
  { keywords: ['unfurnished'], value: 'UNFURNISHED' },
  { keywords: ['furnished'], value: 'FURNISHED' },
];

const BHK_PATTERN = /(\d+)\s*bhk/;

// ---------------------------------------------------------------------------
// Matchers
// ---------------------------------------------------------------------------

export function firstKeywordMatch<T>(text: string, rules: readonly KeywordRule<T>[]): T | undefined {
  for (const rule of rules) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return rule.value;
    }
  }
  return undefined;
}

export function parseBedroomCount(text: string): number | undefined {
  const match = text.match(BHK_PATTERN);
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Budget ceiling in rupees from the first budget rule that matches.
 * Later rules are not consulted once one has matched.
 */
export function parseBudget(text: string): number | undefined {
  for (const { pattern, multiplier } of BUDGET_RULES) {
    const match = text.match(pattern);
    if (!match) continue;

    const amount = parseFloat(match[1].replace(/,/g, ''));
    if (Number.isNaN(amount)) continue;
    return amount * multiplier;
  }
  return undefined;
}

export function findCity(text: string): CityKeywords | undefined {
  return CITY_KEYWORDS.find(({ keywords }) => keywords.some((keyword) => text.includes(keyword)));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract search filters from a natural-language query.
 * Pure: the same text always yields the same filters.
 */
export function parseQuery(query: string): SearchFilters {
  const text = query.toLowerCase();
  const filters: SearchFilters = {};

  const bedroomCount = parseBedroomCount(text);
  if (bedroomCount !== undefined) filters.bedroomCount = bedroomCount;

  const maxBudget = parseBudget(text);
  if (maxBudget !== undefined) filters.maxBudget = maxBudget;

  const city = findCity(text);
  if (city) {
    filters.city = city.city;
    filters.cityKeywords = city.keywords;
  }

  const status = firstKeywordMatch(text, STATUS_RULES);
  if (status) filters.status = status;

  const propertyType = firstKeywordMatch(text, PROPERTY_TYPE_RULES);
  if (propertyType) filters.propertyType = propertyType;

  if (text.includes('furnished')) {
    filters.furnishing = firstKeywordMatch(text, FURNISHING_RULES);
  }

  return filters;
}
