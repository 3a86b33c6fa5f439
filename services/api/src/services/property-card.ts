// ---------------------------------------------------------------------------
// Property cards
//
// Turns a denormalized record into display strings. Source data is patchy,
// so every field has a fallback and junk values collapse to "Not mentioned".
// ---------------------------------------------------------------------------

import {
  formatArea,
  formatPrice,
  titleCase,
  truncateText,
  type PropertyCard,
  type PropertyRecord,
} from '@propquery/shared';
import { CITY_KEYWORDS } from './query-parser.js';

export const NOT_MENTIONED = 'Not mentioned';
export const LOCATION_PLACEHOLDER = 'Location details coming soon';
export const GENERIC_AMENITIES = ['Modern Amenities', 'Security', 'Parking'] as const;

const MISSING_VALUES = new Set(['', 'nan', 'none', 'unknown', 'not mentioned', 'n/a']);
const MAX_AMENITIES = 4;
const MAX_LOCALITY_LENGTH = 40;

/**
 * Collapse missing or placeholder values ("nan", "N/A", ...) to "Not mentioned".
 */
export function normalizeDisplayValue(value: string | null | undefined): string {
  if (value == null) return NOT_MENTIONED;
  const trimmed = value.trim();
  return MISSING_VALUES.has(trimmed.toLowerCase()) ? NOT_MENTIONED : trimmed;
}

function isMentioned(value: string): boolean {
  return value !== NOT_MENTIONED;
}

/**
 * Best guess at the city from a free-form address: a known city keyword wins,
 * otherwise the last comma-separated part.
 */
export function extractCityFromAddress(address: string | null): string {
  const cleaned = normalizeDisplayValue(address);
  if (!isMentioned(cleaned)) return NOT_MENTIONED;

  const lower = cleaned.toLowerCase();
  const known = CITY_KEYWORDS.find(({ keywords }) => keywords.some((keyword) => lower.includes(keyword)));
  if (known) return titleCase(known.city);

  const parts = cleaned
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  return parts.length > 0 ? titleCase(parts[parts.length - 1]) : NOT_MENTIONED;
}

export function getBhkDisplay(record: PropertyRecord): string {
  if (record.customBHK) return record.customBHK;
  if (record.type !== null) return `${Math.trunc(record.type)}BHK`;
  return 'N/A';
}

/**
 * Whole count from a raw cell, or null when it does not parse.
 */
function parseCount(raw: string | null): number | null {
  if (raw === null) return null;
  const value = Number(raw.trim());
  return Number.isFinite(value) ? Math.trunc(value) : null;
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

export function buildAmenities(record: PropertyRecord): string[] {
  const amenities: string[] = [];

  if (record.lift?.trim().toUpperCase() === 'TRUE') {
    amenities.push('Lift');
  }

  const balconies = parseCount(record.balcony);
  if (balconies !== null && balconies > 0) {
    amenities.push(plural(balconies, 'Balcony', 'Balconies'));
  }

  const bathrooms = parseCount(record.bathrooms);
  if (bathrooms !== null) {
    amenities.push(plural(bathrooms, 'Bathroom', 'Bathrooms'));
  }

  const list = amenities.length > 0 ? amenities : [...GENERIC_AMENITIES];
  return list.slice(0, MAX_AMENITIES);
}

function projectUrl(record: PropertyRecord, title: string): { slug: string; url: string } {
  const slug = record.slug ?? title.toLowerCase().replace(/ /g, '-');
  return { slug, url: `/project/${slug}` };
}

export function renderPropertyCard(record: PropertyRecord): PropertyCard {
  const title = record.projectName ?? 'Untitled Project';

  const explicitCity = normalizeDisplayValue(record.city);
  const city = isMentioned(explicitCity) ? explicitCity : extractCityFromAddress(record.fullAddress);

  const landmark = normalizeDisplayValue(record.landmark);
  const locality = isMentioned(landmark) ? landmark : normalizeDisplayValue(record.fullAddress);

  const location =
    !isMentioned(city) && !isMentioned(locality) ? LOCATION_PLACEHOLDER : `${city}, ${locality}`;

  return {
    title,
    location,
    city,
    locality: truncateText(locality, MAX_LOCALITY_LENGTH),
    bhk: getBhkDisplay(record),
    price: formatPrice(record.price),
    carpetArea: formatArea(record.carpetArea),
    status: record.status ?? 'Available',
    furnishing: normalizeDisplayValue(record.furnishedType),
    amenities: buildAmenities(record),
    ...projectUrl(record, title),
  };
}
