/**
 * Property-related types for PropQuery
 * A property record is one row of the denormalized project/address/
 * configuration/variant table.
 */

/**
 * Typed view of a denormalized listing row.
 * Every field is nullable: any source column may be absent or empty.
 */
export interface PropertyRecord {
  /** Project id from project.csv */
  projectId: string | null;
  projectName: string | null;
  /** Bedroom-count code (2 for a 2BHK) */
  type: number | null;
  /** Free-text bedroom label, e.g. "2.5 BHK" or "4BHK Duplex" */
  customBHK: string | null;
  /** Price in rupees */
  price: number | null;
  /** Carpet area in square feet */
  carpetArea: number | null;
  /** Unique display key, also used for deduplication */
  slug: string | null;
  furnishedType: string | null;
  /** Lifecycle label, e.g. "READY_TO_MOVE" or "Under Construction" */
  status: string | null;
  /** Raw lift flag ("TRUE" / "FALSE") */
  lift: string | null;
  fullAddress: string | null;
  landmark: string | null;
  city: string | null;
  configurationId: string | null;
  /** Raw count, parsed only when rendering */
  bathrooms: string | null;
  /** Raw count, parsed only when rendering */
  balcony: string | null;
}

/**
 * Readiness bucket a query can ask for
 */
export type PossessionStatus = 'ready' | 'under_construction';

/**
 * Property kinds the query parser recognises
 */
export type PropertyKind = 'apartment' | 'villa' | 'plot';

/**
 * Furnishing categories, upper-cased as stored in furnishedType
 */
export type FurnishingType = 'FURNISHED' | 'SEMI-FURNISHED' | 'UNFURNISHED';

/**
 * Structured filters extracted from a free-text query.
 * A missing key means "no constraint of that kind".
 */
export interface SearchFilters {
  bedroomCount?: number;
  /** Upper price bound in rupees */
  maxBudget?: number;
  /** Canonical city name, lower-case */
  city?: string;
  /** Every keyword variant of `city`; drives the address match */
  cityKeywords?: readonly string[];
  status?: PossessionStatus;
  propertyType?: PropertyKind;
  furnishing?: FurnishingType;
}

/**
 * Display-ready card for a single search result
 */
export interface PropertyCard {
  title: string;
  /** "City, Locality" or a placeholder when both are unknown */
  location: string;
  city: string;
  locality: string;
  bhk: string;
  price: string;
  carpetArea: string;
  status: string;
  furnishing: string;
  /** At most four entries */
  amenities: string[];
  url: string;
  slug: string;
}
