import type { PropertyRecord } from '@propquery/shared';
import type { Cell, Row } from './csv.js';

/**
 * Parse a numeric cell, tolerating thousands separators ("1,25,00,000").
 * Anything that is not a finite number is treated as absent.
 */
export function parseNumber(value: Cell | undefined): number | null {
  if (value == null) return null;
  const cleaned = value.replace(/,/g, '').trim();
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

function text(row: Row, column: string): string | null {
  return row[column] ?? null;
}

/**
 * Typed view of one denormalized row.
 */
export function toPropertyRecord(row: Row): PropertyRecord {
  return {
    projectId: text(row, 'id'),
    projectName: text(row, 'projectName'),
    type: parseNumber(row.type),
    customBHK: text(row, 'customBHK'),
    price: parseNumber(row.price),
    carpetArea: parseNumber(row.carpetArea),
    slug: text(row, 'slug'),
    furnishedType: text(row, 'furnishedType'),
    status: text(row, 'status'),
    lift: text(row, 'lift'),
    fullAddress: text(row, 'fullAddress'),
    landmark: text(row, 'landmark'),
    city: text(row, 'city'),
    configurationId: text(row, 'configurationId'),
    bathrooms: text(row, 'bathrooms'),
    balcony: text(row, 'balcony'),
  };
}
