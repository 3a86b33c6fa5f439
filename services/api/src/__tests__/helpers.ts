import type { PropertyRecord } from '@propquery/shared';
import type { Dataset } from '../data/dataset.js';

export const ALL_COLUMNS = [
  'id',
  'projectName',
  'type',
  'customBHK',
  'price',
  'carpetArea',
  'slug',
  'furnishedType',
  'status',
  'lift',
  'fullAddress',
  'landmark',
  'configurationId',
  'bathrooms',
  'balcony',
];

export function makeRecord(overrides: Partial<PropertyRecord> = {}): PropertyRecord {
  return {
    projectId: null,
    projectName: null,
    type: null,
    customBHK: null,
    price: null,
    carpetArea: null,
    slug: null,
    furnishedType: null,
    status: null,
    lift: null,
    fullAddress: null,
    landmark: null,
    city: null,
    configurationId: null,
    bathrooms: null,
    balcony: null,
    ...overrides,
  };
}

export function makeDataset(records: PropertyRecord[], columns: string[] = ALL_COLUMNS): Dataset {
  return {
    records,
    columns: new Set(columns),
    loadedAt: new Date(0),
  };
}

/**
 * A small listing set covering Pune, Mumbai and Bangalore.
 */
export function sampleRecords(): PropertyRecord[] {
  return [
    makeRecord({
      projectId: '1',
      projectName: 'Skyline Residency',
      type: 3,
      price: 9_500_000,
      carpetArea: 1180,
      slug: 'skyline-residency',
      furnishedType: 'SEMI-FURNISHED',
      status: 'READY_TO_MOVE',
      lift: 'TRUE',
      fullAddress: 'Survey No. 42, Wakad Road, Pune',
      landmark: 'Near Phoenix Mall',
      bathrooms: '3',
      balcony: '2',
    }),
    // Second variant of the same project
    makeRecord({
      projectId: '1',
      projectName: 'Skyline Residency',
      type: 3,
      price: 9_800_000,
      slug: 'skyline-residency',
      furnishedType: 'SEMI-FURNISHED',
      status: 'READY_TO_MOVE',
      fullAddress: 'Survey No. 42, Wakad Road, Pune',
    }),
    makeRecord({
      projectId: '2',
      projectName: 'Green Meadows',
      type: 2,
      price: 6_200_000,
      slug: 'green-meadows',
      furnishedType: 'UNFURNISHED',
      status: 'Under Construction',
      fullAddress: 'Phase 2, Hinjewadi, Pune',
    }),
    makeRecord({
      projectId: '3',
      projectName: 'Harbour View Towers',
      type: 2,
      price: 7_800_000,
      slug: 'harbour-view-towers',
      furnishedType: 'UNFURNISHED',
      status: 'Under Construction',
      fullAddress: 'Plot 7, RC Marg, Chembur, Mumbai',
    }),
    makeRecord({
      projectId: '4',
      projectName: 'Andheri Central',
      type: 2,
      price: 8_200_000,
      slug: 'andheri-central',
      furnishedType: 'SEMI-FURNISHED',
      status: 'READY_TO_MOVE',
      fullAddress: 'Link Road, Andheri West, Mumbai',
    }),
    makeRecord({
      projectId: '5',
      projectName: 'Lakeside Enclave',
      type: 3,
      price: 13_500_000,
      slug: 'lakeside-enclave',
      furnishedType: 'FURNISHED',
      status: 'READY_TO_MOVE',
      fullAddress: 'ITPL Main Road, Whitefield, Bengaluru',
    }),
    makeRecord({
      projectId: '6',
      projectName: 'Sunrise Court',
      customBHK: '2 BHK Premium',
      price: 7_000_000,
      slug: 'sunrise-court',
      status: 'Ongoing',
      landmark: 'Gachibowli',
    }),
    makeRecord({
      projectId: '7',
      projectName: 'Riverbend Plots',
      slug: 'riverbend-plots',
      status: 'Upcoming',
      fullAddress: 'Mamurdi, Pune',
    }),
  ];
}
