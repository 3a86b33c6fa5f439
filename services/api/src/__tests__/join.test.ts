import { describe, it, expect } from '@jest/globals';
import { join } from 'node:path';
import { parseCsv, type Table } from '../data/csv.js';
import { readCsvFile } from '../data/dataset.js';
import { joinTables, leftJoin, normalizeKey } from '../data/join.js';

const FIXTURES = join(__dirname, 'fixtures');

function fixture(name: string): Table {
  return readCsvFile(join(FIXTURES, name));
}

function fixtureSources() {
  return {
    project: fixture('project.csv'),
    address: fixture('ProjectAddress.csv'),
    configuration: fixture('ProjectConfiguration.csv'),
    variant: fixture('ProjectConfigurationVariant.csv'),
  };
}

describe('Join', () => {
  describe('normalizeKey', () => {
    it('treats integral floats as integers', () => {
      expect(normalizeKey('2.0')).toBe('2');
      expect(normalizeKey(' 7 ')).toBe('7');
    });

    it('strips leading zeros and trailing fraction zeros', () => {
      expect(normalizeKey('007')).toBe('7');
      expect(normalizeKey('000')).toBe('0');
      expect(normalizeKey('-0.0')).toBe('0');
      expect(normalizeKey('2.50')).toBe('2.5');
    });

    it('keeps ids beyond double precision distinct', () => {
      expect(normalizeKey('90071992547409931')).toBe('90071992547409931');
      expect(normalizeKey('90071992547409932.0')).toBe('90071992547409932');
    });

    it('keeps non-numeric keys as they are', () => {
      expect(normalizeKey('abc-1')).toBe('abc-1');
    });

    it('returns null for missing keys', () => {
      expect(normalizeKey(null)).toBeNull();
      expect(normalizeKey(undefined)).toBeNull();
      expect(normalizeKey('  ')).toBeNull();
    });
  });

  describe('leftJoin', () => {
    const left = parseCsv('id,name\n1,A\n2,B\n3,C');
    const right = parseCsv('id,parentId,label\n10,1,x\n11,1,y\n12,9,z');

    it('repeats left rows per match and keeps unmatched rows', () => {
      const joined = leftJoin(left, right, { leftOn: 'id', rightOn: 'parentId', suffix: '_r' });

      expect(joined.columns).toEqual(['id', 'name', 'id_r', 'parentId', 'label']);
      expect(joined.rows).toEqual([
        { id: '1', name: 'A', id_r: '10', parentId: '1', label: 'x' },
        { id: '1', name: 'A', id_r: '11', parentId: '1', label: 'y' },
        { id: '2', name: 'B', id_r: null, parentId: null, label: null },
        { id: '3', name: 'C', id_r: null, parentId: null, label: null },
      ]);
    });

    it('keeps a single key column when both sides share its name', () => {
      const other = parseCsv('id,label\n2,two');
      const joined = leftJoin(left, other, { leftOn: 'id', rightOn: 'id', suffix: '_r' });

      expect(joined.columns).toEqual(['id', 'name', 'label']);
      expect(joined.rows[1]).toEqual({ id: '2', name: 'B', label: 'two' });
    });

    it('does not match long ids that differ only past double precision', () => {
      const projects = parseCsv('id,name\n90071992547409931,A\n90071992547409932,B');
      const addresses = parseCsv('projectId,label\n90071992547409932,onlyB');
      const joined = leftJoin(projects, addresses, { leftOn: 'id', rightOn: 'projectId', suffix: '_r' });

      expect(joined.rows.map((row) => row.label)).toEqual([null, 'onlyB']);
    });

    it('never matches null keys', () => {
      const withNull = parseCsv('id,name\n,orphan');
      const nullRight = parseCsv('parentId,label\n,ghost');
      const joined = leftJoin(withNull, nullRight, { leftOn: 'id', rightOn: 'parentId', suffix: '_r' });

      expect(joined.rows).toEqual([{ id: null, name: 'orphan', label: null, parentId: null }]);
    });
  });

  describe('joinTables', () => {
    it('denormalizes the fixture tables', () => {
      const merged = joinTables(fixtureSources());

      expect(merged.columns).toEqual([
        'id',
        'projectName',
        'type',
        'price',
        'slug',
        'status',
        'furnishedType',
        'customBHK',
        'carpetArea',
        'lift',
        'id_address',
        'projectId',
        'fullAddress',
        'landmark',
        'id_config',
        'projectId_config',
        'id_variant',
        'configurationId',
        'bathrooms',
        'balcony',
      ]);
      expect(merged.rows.map((row) => [row.id, row.id_config, row.id_variant])).toEqual([
        ['1', '21', '31'],
        ['1', '22', null],
        ['2', '23', '32'],
        ['3', null, null],
      ]);
    });

    it('keeps every project row at least once', () => {
      const sources = fixtureSources();
      const merged = joinTables(sources);
      const projectIds = new Set(merged.rows.map((row) => row.id));

      expect(projectIds).toEqual(new Set(sources.project.rows.map((row) => row.id)));
      expect(merged.rows.length).toBeGreaterThanOrEqual(sources.project.rows.length);
    });

    it('skips a step whose foreign key column is missing', () => {
      const merged = joinTables({ ...fixtureSources(), variant: fixture('NoForeignKeyVariant.csv') });

      expect(merged.rows).toHaveLength(4);
      expect(merged.columns).not.toContain('bathrooms');
      expect(merged.columns).not.toContain('id_variant');
    });
  });
});
