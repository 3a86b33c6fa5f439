import type { Cell, Row, Table } from './csv.js';

export interface JoinOptions {
  /** Key column on the left table */
  leftOn: string;
  /** Key column on the right table */
  rightOn: string;
  /** Appended to right-hand columns whose name is already taken */
  suffix: string;
}

export interface SourceTables {
  project: Table;
  address: Table;
  configuration: Table;
  variant: Table;
}

// sign, integer digits, fraction digits
const NUMERIC_KEY = /^(-?)(\d+)(?:\.(\d+))?$/;

/**
 * Normalize a join key so "7", " 07" and "7.0" compare equal. Works on the
 * digits as text, so ids longer than a double can hold stay distinct.
 * Null keys never match anything.
 */
export function normalizeKey(value: Cell | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;

  const match = NUMERIC_KEY.exec(trimmed);
  if (!match) return trimmed;

  const [, sign, integer, fraction = ''] = match;
  const whole = integer.replace(/^0+(?=\d)/, '');
  const decimals = fraction.replace(/0+$/, '');
  const digits = decimals === '' ? whole : `${whole}.${decimals}`;
  return digits === '0' ? digits : `${sign}${digits}`;
}

/**
 * Left join: every left row appears at least once, in order. A left row with
 * several matches is repeated once per match; with none, every right-hand
 * column is null.
 */
export function leftJoin(left: Table, right: Table, options: JoinOptions): Table {
  const { leftOn, rightOn, suffix } = options;
  const taken = new Set(left.columns);

  // [source column, output column]
  const rightColumns: Array<[string, string]> = right.columns
    .filter((column) => !(column === rightOn && leftOn === rightOn))
    .map((column): [string, string] => [column, taken.has(column) ? `${column}${suffix}` : column]);

  const index = new Map<string, Row[]>();
  for (const row of right.rows) {
    const key = normalizeKey(row[rightOn]);
    if (key === null) continue;
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }

  const rows: Row[] = [];
  for (const row of left.rows) {
    const key = normalizeKey(row[leftOn]);
    const matches = key === null ? [] : index.get(key) ?? [];

    if (matches.length === 0) {
      const joined: Row = { ...row };
      for (const [, output] of rightColumns) joined[output] = null;
      rows.push(joined);
      continue;
    }

    for (const match of matches) {
      const joined: Row = { ...row };
      for (const [source, output] of rightColumns) joined[output] = match[source] ?? null;
      rows.push(joined);
    }
  }

  return {
    columns: [...left.columns, ...rightColumns.map(([, output]) => output)],
    rows,
  };
}

/**
 * Build the denormalized listing table:
 * project ⋈ address ⋈ configuration ⋈ variant.
 *
 * A step whose foreign-key column is missing from the joined-in table is
 * skipped and the table passes through unchanged.
 */
export function joinTables(sources: SourceTables): Table {
  let merged = sources.project;

  if (sources.address.columns.includes('projectId')) {
    merged = leftJoin(merged, sources.address, {
      leftOn: 'id',
      rightOn: 'projectId',
      suffix: '_address',
    });
  }

  if (sources.configuration.columns.includes('projectId')) {
    merged = leftJoin(merged, sources.configuration, {
      leftOn: 'id',
      rightOn: 'projectId',
      suffix: '_config',
    });
  }

  // The configuration id is renamed when the project id already holds "id"
  const configIdColumn = merged.columns.includes('id_config') ? 'id_config' : 'id';
  if (sources.variant.columns.includes('configurationId')) {
    merged = leftJoin(merged, sources.variant, {
      leftOn: configIdColumn,
      rightOn: 'configurationId',
      suffix: '_variant',
    });
  }

  return merged;
}
