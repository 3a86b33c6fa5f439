/**
 * Dataset loading
 * Reads the four source files once, joins them and keeps the result in memory
 * for the lifetime of the process.
 */

import { readFileSync } from 'node:fs';
import type { FastifyBaseLogger } from 'fastify';
import type { PropertyRecord } from '@propquery/shared';
import type { DataPaths } from '../config.js';
import { parseCsv, type Table } from './csv.js';
import { joinTables } from './join.js';
import { toPropertyRecord } from './records.js';

export interface Dataset {
  readonly records: readonly PropertyRecord[];
  /** Columns present in the joined table */
  readonly columns: ReadonlySet<string>;
  readonly loadedAt: Date;
}

/**
 * Raised when a source file cannot be read. Fatal at startup.
 */
export class DatasetLoadError extends Error {
  public readonly code = 'DATASET_LOAD_FAILED';
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetLoadError';
    this.path = path;
  }
}

export function readCsvFile(path: string): Table {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DatasetLoadError(`Failed to read data file ${path}: ${reason}`, path, { cause: err });
  }
  return parseCsv(text);
}

export function createDataset(table: Table): Dataset {
  return Object.freeze({
    records: Object.freeze(table.rows.map(toPropertyRecord)),
    columns: new Set(table.columns),
    loadedAt: new Date(),
  });
}

export function loadDataset(paths: DataPaths, logger?: FastifyBaseLogger): Dataset {
  const sources = {
    project: readCsvFile(paths.project),
    address: readCsvFile(paths.address),
    configuration: readCsvFile(paths.configuration),
    variant: readCsvFile(paths.variant),
  };

  logger?.debug(
    {
      project: sources.project.rows.length,
      address: sources.address.rows.length,
      configuration: sources.configuration.rows.length,
      variant: sources.variant.rows.length,
    },
    'Read data files'
  );

  const dataset = createDataset(joinTables(sources));
  logger?.info(`Loaded ${dataset.records.length} property records`);
  return dataset;
}

const cache = new Map<string, Dataset>();

/**
 * Load once per set of paths and reuse. A failed load throws and is not cached.
 */
export function getDataset(paths: DataPaths, logger?: FastifyBaseLogger): Dataset {
  const key = [paths.project, paths.address, paths.configuration, paths.variant].join('|');
  const cached = cache.get(key);
  if (cached) return cached;

  const dataset = loadDataset(paths, logger);
  cache.set(key, dataset);
  return dataset;
}
