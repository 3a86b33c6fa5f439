import { resolve } from 'node:path';
import dotenv from 'dotenv';
import { DEFAULT_MAX_SEARCH_LIMIT, DEFAULT_SEARCH_LIMIT } from '@propquery/shared';

dotenv.config();

const isDev = process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test' || !process.env.NODE_ENV;

export interface DataPaths {
  project: string;
  address: string;
  configuration: string;
  variant: string;
}

export const DATA_FILE_NAMES = {
  project: 'project.csv',
  address: 'ProjectAddress.csv',
  configuration: 'ProjectConfiguration.csv',
  variant: 'ProjectConfigurationVariant.csv',
} as const satisfies DataPaths;

/**
 * Resolve the four source files. DATA_DIR sets the directory; each file can
 * also be pointed elsewhere on its own. Exported so unit tests can exercise
 * the lookup without touching process.env.
 */
export function resolveDataPaths(env: Record<string, string | undefined>, defaultDir: string): DataPaths {
  const dir = resolve(env.DATA_DIR || defaultDir);
  return {
    project: resolve(dir, env.PROJECT_CSV || DATA_FILE_NAMES.project),
    address: resolve(dir, env.ADDRESS_CSV || DATA_FILE_NAMES.address),
    configuration: resolve(dir, env.CONFIGURATION_CSV || DATA_FILE_NAMES.configuration),
    variant: resolve(dir, env.VARIANT_CSV || DATA_FILE_NAMES.variant),
  };
}

/**
 * Split a comma-separated origin list, dropping blanks.
 */
export function parseOrigins(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3200', 10),
    host: process.env.HOST || '0.0.0.0',
  },
  data: resolveDataPaths(process.env, resolve(__dirname, '../../../data')),
  search: {
    defaultLimit: DEFAULT_SEARCH_LIMIT,
    maxLimit: parseInt(process.env.SEARCH_MAX_LIMIT || String(DEFAULT_MAX_SEARCH_LIMIT), 10),
  },
  cors: {
    origins: parseOrigins(process.env.CORS_ORIGINS),
  },
  env: process.env.NODE_ENV || 'development',
  isDev,
} as const;

