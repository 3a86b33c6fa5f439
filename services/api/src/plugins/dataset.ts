/**
 * Dataset plugin for Fastify
 * Loads the listing dataset before any route is served and exposes it read-only
 */

import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { DataPaths } from '../config.js';
import { getDataset, type Dataset } from '../data/dataset.js';

// Extend FastifyInstance with the loaded dataset
declare module 'fastify' {
  interface FastifyInstance {
    dataset: Dataset;
  }
}

export interface DatasetPluginOptions {
  paths: DataPaths;
  /** Preloaded dataset, used instead of reading `paths` (tests, scripts) */
  dataset?: Dataset;
}

async function datasetPlugin(fastify: FastifyInstance, options: DatasetPluginOptions) {
  // Throws DatasetLoadError on a missing file, which aborts startup
  const dataset = options.dataset ?? getDataset(options.paths, fastify.log);
  fastify.decorate('dataset', dataset);
}

export default fp(datasetPlugin, {
  name: 'dataset',
});
