import Fastify, { type FastifyInstance, type FastifyError, type FastifyRequest, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { registerSwagger } from './plugins/swagger.js';
import datasetPlugin from './plugins/dataset.js';
import { healthRoutes } from './routes/health.js';
import { searchRoutes } from './routes/search.js';
import { config } from './config.js';
import type { Dataset } from './data/dataset.js';

export type AppOptions = {
  logger?: boolean;
  /** Use this dataset instead of loading the configured files */
  dataset?: Dataset;
};

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? config.isDev,
  });

  // Set up Zod type provider for automatic validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register CORS (permissive only in dev mode)
  await app.register(cors, {
    origin: config.isDev === true ? true : config.cors.origins,
    methods: ['GET', 'OPTIONS'],
  });

  // Register Swagger/OpenAPI
  await registerSwagger(app);

  // Load the dataset (must be before routes that search it)
  await app.register(datasetPlugin, {
    paths: config.data,
    dataset: options.dataset,
  });

  // Register routes
  await app.register(healthRoutes);
  await app.register(searchRoutes);

  // Add global error handler
  app.setErrorHandler((error: FastifyError, _request: FastifyRequest, reply: FastifyReply) => {
    app.log.error(error);

    // Handle Zod validation errors
    if (error.validation) {
      return reply.status(400).send({
        error: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle other errors
    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: error.name || 'INTERNAL_ERROR',
      message: config.isDev ? error.message : 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send({
      error: 'NOT_FOUND',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
}
