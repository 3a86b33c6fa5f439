import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { createSearchQuerySchema, parseQuerySchema, type SearchFilters } from '@propquery/shared';
import { config } from '../config.js';
import { parseQuery } from '../services/query-parser.js';
import { searchProperties } from '../services/search.js';
import { describeFilters, generateSummary } from '../services/summary.js';
import { renderPropertyCard } from '../services/property-card.js';

// Schema definitions
const searchQuerySchema = createSearchQuerySchema(config.search.maxLimit);

const filtersSchema = z.object({
  bedroomCount: z.number().int().optional(),
  maxBudget: z.number().optional().describe('Upper price bound in rupees'),
  city: z.string().optional(),
  cityKeywords: z.array(z.string()).optional(),
  status: z.enum(['ready', 'under_construction']).optional(),
  propertyType: z.enum(['apartment', 'villa', 'plot']).optional(),
  furnishing: z.enum(['FURNISHED', 'SEMI-FURNISHED', 'UNFURNISHED']).optional(),
});

const propertyCardSchema = z.object({
  title: z.string(),
  location: z.string(),
  city: z.string(),
  locality: z.string(),
  bhk: z.string(),
  price: z.string(),
  carpetArea: z.string(),
  status: z.string(),
  furnishing: z.string(),
  amenities: z.array(z.string()),
  url: z.string(),
  slug: z.string(),
});

const searchResponseSchema = z.object({
  query: z.string(),
  filters: filtersSchema,
  summary: z.string(),
  count: z.number().int(),
  results: z.array(propertyCardSchema),
});

const parseResponseSchema = z.object({
  query: z.string(),
  filters: filtersSchema,
  description: z.array(z.string()),
});

type FiltersPayload = z.infer<typeof filtersSchema>;

function toFiltersPayload(filters: SearchFilters): FiltersPayload {
  const { cityKeywords, ...rest } = filters;
  return cityKeywords ? { ...rest, cityKeywords: [...cityKeywords] } : rest;
}

export async function searchRoutes(app: FastifyInstance) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  // GET /search - Parse a query, filter and rank the dataset
  typedApp.get(
    '/search',
    {
      schema: {
        tags: ['search'],
        summary: 'Search properties',
        description: 'Extract filters from a natural-language query and return ranked, de-duplicated listings with a summary',
        querystring: searchQuerySchema,
        response: {
          200: searchResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { q, limit } = request.query;
      const { records, filters } = searchProperties(app.dataset, q, limit);

      request.log.debug({ filters, count: records.length }, 'Search completed');

      return reply.send({
        query: q,
        filters: toFiltersPayload(filters),
        summary: generateSummary(records, filters),
        count: records.length,
        results: records.map(renderPropertyCard),
      });
    }
  );

  // GET /search/parse - Explain a query without searching
  typedApp.get(
    '/search/parse',
    {
      schema: {
        tags: ['search'],
        summary: 'Parse a query',
        description: 'Return the filters extracted from a natural-language query without running the search',
        querystring: parseQuerySchema,
        response: {
          200: parseResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { q } = request.query;
      const filters = parseQuery(q);

      return reply.send({
        query: q,
        filters: toFiltersPayload(filters),
        description: describeFilters(filters),
      });
    }
  );
}
