import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { PACKAGE_VERSION } from '@propquery/shared';

const healthResponseSchema = z.object({
  status: z.enum(['ok', 'degraded', 'error']),
  timestamp: z.string().datetime(),
  version: z.string(),
  uptime: z.number().describe('Server uptime in seconds'),
  records: z.number().int().describe('Property records held in memory'),
});

export async function healthRoutes(app: FastifyInstance) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    '/health',
    {
      schema: {
        tags: ['health'],
        summary: 'Health check',
        description: 'Returns the health status of the API server and the size of the loaded dataset',
        response: {
          200: healthResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const records = app.dataset.records.length;
      return reply.send({
        status: records > 0 ? ('ok' as const) : ('degraded' as const),
        timestamp: new Date().toISOString(),
        version: PACKAGE_VERSION,
        uptime: process.uptime(),
        records,
      });
    }
  );
}
