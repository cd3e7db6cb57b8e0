import type { FastifyInstance } from 'fastify';
import { FilterBuilder } from 'push-segment-filters';

interface ValidateFiltersBody {
  filters: unknown[];
}

export async function registerFilterRoutes(
  app: FastifyInstance,
  strictOperators: boolean,
): Promise<void> {
  // POST /filters/validate: check a filter array without storing it
  app.post<{ Body: ValidateFiltersBody }>('/filters/validate', {
    schema: {
      body: {
        type: 'object',
        required: ['filters'],
        properties: { filters: { type: 'array' } },
      },
    },
  }, async (request, reply) => {
    const builder = FilterBuilder.fromWireFormat(request.body.filters, { strict: strictOperators });
    return reply.status(200).send({ valid: true, filters: builder.toWireFormat() });
  });
}
