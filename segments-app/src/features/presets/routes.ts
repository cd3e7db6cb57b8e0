import type { FastifyInstance } from 'fastify';
import { buildPreset } from './presets.js';
import type { PresetParams } from './presets.js';

interface PresetRouteParams {
  name: string;
}

export async function registerPresetRoutes(
  app: FastifyInstance,
  strictOperators: boolean,
): Promise<void> {
  // GET /presets/:name: filters for a built-in segment recipe
  app.get<{ Params: PresetRouteParams; Querystring: PresetParams }>('/presets/:name', {
    schema: {
      params: {
        type: 'object',
        required: ['name'],
        properties: { name: { type: 'string' } },
      },
      querystring: {
        type: 'object',
        properties: {
          radius: { type: 'number' },
          lat: { type: 'number' },
          long: { type: 'number' },
        },
      },
    },
  }, async (request, reply) => {
    const builder = buildPreset(request.params.name, request.query, { strict: strictOperators });
    return reply.status(200).send({ filters: builder.toWireFormat() });
  });
}
