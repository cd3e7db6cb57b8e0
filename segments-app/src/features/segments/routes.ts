import type { FastifyInstance } from 'fastify';
import type { Clock } from '../../domain/clock.js';
import { SegmentNotFoundError } from '../../domain/errors.js';
import { isSegmentId } from '../../domain/ids.js';
import type { SegmentRepository } from '../../segments/repository.js';
import { createSegment } from './create-segment.js';
import { deleteSegment } from './delete-segment.js';
import { getSegment, renderFilters } from './get-segment.js';

interface SegmentParams {
  segmentId: string;
}

interface CreateSegmentBody {
  name: string;
  filters: unknown[];
}

const segmentParamsSchema = {
  type: 'object',
  required: ['segmentId'],
  properties: { segmentId: { type: 'string' } },
} as const;

function requireSegmentId(segmentId: string): string {
  // Non-UUID ids can never match a row
  if (!isSegmentId(segmentId)) {
    throw new SegmentNotFoundError(`Segment '${segmentId}' not found`);
  }
  return segmentId;
}

export async function registerSegmentRoutes(
  app: FastifyInstance,
  repo: SegmentRepository,
  clock: Clock,
  strictOperators: boolean,
): Promise<void> {
  // POST /segments: create a segment from a wire-format filter array
  app.post<{ Body: CreateSegmentBody }>('/segments', {
    schema: {
      body: {
        type: 'object',
        required: ['name', 'filters'],
        properties: {
          name: { type: 'string' },
          filters: { type: 'array' },
        },
      },
    },
  }, async (request, reply) => {
    const segment = await createSegment(repo, clock, request.body, { strictOperators });
    request.log.info({ segmentId: segment.segmentId, terms: segment.filters.length }, 'segment created');
    return reply.status(201).send(segment);
  });

  // GET /segments: list all segments
  app.get('/segments', async (_request, reply) => {
    const segments = await repo.list();
    return reply.status(200).send(segments);
  });

  // GET /segments/:segmentId
  app.get<{ Params: SegmentParams }>('/segments/:segmentId', {
    schema: { params: segmentParamsSchema },
  }, async (request, reply) => {
    const segment = await getSegment(repo, requireSegmentId(request.params.segmentId));
    return reply.status(200).send(segment);
  });

  // GET /segments/:segmentId/filters: the fragment for a notification request
  app.get<{ Params: SegmentParams }>('/segments/:segmentId/filters', {
    schema: { params: segmentParamsSchema },
  }, async (request, reply) => {
    const segment = await getSegment(repo, requireSegmentId(request.params.segmentId));
    return reply.status(200).send(renderFilters(segment));
  });

  // DELETE /segments/:segmentId
  app.delete<{ Params: SegmentParams }>('/segments/:segmentId', {
    schema: { params: segmentParamsSchema },
  }, async (request, reply) => {
    const segmentId = requireSegmentId(request.params.segmentId);
    await deleteSegment(repo, segmentId);
    request.log.info({ segmentId }, 'segment deleted');
    return reply.status(204).send();
  });
}
