import type { FastifyInstance } from 'fastify';
import { ValidationError } from 'push-segment-filters';
import {
  PresetNotFoundError,
  SegmentNotFoundError,
  SegmentStoreError,
} from '../../domain/errors.js';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Rejected filter expression → 422 with the library's error code
    if (error instanceof ValidationError) {
      return reply.status(422).send({
        error: error.name,
        code: error.code,
        message: error.message,
        ...(error.index !== undefined ? { index: error.index } : {}),
      });
    }

    // Resource not found → 404
    if (error instanceof SegmentNotFoundError || error instanceof PresetNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    // Infrastructure errors → 500
    if (error instanceof SegmentStoreError) {
      request.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors (schema validation, bad JSON) carry a numeric statusCode
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    // Domain errors: named Error subclass (not a plain Error)
    if (error.constructor !== Error) {
      return reply.status(422).send({ error: error.name, message: error.message });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
