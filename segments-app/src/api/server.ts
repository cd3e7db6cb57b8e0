import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import type { Clock } from '../domain/clock.js';
import type { SegmentRepository } from '../segments/repository.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerSegmentRoutes } from '../features/segments/routes.js';
import { registerPresetRoutes } from '../features/presets/routes.js';
import { registerFilterRoutes } from '../features/filters/routes.js';

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
  strictOperators?: boolean;
}

export function buildServer(repo: SegmentRepository, clock: Clock, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });
  const strictOperators = options.strictOperators ?? false;

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerSegmentRoutes(instance, repo, clock, strictOperators);
    await registerFilterRoutes(instance, strictOperators);
    await registerPresetRoutes(instance, strictOperators);
  }, { prefix });

  return app;
}
