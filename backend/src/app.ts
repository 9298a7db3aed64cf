import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { registerAssetGraphModule } from './modules/asset-graph/index.js';
import {
  createGraphContext,
  fromFastifyLogger,
  type GraphContext,
} from './modules/asset-graph/context/graph.context.js';

export interface BuildAppOptions {
  /** Pre-built context (tests); otherwise one is created from env */
  context?: GraphContext;
  logger?: boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        details: err.details,
      });
    }

    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  const context = options.context ?? createGraphContext({ logger: fromFastifyLogger(app.log) });

  app.get('/api/health', async () => ({
    ok: true,
    service: 'asset-graph',
    revision: context.graph.revision,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerAssetGraphModule(fastify, context);
  });

  return app;
}
