import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';
import { registerRoutes } from './api/routes.js';
import { AppError } from './common/errors.js';
import type { AppContext } from './context.js';

/**
 * Build Fastify Application
 */
export function buildApp(context: AppContext): FastifyInstance {
  const { env } = context;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    genReqId: () => uuidv4(),
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(',').map((o) => o.trim()),
  });

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  // Global error handler
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        request.log.error({ err }, err.message);
      } else {
        request.log.warn({ code: err.code, ...err.details }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...err.details,
      });
    }

    // Fastify's own request errors (malformed JSON, unsupported media type, ...)
    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      request.log.warn({ err }, err.message);
      return reply.status(statusCode).send({
        ok: false,
        error: 'BAD_REQUEST',
        message: err.message,
      });
    }

    // Unknown errors
    request.log.error({ err }, 'Unhandled error');
    const exposeMessage = env.NODE_ENV !== 'production' || env.DEBUG;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: exposeMessage ? err.message : 'Internal server error',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  app.register(registerRoutes, { context });

  return app;
}
