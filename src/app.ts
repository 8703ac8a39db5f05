import Fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import { config } from './config';
import { registerRoutes, RouteDependencies } from './routes';
import { logger } from './utils/logger';

// Store request start time for duration calculation
declare module 'fastify' {
  interface FastifyRequest {
    startTime?: number;
  }
}

/**
 * Build the Fastify application without listening.
 * Dependencies are passed in so tests can use an in-process database.
 */
export async function buildServer(deps: RouteDependencies): Promise<FastifyInstance> {
  const fastify: FastifyInstance = Fastify({
    logger: false, // Use custom Winston logger instead
    requestTimeout: config.REQUEST_TIMEOUT_MS,
    connectionTimeout: config.CONNECTION_TIMEOUT_MS,
    bodyLimit: config.BODY_LIMIT_BYTES,
    trustProxy: true,
  });

  // Request logging hook - log incoming requests
  fastify.addHook('onRequest', async request => {
    request.startTime = Date.now();
    logger.info('HTTP', `--> ${request.method} ${request.url}`, {
      method: request.method,
      url: request.url,
      userAgent: request.headers['user-agent'],
      ip: request.ip,
    });
  });

  // Response logging hook - log outgoing responses
  fastify.addHook('onResponse', async (request, reply) => {
    const duration = request.startTime ? Date.now() - request.startTime : 0;
    const metadata = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs: duration,
    };

    if (reply.statusCode >= 400) {
      logger.warn('HTTP', `<-- ${request.method} ${request.url} ${reply.statusCode} ${duration}ms`, metadata);
    } else {
      logger.info('HTTP', `<-- ${request.method} ${request.url} ${reply.statusCode} ${duration}ms`, metadata);
    }
  });

  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
      },
    },
  });

  // CORS (configure based on requirements)
  await fastify.register(cors, {
    origin: false,
  });

  // Form body parser
  await fastify.register(formbody);

  await registerRoutes(fastify, deps);

  return fastify;
}
