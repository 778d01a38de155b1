import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { createLogger } from '../core/logger.js';
import { registerRatioRoutes } from './routes/ratios.js';
import { registerFinancialRoutes } from './routes/financial.js';
import { registerMetaRoutes } from './routes/meta.js';
import type { Container } from '../core/container.js';

/** What the routes need from the container */
export type WebDeps = Pick<Container, 'config' | 'store' | 'acquisition' | 'scheduler'>;

const log = createLogger('web');

/**
 * Build the Fastify instance with every API route registered.
 * Does not listen; tests drive it through inject().
 */
export function buildServer(deps: WebDeps): FastifyInstance {
  const server = Fastify({ logger: false });

  registerRatioRoutes(server, deps);
  registerFinancialRoutes(server, deps);
  registerMetaRoutes(server, deps);

  // Global error handler
  server.setErrorHandler((error: FastifyError, request, reply) => {
    // Malformed JSON bodies and other client errors raised by Fastify itself
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: { type: 'validation', message: error.message } });
    }
    log.error('Unhandled request error', { method: request.method, url: request.url, error: error.message });
    return reply.status(500).send({ error: { type: 'internal', message: 'Internal server error' } });
  });

  return server;
}
