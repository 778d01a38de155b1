#!/usr/bin/env node

/**
 * Web API server for dart-fin-ratios.
 *
 * Usage:
 *   npm run web                          # Start on default port 3005
 *   PORT=8080 npm run web                # Custom port
 *   BATCH_ENABLED=true npm run web       # Also run the daily batch crawl
 */

import { createContainer, type Container } from '../core/container.js';
import { createLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { buildServer } from './app.js';

const log = createLogger('server');

function boot(): Container {
  try {
    return createContainer();
  } catch (err) {
    log.error(errorMessage(err));
    process.exit(1);
  }
}

const container = boot();

const { config, scheduler } = container;
const server = buildServer(container);

if (config.batch.enabled) {
  scheduler.start();
}

const shutdown = async (signal: string) => {
  log.info('Shutting down', { signal });
  await server.close();
  container.close();
  process.exit(0);
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

await server.listen({ port: config.server.port, host: config.server.host });

log.info('dart-fin-ratios API listening', {
  url: `http://localhost:${config.server.port}`,
  db: config.dbPath,
  batch: config.batch.enabled ? 'enabled' : 'disabled',
});
