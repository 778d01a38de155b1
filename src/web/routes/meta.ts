import type { FastifyInstance } from 'fastify';
import { ACCOUNT_DEFINITIONS } from '../../processing/account-definitions.js';
import type { WebDeps } from '../app.js';

export function registerMetaRoutes(server: FastifyInstance, deps: WebDeps) {
  server.get('/api/accounts', async () => {
    return {
      accounts: ACCOUNT_DEFINITIONS.map(a => ({
        field: a.field,
        account_name: a.accountName,
        display_name: a.display_name,
        statement_type: a.statement_type,
      })),
    };
  });

  server.get('/api/health', async () => {
    return {
      status: 'ok',
      dart_api_key_configured: deps.config.dart.apiKey !== null,
      scheduler: {
        enabled: deps.scheduler.isRunning(),
        batch_in_progress: deps.scheduler.isBatchInProgress(),
        next_run: deps.scheduler.nextRunAt()?.toISOString() ?? null,
      },
    };
  });

  server.get('/api/db-stats', async () => {
    const stats = deps.store.getStats();
    return {
      companies: stats.companies,
      line_items: stats.lineItems,
      fiscal_years: stats.fiscalYears,
      directory_entries: stats.directoryEntries,
      directory_refreshed_at: stats.directoryRefreshedAt,
    };
  });
}
