import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { deleteStatements, getStatements } from '../../core/ratio-engine.js';
import {
  errorToHttpStatus,
  serializeBatchResult,
  serializeCompany,
  serializeCrawlOutcome,
  serializeStatementsView,
  validationError,
} from '../serialization.js';
import type { WebDeps } from '../app.js';

const yearField = z.coerce.string().trim().regex(/^\d{4}$/, 'must be a 4-digit year');

const crawlBodySchema = z.object({
  company_name: z.string().trim().min(1, 'company_name is required'),
  year: yearField.optional(),
});

const crawlNowBodySchema = z
  .object({
    year: yearField.optional(),
    companies: z.array(z.string().trim().min(1)).min(1).optional(),
  })
  .default({});

const statementsQuerySchema = z.object({
  company: z.string().trim().min(1, 'company is required'),
  year: yearField.optional(),
});

const deleteQuerySchema = z.object({
  company: z.string().trim().min(1, 'company is required'),
  year: yearField,
});

const keyItemsQuerySchema = z.object({
  year: yearField.optional(),
});

export function registerFinancialRoutes(server: FastifyInstance, deps: WebDeps) {
  server.post('/api/financial', async (request, reply) => {
    const body = crawlBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.status(400).send(validationError(body.error));
    }

    const result = await deps.acquisition.crawlCompany(body.data.company_name, body.data.year);
    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({
        error: {
          type: result.error.type,
          message: result.error.message,
          suggestions: result.error.suggestions?.map(serializeCompany),
        },
      });
    }

    return reply.send(serializeCrawlOutcome(result.result));
  });

  server.post('/api/financial/crawl-now', async (request, reply) => {
    const body = crawlNowBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send(validationError(body.error));
    }

    const { year, companies } = body.data;

    // The scheduled universe goes through the scheduler so it never overlaps a timed run
    if (year === undefined && companies === undefined) {
      const result = await deps.scheduler.runNow();
      if (!result) {
        return reply.status(409).send({
          error: { type: 'batch_in_progress', message: 'A batch crawl is already running' },
        });
      }
      return reply.send(serializeBatchResult(result));
    }

    const result = await deps.acquisition.crawlAll(companies ?? deps.config.batch.companies, year);
    return reply.send(serializeBatchResult(result));
  });

  server.get('/api/financial/statements', async (request, reply) => {
    const query = statementsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error));
    }

    const result = getStatements(deps.store, query.data.company, query.data.year);
    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send(serializeStatementsView(result.result));
  });

  server.get('/api/financial/key-items', async (request, reply) => {
    const query = keyItemsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error));
    }

    const items = deps.store.getKeyFinancialItems(query.data.year);
    return reply.send({
      items: items.map(i => ({
        corp_code: i.corpCode,
        corp_name: i.corpName,
        fiscal_year: i.fiscalYear,
        account_name: i.accountName,
        current_amount: i.currentAmount,
      })),
    });
  });

  server.delete('/api/financial', async (request, reply) => {
    const query = deleteQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error));
    }

    const result = deleteStatements(deps.store, query.data.company, query.data.year);
    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send({
      company: serializeCompany(result.result.company),
      fiscal_year: result.result.fiscalYear,
      deleted: result.result.deleted,
    });
  });
}
