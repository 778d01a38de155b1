import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { executeRatioCore } from '../../core/ratio-engine.js';
import { RATIO_DEFINITIONS, GROWTH_DEFINITIONS } from '../../processing/ratio-definitions.js';
import { errorToHttpStatus, validationError } from '../serialization.js';
import type { WebDeps } from '../app.js';

const ratioQuerySchema = z.object({
  company: z.string().trim().min(1, 'company is required'),
});

export function registerRatioRoutes(server: FastifyInstance, deps: WebDeps) {
  server.get('/api/ratios', async (request, reply) => {
    const query = ratioQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error));
    }

    const result = executeRatioCore(deps.store, query.data.company);
    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send(result.result);
  });

  server.get('/api/ratio-definitions', async () => {
    return {
      ratios: RATIO_DEFINITIONS.map(r => ({
        id: r.id,
        display_name: r.display_name,
        korean_name: r.korean_name,
        description: r.description,
        numerator: r.numerator,
        denominator: r.denominator,
        group: r.group,
      })),
      growth: GROWTH_DEFINITIONS.map(g => ({
        id: g.id,
        display_name: g.display_name,
        korean_name: g.korean_name,
        field: g.field,
      })),
    };
  });
}
