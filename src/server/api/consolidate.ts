/**
 * Consolidation API
 * Trigger a run on demand; the scheduler covers the nightly cadence
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { readJsonBody, summaryToJson } from './utils.js';

const ConsolidateRequestSchema = z.object({
  since: z.string().datetime({ offset: true }).optional(),
  until: z.string().datetime({ offset: true }).optional()
});

export function createConsolidateRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // POST /api/consolidate - body { since?, until? } as ISO-8601
  router.post('/', async (c) => {
    const body = await readJsonBody(c, ConsolidateRequestSchema);
    const summary = await service.consolidate({
      since: body.since !== undefined ? new Date(body.since) : undefined,
      until: body.until !== undefined ? new Date(body.until) : undefined
    });

    return c.json(summaryToJson(summary));
  });

  return router;
}
