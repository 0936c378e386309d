/**
 * Approvals API
 * Review queue for flagged knowledge units
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { decisionToJson, readJsonBody, unitToJson } from './utils.js';

const DecideRequestSchema = z.object({
  // Validated by the approval queue so unknown values surface as one error shape
  decision: z.unknown(),
  reviewer: z.string().min(1).optional()
});

export function createApprovalsRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // GET /api/approvals?domain=kubernetes
  router.get('/', async (c) => {
    const units = await service.listFlagged(c.req.query('domain'));
    return c.json({ units: units.map(unitToJson), total: units.length });
  });

  // GET /api/approvals/:unitId - unit with its decision history
  router.get('/:unitId', async (c) => {
    const { unit, decisions } = await service.getUnit(c.req.param('unitId'));
    return c.json({ unit: unitToJson(unit), decisions: decisions.map(decisionToJson) });
  });

  // POST /api/approvals/:unitId/decide
  router.post('/:unitId/decide', async (c) => {
    const body = await readJsonBody(c, DecideRequestSchema);
    const decision = await service.decide(c.req.param('unitId'), body.decision, body.reviewer);
    return c.json(decisionToJson(decision));
  });

  return router;
}
