/**
 * Activity API
 * Append-only log of what agents did in each domain
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { activityToJson, readJsonBody } from './utils.js';

const ActivityRequestSchema = z.object({
  domain_id: z.string(),
  task_id: z.string(),
  action_text: z.string(),
  result_text: z.string().default(''),
  created_at: z.string().datetime({ offset: true }).optional()
});

export function createActivityRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // POST /api/activity
  router.post('/', async (c) => {
    const body = await readJsonBody(c, ActivityRequestSchema);
    const entry = await service.logActivity({
      domainId: body.domain_id,
      taskId: body.task_id,
      actionText: body.action_text,
      resultText: body.result_text,
      createdAt: body.created_at
    });
    return c.json(activityToJson(entry), 201);
  });

  return router;
}
