/**
 * Classify API
 * Score a task against every registered domain and route it
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { readJsonBody } from './utils.js';

const ClassifyRequestSchema = z.object({
  task_id: z.string().min(1),
  text: z.string(),
  context: z.record(z.unknown()).optional()
});

export function createClassifyRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // POST /api/classify
  router.post('/', async (c) => {
    const body = await readJsonBody(c, ClassifyRequestSchema);
    const outcome = service.classify({ id: body.task_id, text: body.text, context: body.context });

    return c.json({
      task_id: outcome.taskId,
      scores: outcome.scores.map((s) => ({
        domain_id: s.domainId,
        normalized_score: s.normalizedScore,
        raw_score: s.rawScore
      })),
      recommended_domain: outcome.recommendedDomainId,
      confidence: outcome.confidence,
      disposition: {
        domain_id: outcome.disposition.domainId,
        action: outcome.disposition.action
      }
    });
  });

  return router;
}
