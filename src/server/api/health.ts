/**
 * Health API
 * Operational health including the outcome of the last consolidation run
 */

import { Hono } from 'hono';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { runToJson } from './utils.js';

export function createHealthRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // GET /api/health
  router.get('/', async (c) => {
    const stats = await service.stats();
    const lastRun = stats.lastRun;
    const status = lastRun && lastRun.status === 'failed' ? 'needs-attention' : 'ok';

    return c.json({
      status,
      timestamp: new Date().toISOString(),
      pending_approvals: stats.pendingApprovals,
      last_run: lastRun ? runToJson(lastRun) : null
    });
  });

  return router;
}
