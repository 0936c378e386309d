/**
 * Stats API
 * Endpoints for storage statistics
 */

import { Hono } from 'hono';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { runToJson } from './utils.js';

export function createStatsRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // GET /api/stats - Get overall statistics
  router.get('/', async (c) => {
    const stats = await service.stats();

    return c.json({
      activity_today: stats.activityToday,
      units_by_domain: stats.unitsByDomain,
      pending_approvals: stats.pendingApprovals,
      last_run: stats.lastRun ? runToJson(stats.lastRun) : null
    });
  });

  return router;
}
