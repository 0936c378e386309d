/**
 * API Router
 * Central router for all API endpoints
 */

import { Hono } from 'hono';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { createActivityRouter } from './activity.js';
import { createApprovalsRouter } from './approvals.js';
import { createClassifyRouter } from './classify.js';
import { createConsolidateRouter } from './consolidate.js';
import { createDigestRouter } from './digest.js';
import { createDomainsRouter } from './domains.js';
import { createHealthRouter } from './health.js';
import { createStatsRouter } from './stats.js';
import { handleError } from './utils.js';

export function createApiRouter(service: KnowledgeService): Hono {
  const apiRouter = new Hono();

  apiRouter.route('/classify', createClassifyRouter(service));
  apiRouter.route('/consolidate', createConsolidateRouter(service));
  apiRouter.route('/approvals', createApprovalsRouter(service));
  apiRouter.route('/digest', createDigestRouter(service));
  apiRouter.route('/activity', createActivityRouter(service));
  apiRouter.route('/domains', createDomainsRouter(service));
  apiRouter.route('/stats', createStatsRouter(service));
  apiRouter.route('/health', createHealthRouter(service));

  apiRouter.onError(handleError);
  return apiRouter;
}
