/**
 * Digest API
 */

import { Hono } from 'hono';

import type { KnowledgeService } from '../../services/knowledge-service.js';
import { digestToJson } from './utils.js';

export function createDigestRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // GET /api/digest?date=YYYY-MM-DD (UTC, defaults to today)
  router.get('/', async (c) => {
    const digest = await service.digest(c.req.query('date'));
    return c.json(digestToJson(digest));
  });

  return router;
}
