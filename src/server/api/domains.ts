/**
 * Domains API
 */

import { Hono } from 'hono';

import type { KnowledgeService } from '../../services/knowledge-service.js';

export function createDomainsRouter(service: KnowledgeService): Hono {
  const router = new Hono();

  // GET /api/domains - registry in tie-break order
  router.get('/', (c) => {
    return c.json({
      domains: service.listDomains().map((d) => ({
        id: d.id,
        name: d.name,
        description: d.description,
        priority: d.priority
      }))
    });
  });

  return router;
}
