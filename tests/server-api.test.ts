import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';

import { createApp } from '../src/server/index.js';
import { TransientStoreError } from '../src/core/errors.js';
import { createHarness, type TestHarness } from './helpers.js';

describe('HTTP API', () => {
  let h: TestHarness;
  let app: Hono;

  function post(path: string, body: unknown): Promise<Response> {
    return Promise.resolve(app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body)
    }));
  }

  function get(path: string): Promise<Response> {
    return Promise.resolve(app.request(path));
  }

  async function seedUnit(): Promise<string> {
    await post('/api/activity', {
      domain_id: 'kubernetes',
      task_id: 'task-1',
      action_text: 'scale deployment',
      result_text: 'ok',
      created_at: '2026-03-10T00:30:00.000Z'
    });
    await post('/api/consolidate', {});
    const unit = await h.store.findActiveUnit('kubernetes', 'task-1');
    if (!unit) throw new Error('unit missing');
    return unit.id;
  }

  beforeEach(async () => {
    h = await createHarness('2026-03-10T02:00:00.000Z');
    app = createApp(h.service, { logRequests: false });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await h.service.shutdown();
  });

  it('answers health checks', async () => {
    const res = await get('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  describe('POST /api/classify', () => {
    it('returns scores and a disposition', async () => {
      const res = await post('/api/classify', { task_id: 't-1', text: 'helm rollback failed, retry helm' });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        task_id: 't-1',
        recommended_domain: 'kubernetes',
        confidence: 1,
        disposition: { domain_id: 'kubernetes', action: 'auto_assign' },
        scores: [{ domain_id: 'kubernetes', normalized_score: 100, raw_score: 6 }]
      });
    });

    it('rejects a body without task_id', async () => {
      const res = await post('/api/classify', { text: 'helm' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION', retryable: false } });
    });

    it('rejects malformed JSON', async () => {
      const res = await post('/api/classify', '{"task_id":');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'VALIDATION', message: 'Request body is not valid JSON', retryable: false }
      });
    });
  });

  describe('POST /api/activity', () => {
    it('appends an entry', async () => {
      const res = await post('/api/activity', {
        domain_id: 'ml',
        task_id: 'train-1',
        action_text: 'train model',
        result_text: 'auc 0.91'
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        domain_id: 'ml',
        task_id: 'train-1',
        created_at: '2026-03-10T02:00:00.000Z'
      });
    });

    it('rejects unknown domains', async () => {
      const res = await post('/api/activity', { domain_id: 'finance', task_id: 't', action_text: 'a' });
      expect(res.status).toBe(400);
    });
  });

  describe('POST /api/consolidate', () => {
    it('returns the run summary', async () => {
      await post('/api/activity', {
        domain_id: 'kubernetes', task_id: 'task-1', action_text: 'scale deployment', result_text: 'ok',
        created_at: '2026-03-09T10:00:00.000Z'
      });

      const res = await post('/api/consolidate', {
        since: '2026-03-09T00:00:00.000Z',
        until: '2026-03-10T00:00:00.000Z'
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        since: '2026-03-09T00:00:00.000Z',
        until: '2026-03-10T00:00:00.000Z',
        entries_processed: 1,
        units_created: 1,
        units_updated: 0,
        units_unchanged: 0,
        domains_touched: ['kubernetes'],
        reinforced_signals: []
      });
    });

    it('rejects an inverted window', async () => {
      const res = await post('/api/consolidate', {
        since: '2026-03-10T00:00:00.000Z',
        until: '2026-03-09T00:00:00.000Z'
      });
      expect(res.status).toBe(400);
    });

    it('rejects timestamps that are not ISO-8601', async () => {
      const res = await post('/api/consolidate', { since: 'yesterday' });
      expect(res.status).toBe(400);
    });

    it('reports a busy job as a retryable conflict', async () => {
      await h.store.tryAcquireLock('nightly-consolidation', 'other-run', h.clock.now(), 60_000);

      const res = await post('/api/consolidate', {});

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: { code: 'BUSY', message: 'Job "nightly-consolidation" is already running', retryable: true }
      });
    });
  });

  describe('approvals', () => {
    it('lists flagged units by domain', async () => {
      const unitId = await seedUnit();

      const res = await get('/api/approvals?domain=kubernetes');
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        total: 1,
        units: [{ id: unitId, domain_id: 'kubernetes', task_id: 'task-1', version: 1, flagged: true }]
      });

      const other = await get('/api/approvals?domain=security');
      expect(await other.json()).toEqual({ units: [], total: 0 });
    });

    it('rejects an unknown domain filter', async () => {
      const res = await get('/api/approvals?domain=finance');
      expect(res.status).toBe(400);
    });

    it('records a decision once', async () => {
      const unitId = await seedUnit();

      const res = await post(`/api/approvals/${unitId}/decide`, { decision: 'approved', reviewer: 'alice' });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        unit_id: unitId,
        unit_version: 1,
        decision: 'approved',
        reviewer: 'alice',
        decided_at: '2026-03-10T02:00:00.000Z'
      });

      const again = await post(`/api/approvals/${unitId}/decide`, { decision: 'rejected' });
      expect(again.status).toBe(409);
      expect(await again.json()).toMatchObject({ error: { code: 'CONFLICT', retryable: false } });
    });

    it('shows a unit with its history', async () => {
      const unitId = await seedUnit();
      await post(`/api/approvals/${unitId}/decide`, { decision: 'rejected' });

      const res = await get(`/api/approvals/${unitId}`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        unit: { id: unitId, flagged: false, archived: true },
        decisions: [{ decision: 'rejected', reviewer: null }]
      });
    });

    it('rejects invalid decisions', async () => {
      const unitId = await seedUnit();
      const res = await post(`/api/approvals/${unitId}/decide`, { decision: 'maybe' });
      expect(res.status).toBe(400);
    });

    it('returns 404 for unknown units', async () => {
      const res = await post('/api/approvals/00000000-0000-4000-8000-000000000000/decide', { decision: 'approved' });
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { code: 'NOT_FOUND' } });
    });
  });

  describe('GET /api/digest', () => {
    it('returns the digest for a date', async () => {
      await seedUnit();

      const res = await get('/api/digest?date=2026-03-10');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        date: '2026-03-10',
        domains_touched: ['kubernetes'],
        units_created: 1,
        units_flagged_pending: 1,
        approved_today: 0,
        rejected_today: 0
      });
    });

    it('rejects a malformed date', async () => {
      const res = await get('/api/digest?date=March');
      expect(res.status).toBe(400);
    });
  });

  it('lists domains in registration order', async () => {
    const res = await get('/api/domains');
    expect(await res.json()).toMatchObject({
      domains: [
        { id: 'kubernetes', priority: 0 },
        { id: 'infrastructure', priority: 1 },
        { id: 'security', priority: 2 },
        { id: 'ml', priority: 3 },
        { id: 'general', priority: 4 }
      ]
    });
  });

  it('reports stats and health', async () => {
    await seedUnit();

    const stats = await get('/api/stats');
    expect(await stats.json()).toMatchObject({
      activity_today: { kubernetes: 1 },
      units_by_domain: { kubernetes: 1 },
      pending_approvals: 1,
      last_run: { status: 'succeeded', job_name: 'nightly-consolidation' }
    });

    const health = await get('/api/health');
    expect(await health.json()).toMatchObject({ status: 'ok', pending_approvals: 1 });
  });

  it('serves the same endpoints without the /api prefix', async () => {
    const res = await post('/classify', { task_id: 't-1', text: 'helm rollback failed, retry helm' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      task_id: 't-1',
      recommended_domain: 'kubernetes',
      disposition: { domain_id: 'kubernetes', action: 'auto_assign' }
    });

    const digest = await get('/digest?date=March');
    expect(digest.status).toBe(400);
  });

  it('maps storage outages to a retryable 503', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(h.service, 'stats').mockRejectedValue(new TransientStoreError('count failed: database is locked'));

    const res = await get('/api/stats');

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: { code: 'TRANSIENT_STORE', message: 'count failed: database is locked', retryable: true }
    });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const res = await get('/api/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: { code: 'NOT_FOUND' } });
  });
});
