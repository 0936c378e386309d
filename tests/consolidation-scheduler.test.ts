import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { ConsolidationScheduler } from '../src/core/consolidation-scheduler.js';
import type { ConsolidationSummary } from '../src/core/types.js';
import { createHarness, type TestHarness } from './helpers.js';

describe('ConsolidationScheduler', () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = await createHarness('2026-03-10T02:00:00.000Z');
    await h.service.logActivity({
      domainId: 'kubernetes',
      taskId: 'task-1',
      actionText: 'cordon node',
      resultText: 'done',
      createdAt: '2026-03-10T00:30:00.000Z'
    });
  });

  afterEach(async () => {
    await h.service.shutdown();
  });

  it('runs once over the default window', async () => {
    const onRun = vi.fn();
    const scheduler = new ConsolidationScheduler(h.service.consolidationJob, { intervalMs: 60_000, onRun });

    const summary = await scheduler.runOnce();

    expect(summary?.unitsCreated).toBe(1);
    expect(onRun).toHaveBeenCalledTimes(1);
  });

  it('skips a tick while another run holds the lease', async () => {
    await h.store.tryAcquireLock('nightly-consolidation', 'manual-run', h.clock.now(), 60_000);
    const scheduler = new ConsolidationScheduler(h.service.consolidationJob, { intervalMs: 60_000 });

    expect(await scheduler.runOnce()).toBeNull();
  });

  it('fires on its interval until stopped', async () => {
    const runs: ConsolidationSummary[] = [];
    const fast = new ConsolidationScheduler(h.service.consolidationJob, {
      intervalMs: 5,
      onRun: (summary) => runs.push(summary)
    });
    fast.start();
    expect(fast.isRunning()).toBe(true);

    await vi.waitFor(() => expect(runs.length).toBeGreaterThanOrEqual(2));
    fast.stop();
    expect(fast.isRunning()).toBe(false);

    expect(runs[0].unitsCreated).toBe(1);
    expect(runs[1].unitsCreated).toBe(0);
  });

  it('is started and stopped by the service', () => {
    const scheduler = h.service.startScheduler();
    expect(scheduler.isRunning()).toBe(true);

    h.service.stopScheduler();
    expect(scheduler.isRunning()).toBe(false);
  });
});
