/**
 * Shared test fixtures
 */

import { DEFAULT_CONFIG_PATH, loadConfig } from '../src/core/config.js';
import type { Config } from '../src/core/types.js';
import { SQLiteKnowledgeStore } from '../src/core/sqlite-knowledge-store.js';
import { KnowledgeService } from '../src/services/knowledge-service.js';

/**
 * Shipped configuration, without environment overrides
 */
export function loadTestConfig(): Config {
  return loadConfig(DEFAULT_CONFIG_PATH, {});
}

/**
 * Clock that only moves when told to
 */
export class ManualClock {
  private current: Date;

  constructor(iso: string) {
    this.current = new Date(iso);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface TestHarness {
  config: Config;
  clock: ManualClock;
  store: SQLiteKnowledgeStore;
  service: KnowledgeService;
}

export async function createHarness(startIso = '2026-03-10T02:00:00.000Z'): Promise<TestHarness> {
  const config = loadTestConfig();
  const clock = new ManualClock(startIso);
  const store = new SQLiteKnowledgeStore(':memory:');
  const service = new KnowledgeService({ config, repository: store, now: clock.now });
  await service.initialize();
  return { config, clock, store, service };
}
