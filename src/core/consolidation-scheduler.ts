/**
 * Consolidation Scheduler
 * Fires the consolidation job on a fixed cadence (nightly by default).
 */

import type { ConsolidationSummary } from './types.js';
import type { ConsolidationJob } from './consolidation-job.js';
import { BusyError } from './errors.js';

export interface ConsolidationSchedulerOptions {
  intervalMs: number;
  onRun?: (summary: ConsolidationSummary) => void;
}

export class ConsolidationScheduler {
  private running = false;
  private timeout: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;

  constructor(
    private job: ConsolidationJob,
    private options: ConsolidationSchedulerOptions
  ) {}

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleNext();
  }

  /**
   * Stop the scheduler and cancel an in-flight run before it commits
   */
  stop(): void {
    this.running = false;
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
    this.controller?.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run once with the default window. Busy is reported as null.
   */
  async runOnce(): Promise<ConsolidationSummary | null> {
    this.controller = new AbortController();
    try {
      const summary = await this.job.consolidate({ signal: this.controller.signal });
      this.options.onRun?.(summary);
      return summary;
    } catch (error) {
      if (error instanceof BusyError) {
        console.warn(`[ConsolidationScheduler] ${this.job.jobName} still running, skipping this tick`);
        return null;
      }
      throw error;
    } finally {
      this.controller = null;
    }
  }

  private scheduleNext(): void {
    if (!this.running) return;

    this.timeout = setTimeout(() => {
      void this.tick();
    }, this.options.intervalMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    try {
      await this.runOnce();
    } catch (error) {
      console.error('[ConsolidationScheduler] consolidation error:', error);
    }

    this.scheduleNext();
  }
}
