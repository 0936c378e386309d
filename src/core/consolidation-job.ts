/**
 * Consolidation Job
 * Turns a window of activity log entries into versioned knowledge units.
 *
 * Runs in two phases: an evaluation pass that only reads and builds a write
 * plan, then a single atomic commit. Cancellation is honoured up to (never
 * during) the commit.
 */

import { randomUUID } from 'crypto';

import type {
  ActivityLogEntry,
  ConsolidationConfig,
  ConsolidationSummary,
  KnowledgeDomain,
  PlannedWrite,
  ReinforcedSignal
} from './types.js';
import type { KnowledgeRepository, RunCompletion, TimeRange } from './knowledge-repository.js';
import { BusyError, CancelledError, ValidationError } from './errors.js';
import { canonicalLine, fingerprintEntries, fingerprintLine } from './fingerprint.js';

export interface ConsolidateOptions {
  since?: Date;
  until?: Date;
  signal?: AbortSignal;
}

interface EntryGroup {
  domainId: string;
  taskId: string;
  entries: ActivityLogEntry[];
}

export type Clock = () => Date;

const DAY_MS = 24 * 60 * 60 * 1000;

export function startOfUtcDay(date: Date): Date {
  return new Date(Math.floor(date.getTime() / DAY_MS) * DAY_MS);
}

/**
 * Render one line per distinct piece of evidence, in first-seen order
 */
export function renderGroupContent(taskId: string, entries: ActivityLogEntry[]): string {
  const seen = new Set<string>();
  const lines: string[] = [];
  for (const entry of entries) {
    const key = canonicalLine(entry);
    if (seen.has(key)) continue;
    seen.add(key);
    lines.push(`[${taskId}] ${entry.actionText}: ${entry.resultText}`);
  }
  return lines.join('\n');
}

export class ConsolidationJob {
  constructor(
    private repository: KnowledgeRepository,
    private domains: KnowledgeDomain[],
    private config: ConsolidationConfig,
    private now: Clock = () => new Date()
  ) {}

  get jobName(): string {
    return this.config.jobName;
  }

  /**
   * Run one consolidation over [since, until).
   * Throws BusyError when another run holds the lease.
   */
  async consolidate(options: ConsolidateOptions = {}): Promise<ConsolidationSummary> {
    const startedAt = this.now();

    // The run id doubles as the lease holder
    const runId = randomUUID();
    const acquired = await this.repository.tryAcquireLock(
      this.config.jobName,
      runId,
      startedAt,
      this.config.lockTtlMs
    );
    if (!acquired) {
      throw new BusyError(this.config.jobName);
    }

    try {
      // Only read the last run while holding the lease
      const range = await this.resolveWindow(options, startedAt);
      await this.repository.startRun({
        id: runId,
        jobName: this.config.jobName,
        since: range.since,
        until: range.until,
        startedAt
      });

      let summary: ConsolidationSummary;
      try {
        summary = await this.execute(runId, range, startedAt, options.signal);
      } catch (error) {
        const cancelled = error instanceof CancelledError;
        const message = error instanceof Error ? error.message : String(error);
        await this.recordRun(runId, {
          status: cancelled ? 'cancelled' : 'failed',
          error: message,
          finishedAt: this.now()
        });
        if (cancelled) {
          console.warn(`[ConsolidationJob] run ${runId} cancelled before commit`);
        } else {
          console.error(`[ConsolidationJob] run ${runId} failed, batch rolled back:`, message);
        }
        throw error;
      }

      await this.recordRun(runId, { status: 'succeeded', summary, finishedAt: this.now() });
      console.log(
        `[ConsolidationJob] ${this.config.jobName} ${range.since.toISOString()}..${range.until.toISOString()}: ` +
        `${summary.entriesProcessed} entries, ${summary.unitsCreated} created, ${summary.unitsUpdated} updated`
      );
      return summary;
    } finally {
      await this.releaseLease(runId);
    }
  }

  /**
   * Default window: from the end of the last successful run (or the start of
   * the UTC day) up to now.
   */
  async resolveWindow(options: ConsolidateOptions, now: Date): Promise<TimeRange> {
    const until = options.until ?? now;
    let since = options.since;

    if (!since) {
      const last = await this.repository.getLastRun(this.config.jobName, 'succeeded');
      since = last && last.until.getTime() < until.getTime() ? last.until : startOfUtcDay(until);
    }

    if (Number.isNaN(since.getTime()) || Number.isNaN(until.getTime())) {
      throw new ValidationError('Consolidation window bounds must be valid dates');
    }
    if (since.getTime() >= until.getTime()) {
      throw new ValidationError(
        `Empty consolidation window: since (${since.toISOString()}) must be before until (${until.toISOString()})`
      );
    }
    return { since, until };
  }

  private async execute(
    runId: string,
    range: TimeRange,
    startedAt: Date,
    signal?: AbortSignal
  ): Promise<ConsolidationSummary> {
    this.throwIfCancelled(signal);

    const entries = await this.repository.getActivityInRange(range);
    const groups = this.groupEntries(entries);

    const writes: PlannedWrite[] = [];
    let unchanged = 0;

    for (const group of groups) {
      this.throwIfCancelled(signal);
      const write = await this.planGroup(group, startedAt);
      if (write) {
        writes.push(write);
      } else {
        unchanged++;
      }
    }

    // Last chance to abort; past this point the batch commits or fails whole
    this.throwIfCancelled(signal);
    if (writes.length > 0) {
      await this.repository.applyConsolidation(writes, startedAt);
    }

    const reinforcedSignals: ReinforcedSignal[] = groups
      .filter((g) => g.entries.length > 1)
      .map((g) => ({ domainId: g.domainId, taskId: g.taskId, count: g.entries.length }));

    return {
      runId,
      since: range.since,
      until: range.until,
      entriesProcessed: groups.reduce((acc, g) => acc + g.entries.length, 0),
      unitsCreated: writes.filter((w) => w.kind === 'create').length,
      unitsUpdated: writes.filter((w) => w.kind === 'update').length,
      unitsUnchanged: unchanged,
      domainsTouched: [...new Set(writes.map((w) => w.domainId))].sort(),
      reinforcedSignals,
      durationMs: Math.max(0, this.now().getTime() - startedAt.getTime())
    };
  }

  /**
   * Decide what a group means for the knowledge store, without writing.
   * Only evidence lines no unit has absorbed yet (active or archived) count.
   */
  private async planGroup(group: EntryGroup, at: Date): Promise<PlannedWrite | null> {
    const fresh = await this.unabsorbedEntries(group);
    if (fresh.length === 0) {
      return null;
    }

    const fingerprint = fingerprintEntries(fresh);
    const evidence = [...new Set(fresh.map(fingerprintLine))];
    const content = renderGroupContent(group.taskId, fresh);
    const existing = await this.repository.findActiveUnit(group.domainId, group.taskId);

    if (existing) {
      return {
        kind: 'update',
        unitId: existing.id,
        domainId: group.domainId,
        taskId: group.taskId,
        expectedVersion: existing.version,
        content: `${existing.content}\n\n--- Update ${at.toISOString()} ---\n${content}`,
        fingerprint,
        evidence
      };
    }

    return {
      kind: 'create',
      unitId: randomUUID(),
      domainId: group.domainId,
      taskId: group.taskId,
      content,
      fingerprint,
      evidence
    };
  }

  private async unabsorbedEntries(group: EntryGroup): Promise<ActivityLogEntry[]> {
    const absorbed = new Map<string, boolean>();
    const fresh: ActivityLogEntry[] = [];

    for (const entry of group.entries) {
      const line = fingerprintLine(entry);
      let seen = absorbed.get(line);
      if (seen === undefined) {
        seen = await this.repository.hasAbsorbedFingerprint(group.domainId, group.taskId, line);
        absorbed.set(line, seen);
      }
      if (!seen) {
        fresh.push(entry);
      }
    }
    return fresh;
  }

  /**
   * Group by (domain, task) preserving first-seen order
   */
  private groupEntries(entries: ActivityLogEntry[]): EntryGroup[] {
    const registered = new Set(this.domains.map((d) => d.id));
    const groups = new Map<string, EntryGroup>();

    for (const entry of entries) {
      const domainId = this.resolveDomain(entry.domainId, registered);
      if (!domainId) {
        console.warn(`[ConsolidationJob] skipping entry ${entry.id}: unknown domain "${entry.domainId}"`);
        continue;
      }

      const key = JSON.stringify([domainId, entry.taskId]);
      let group = groups.get(key);
      if (!group) {
        group = { domainId, taskId: entry.taskId, entries: [] };
        groups.set(key, group);
      }
      group.entries.push(entry);
    }

    return [...groups.values()];
  }

  private resolveDomain(domainId: string, registered: Set<string>): string | null {
    if (registered.has(domainId)) return domainId;
    return this.config.fallbackDomainId ?? null;
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }

  /**
   * A failed write is logged; the run's own outcome stands
   */
  private async recordRun(runId: string, completion: RunCompletion): Promise<void> {
    try {
      await this.repository.finishRun(runId, completion);
    } catch (error) {
      console.error(`[ConsolidationJob] could not record run ${runId} as ${completion.status}:`, error);
    }
  }

  /**
   * A lease that cannot be released expires after lockTtlMs
   */
  private async releaseLease(runId: string): Promise<void> {
    try {
      await this.repository.releaseLock(this.config.jobName, runId);
    } catch (error) {
      console.error(`[ConsolidationJob] could not release lease for run ${runId}:`, error);
    }
  }
}
