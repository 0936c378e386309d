/**
 * Knowledge Service - Main entry point
 * Wires configuration, storage, classifier, router, consolidation and
 * approvals together. Transports (HTTP, CLI) only talk to this.
 */

import * as fs from 'fs';
import * as path from 'path';

import type {
  ActivityLogEntry,
  ApprovalDecision,
  Config,
  ConsolidationSummary,
  DailyDigest,
  Disposition,
  DomainScore,
  KnowledgeDomain,
  KnowledgeStats,
  KnowledgeUnit
} from '../core/types.js';
import { ActivityLogEntryInputSchema, TaskSchema } from '../core/types.js';
import type { KnowledgeRepository, TimeRange } from '../core/knowledge-repository.js';
import { SQLiteKnowledgeStore } from '../core/sqlite-knowledge-store.js';
import { Classifier } from '../core/classifier.js';
import { Router } from '../core/router.js';
import {
  ConsolidationJob,
  startOfUtcDay,
  type Clock,
  type ConsolidateOptions
} from '../core/consolidation-job.js';
import { ConsolidationScheduler } from '../core/consolidation-scheduler.js';
import { ApprovalQueue } from '../core/approval-queue.js';
import { NotFoundError, ValidationError, validationErrorFromZod } from '../core/errors.js';
import { resolveDatabasePath } from '../core/config.js';

export interface KnowledgeServiceOptions {
  config: Config;
  repository: KnowledgeRepository;
  now?: Clock;
}

export interface ClassifyOutcome {
  taskId: string;
  scores: DomainScore[];
  recommendedDomainId: string;
  confidence: number;
  disposition: Disposition;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export class KnowledgeService {
  readonly domains: KnowledgeDomain[];
  readonly classifier: Classifier;
  readonly router: Router;
  readonly consolidationJob: ConsolidationJob;
  readonly approvals: ApprovalQueue;
  private scheduler: ConsolidationScheduler | null = null;
  private initialized = false;
  private readonly config: Config;
  private readonly repository: KnowledgeRepository;
  private readonly now: Clock;

  constructor(options: KnowledgeServiceOptions) {
    this.config = options.config;
    this.repository = options.repository;
    this.now = options.now ?? (() => new Date());

    this.domains = this.config.domains.map((d, index) => ({
      id: d.id,
      name: d.name,
      description: d.description,
      priority: index
    }));
    this.classifier = new Classifier(this.config.domains, this.config.classifier);
    this.router = new Router(this.config.router);
    this.consolidationJob = new ConsolidationJob(this.repository, this.domains, this.config.consolidation, this.now);
    this.approvals = new ApprovalQueue(this.repository, this.domains, this.now);
  }

  /**
   * Create schema and seed the domain registry
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.repository.initialize();
    await this.repository.seedDomains(this.domains);
    this.initialized = true;
  }

  // ============================================================
  // Classification
  // ============================================================

  /**
   * Score a task and decide its disposition
   */
  classify(input: unknown): ClassifyOutcome {
    const parsed = TaskSchema.safeParse(input);
    if (!parsed.success) {
      throw validationErrorFromZod('Invalid task', parsed.error);
    }

    const result = this.classifier.score(parsed.data);
    const disposition = this.router.route(result.scores, result.confidence);

    return {
      taskId: parsed.data.id,
      scores: result.scores,
      recommendedDomainId: result.recommendedDomainId,
      confidence: result.confidence,
      disposition
    };
  }

  listDomains(): KnowledgeDomain[] {
    return [...this.domains];
  }

  // ============================================================
  // Activity log
  // ============================================================

  async logActivity(input: unknown): Promise<ActivityLogEntry> {
    await this.initialize();

    const parsed = ActivityLogEntryInputSchema.safeParse(input);
    if (!parsed.success) {
      throw validationErrorFromZod('Invalid activity entry', parsed.error);
    }
    if (!this.domains.some((d) => d.id === parsed.data.domainId)) {
      throw new ValidationError(`Unknown domain "${parsed.data.domainId}"`, { domainId: parsed.data.domainId });
    }

    return this.repository.appendActivity(parsed.data, this.now());
  }

  // ============================================================
  // Consolidation
  // ============================================================

  async consolidate(options: ConsolidateOptions = {}): Promise<ConsolidationSummary> {
    await this.initialize();
    return this.consolidationJob.consolidate(options);
  }

  startScheduler(onRun?: (summary: ConsolidationSummary) => void): ConsolidationScheduler {
    if (!this.scheduler) {
      this.scheduler = new ConsolidationScheduler(this.consolidationJob, {
        intervalMs: this.config.consolidation.intervalMs,
        onRun
      });
    }
    this.scheduler.start();
    return this.scheduler;
  }

  stopScheduler(): void {
    this.scheduler?.stop();
  }

  // ============================================================
  // Approvals
  // ============================================================

  async listFlagged(domainId?: string): Promise<KnowledgeUnit[]> {
    await this.initialize();
    return this.approvals.listFlagged(domainId);
  }

  async decide(unitId: string, decision: unknown, reviewer?: string): Promise<ApprovalDecision> {
    await this.initialize();
    return this.approvals.decide(unitId, decision, reviewer);
  }

  /**
   * A unit and every decision recorded against it
   */
  async getUnit(unitId: string): Promise<{ unit: KnowledgeUnit; decisions: ApprovalDecision[] }> {
    await this.initialize();

    const unit = await this.approvals.getUnit(unitId);
    if (!unit) {
      throw new NotFoundError(`Knowledge unit ${unitId} not found`, { unitId });
    }
    return { unit, decisions: await this.approvals.history(unitId) };
  }

  // ============================================================
  // Reporting
  // ============================================================

  /**
   * Daily digest for a UTC date (YYYY-MM-DD); defaults to today
   */
  async digest(date?: string): Promise<DailyDigest> {
    await this.initialize();

    const range = date === undefined ? this.dayRange(this.now()) : this.parseDay(date);
    const [activity, unitsCreated, unitsFlaggedPending, decisions] = await Promise.all([
      this.repository.countActivityByDomain(range),
      this.repository.countUnitsCreated(range),
      this.repository.countPendingUpdated(range),
      this.repository.countDecisions(range)
    ]);

    return {
      date: range.since.toISOString().slice(0, 10),
      domainsTouched: Object.keys(activity).sort(),
      unitsCreated,
      unitsFlaggedPending,
      approvedToday: decisions.approved,
      rejectedToday: decisions.rejected
    };
  }

  async stats(): Promise<KnowledgeStats> {
    await this.initialize();

    const [activityToday, unitsByDomain, pendingApprovals, lastRun] = await Promise.all([
      this.repository.countActivityByDomain(this.dayRange(this.now())),
      this.repository.countUnitsByDomain(),
      this.repository.countPendingApprovals(),
      this.repository.getLastRun(this.config.consolidation.jobName)
    ]);

    return { activityToday, unitsByDomain, pendingApprovals, lastRun };
  }

  async shutdown(): Promise<void> {
    this.stopScheduler();
    this.repository.close();
  }

  private dayRange(at: Date): TimeRange {
    const since = startOfUtcDay(at);
    return { since, until: new Date(since.getTime() + DAY_MS) };
  }

  private parseDay(date: string): TimeRange {
    const parsed = new Date(`${date}T00:00:00.000Z`);
    if (!DATE_PATTERN.test(date) || Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== date) {
      throw new ValidationError(`Invalid date "${date}"; expected YYYY-MM-DD`, { date });
    }
    return this.dayRange(parsed);
  }
}

/**
 * Create a service backed by the SQLite store configured in `config.storage`
 */
export function createKnowledgeService(config: Config, now?: Clock): KnowledgeService {
  const dbPath = resolveDatabasePath(config);
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  return new KnowledgeService({
    config,
    repository: new SQLiteKnowledgeStore(dbPath),
    now
  });
}
