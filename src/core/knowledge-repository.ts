/**
 * Knowledge Repository
 * Storage abstraction shared by the consolidation job, approval queue and
 * reporting. Components depend on this interface, never on a concrete store.
 */

import type {
  ActivityLogEntry,
  ActivityLogEntryInput,
  ApprovalDecision,
  ConsolidationRun,
  ConsolidationSummary,
  DecisionValue,
  KnowledgeDomain,
  KnowledgeUnit,
  PlannedWrite,
  RunStatus
} from './types.js';

export interface TimeRange {
  /** Inclusive */
  since: Date;
  /** Exclusive */
  until: Date;
}

export interface RunCompletion {
  status: Exclude<RunStatus, 'running'>;
  summary?: ConsolidationSummary;
  error?: string;
  finishedAt: Date;
}

export interface KnowledgeRepository {
  initialize(): Promise<void>;
  close(): void;

  // Domain registry
  seedDomains(domains: KnowledgeDomain[]): Promise<void>;
  listDomains(): Promise<KnowledgeDomain[]>;

  // Activity log (append-only)
  appendActivity(input: ActivityLogEntryInput, now: Date): Promise<ActivityLogEntry>;
  getActivityInRange(range: TimeRange): Promise<ActivityLogEntry[]>;
  countActivityByDomain(range: TimeRange): Promise<Record<string, number>>;

  // Knowledge units
  getUnit(unitId: string): Promise<KnowledgeUnit | null>;
  findActiveUnit(domainId: string, taskId: string): Promise<KnowledgeUnit | null>;
  hasAbsorbedFingerprint(domainId: string, taskId: string, fingerprint: string): Promise<boolean>;
  listFlaggedUnits(domainId?: string): Promise<KnowledgeUnit[]>;
  countUnitsByDomain(): Promise<Record<string, number>>;
  countUnitsCreated(range: TimeRange): Promise<number>;
  countPendingUpdated(range: TimeRange): Promise<number>;
  countPendingApprovals(): Promise<number>;

  /**
   * Apply every planned write in one transaction; all or nothing.
   * Throws ConflictError when a guarded update lost a race.
   */
  applyConsolidation(writes: PlannedWrite[], at: Date): Promise<void>;

  // Approval decisions
  /**
   * Compare-and-set on the flagged state plus the decision row, atomically.
   * Throws NotFoundError for unknown units and ConflictError when the unit
   * is no longer flagged.
   */
  decideUnit(unitId: string, decision: DecisionValue, at: Date, reviewer?: string): Promise<ApprovalDecision>;
  listDecisions(unitId: string): Promise<ApprovalDecision[]>;
  countDecisions(range: TimeRange): Promise<Record<DecisionValue, number>>;

  // Job runs and leases
  tryAcquireLock(jobName: string, holder: string, now: Date, ttlMs: number): Promise<boolean>;
  releaseLock(jobName: string, holder: string): Promise<void>;
  startRun(run: Omit<ConsolidationRun, 'status' | 'summary' | 'error' | 'finishedAt'>): Promise<void>;
  finishRun(runId: string, completion: RunCompletion): Promise<void>;
  getLastRun(jobName: string, status?: RunStatus): Promise<ConsolidationRun | null>;
}
