/**
 * Core types for the knowledge router
 * Entities are declared as zod schemas; TypeScript types are inferred from them.
 */

import { z } from 'zod';

// ============================================================
// Task (ephemeral classifier input)
// ============================================================

export const TaskPrioritySchema = z.enum(['low', 'medium', 'high', 'critical']);
export type TaskPriority = z.infer<typeof TaskPrioritySchema>;

export const TaskSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  context: z.record(z.unknown()).optional()
});
export type Task = z.infer<typeof TaskSchema>;

// ============================================================
// Classification / Routing
// ============================================================

export interface DomainScore {
  domainId: string;
  rawScore: number;
  /** Share of the total raw score, 0-100 */
  normalizedScore: number;
  /** Primary + secondary keyword hits */
  matches: number;
}

export interface ClassificationResult {
  /** Ordered best-first; ties follow registration priority */
  scores: DomainScore[];
  recommendedDomainId: string;
  confidence: number;
}

export const DispositionActionSchema = z.enum(['auto_assign', 'hold', 'manual_review']);
export type DispositionAction = z.infer<typeof DispositionActionSchema>;

export interface Disposition {
  domainId: string;
  action: DispositionAction;
}

// ============================================================
// Domain Registry
// ============================================================

export const KnowledgeDomainSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  priority: z.number().int().nonnegative()
});
export type KnowledgeDomain = z.infer<typeof KnowledgeDomainSchema>;

// ============================================================
// Activity Log (append-only)
// ============================================================

export const ActivityLogEntrySchema = z.object({
  id: z.string().uuid(),
  domainId: z.string(),
  taskId: z.string(),
  actionText: z.string(),
  resultText: z.string(),
  createdAt: z.date()
});
export type ActivityLogEntry = z.infer<typeof ActivityLogEntrySchema>;

export const ActivityLogEntryInputSchema = z.object({
  domainId: z.string().min(1),
  taskId: z.string().min(1),
  actionText: z.string().min(1),
  resultText: z.string(),
  createdAt: z.coerce.date().optional()
});
export type ActivityLogEntryInput = z.infer<typeof ActivityLogEntryInputSchema>;

// ============================================================
// Knowledge Units
// ============================================================

export const KnowledgeUnitSchema = z.object({
  id: z.string().uuid(),
  domainId: z.string(),
  taskId: z.string(),
  content: z.string(),
  version: z.number().int().min(1),
  fingerprint: z.string(),
  flagged: z.boolean(),
  archived: z.boolean(),
  createdAt: z.date(),
  updatedAt: z.date()
});
export type KnowledgeUnit = z.infer<typeof KnowledgeUnitSchema>;

export const DecisionValueSchema = z.enum(['approved', 'rejected']);
export type DecisionValue = z.infer<typeof DecisionValueSchema>;

export const ApprovalDecisionSchema = z.object({
  id: z.string().uuid(),
  unitId: z.string().uuid(),
  unitVersion: z.number().int().min(1),
  decision: DecisionValueSchema,
  reviewer: z.string().optional(),
  decidedAt: z.date()
});
export type ApprovalDecision = z.infer<typeof ApprovalDecisionSchema>;

// ============================================================
// Consolidation
// ============================================================

export interface ReinforcedSignal {
  domainId: string;
  taskId: string;
  count: number;
}

export interface ConsolidationSummary {
  runId: string;
  since: Date;
  until: Date;
  entriesProcessed: number;
  unitsCreated: number;
  unitsUpdated: number;
  unitsUnchanged: number;
  domainsTouched: string[];
  reinforcedSignals: ReinforcedSignal[];
  durationMs: number;
}

export const RunStatusSchema = z.enum(['running', 'succeeded', 'failed', 'cancelled']);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export interface ConsolidationRun {
  id: string;
  jobName: string;
  since: Date;
  until: Date;
  status: RunStatus;
  summary?: ConsolidationSummary;
  error?: string;
  startedAt: Date;
  finishedAt?: Date;
}

/** A new unit the job intends to insert */
export interface PlannedCreate {
  kind: 'create';
  unitId: string;
  domainId: string;
  taskId: string;
  content: string;
  fingerprint: string;
  /** Per-line fingerprints this write absorbs */
  evidence: string[];
}

/** A content change on an active unit, guarded by its current version */
export interface PlannedUpdate {
  kind: 'update';
  unitId: string;
  domainId: string;
  taskId: string;
  expectedVersion: number;
  content: string;
  fingerprint: string;
  /** Per-line fingerprints this write absorbs */
  evidence: string[];
}

export type PlannedWrite = PlannedCreate | PlannedUpdate;

// ============================================================
// Reporting
// ============================================================

export interface DailyDigest {
  date: string;
  domainsTouched: string[];
  unitsCreated: number;
  unitsFlaggedPending: number;
  approvedToday: number;
  rejectedToday: number;
}

export interface KnowledgeStats {
  activityToday: Record<string, number>;
  unitsByDomain: Record<string, number>;
  pendingApprovals: number;
  lastRun: ConsolidationRun | null;
}

// ============================================================
// Configuration
// ============================================================

export const DomainConfigSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'domain id must be lowercase kebab/snake case'),
  name: z.string().min(1),
  description: z.string().default(''),
  primary: z.array(z.string().trim().min(1)).default([]),
  secondary: z.array(z.string().trim().min(1)).default([]),
  categories: z.array(z.string().trim().min(1)).default([]),
  weights: z.object({
    primary: z.number().nonnegative().default(3),
    secondary: z.number().nonnegative().default(1),
    complexity: z.number().nonnegative().default(0.5),
    priority: z.number().nonnegative().default(0.5),
    category: z.number().nonnegative().default(2)
  }).default({})
});
export type DomainConfig = z.infer<typeof DomainConfigSchema>;

export const ConfigSchema = z.object({
  storage: z.object({
    path: z.string().default('~/.knowledge-router'),
    dbFile: z.string().default('knowledge.sqlite')
  }).default({}),
  server: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().positive().default(37888)
  }).default({}),
  classifier: z.object({
    indicators: z.object({
      complexity: z.array(z.string().trim().min(1)).default([
        'complex', 'multi-step', 'migration', 'comprehensive', 'production', 'outage', 'architecture'
      ]),
      priority: z.array(z.string().trim().min(1)).default([
        'urgent', 'asap', 'critical', 'blocker', 'incident', 'immediately'
      ])
    }).default({}),
    confidence: z.object({
      top: z.number().nonnegative().default(0.4),
      margin: z.number().nonnegative().default(0.4),
      support: z.number().nonnegative().default(0.2),
      supportSaturation: z.number().int().positive().default(2)
    }).default({})
  }).default({}),
  router: z.object({
    highConfidenceThreshold: z.number().min(0).max(1).default(0.75),
    mediumConfidenceThreshold: z.number().min(0).max(1).default(0.45),
    manualReviewDomainId: z.string().optional()
  }).default({}),
  domains: z.array(DomainConfigSchema),
  consolidation: z.object({
    jobName: z.string().min(1).default('nightly-consolidation'),
    intervalMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
    lockTtlMs: z.number().int().positive().default(15 * 60 * 1000),
    fallbackDomainId: z.string().optional()
  }).default({})
});
export type Config = z.infer<typeof ConfigSchema>;
export type ClassifierConfig = Config['classifier'];
export type RouterConfig = Config['router'];
export type ConsolidationConfig = Config['consolidation'];
