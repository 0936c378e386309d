/**
 * API Utilities
 * Shared helpers for API endpoints: body parsing, error mapping and the
 * snake_case wire shapes of the core entities.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { z } from 'zod';

import type {
  ActivityLogEntry,
  ApprovalDecision,
  ConsolidationRun,
  ConsolidationSummary,
  DailyDigest,
  KnowledgeUnit
} from '../../core/types.js';
import {
  KnowledgeRouterError,
  ValidationError,
  validationErrorFromZod,
  type ErrorCode
} from '../../core/errors.js';

export type ErrorStatus = 400 | 404 | 409 | 500 | 503;

const STATUS_BY_CODE: Record<ErrorCode, ErrorStatus> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  BUSY: 409,
  CANCELLED: 409,
  CONFIGURATION: 500,
  TRANSIENT_STORE: 503
};

export interface ErrorBody {
  error: {
    code: ErrorCode | 'INTERNAL';
    message: string;
    retryable: boolean;
  };
}

export function statusForError(error: unknown): ErrorStatus {
  return error instanceof KnowledgeRouterError ? STATUS_BY_CODE[error.code] : 500;
}

export function errorBody(error: unknown): ErrorBody {
  if (error instanceof KnowledgeRouterError) {
    return { error: { code: error.code, message: error.message, retryable: error.retryable } };
  }
  return { error: { code: 'INTERNAL', message: 'Internal server error', retryable: false } };
}

/**
 * Read and validate a JSON body. An empty body is treated as `{}`.
 */
export async function readJsonBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  const text = await c.req.text();
  let raw: unknown = {};
  if (text.trim().length > 0) {
    try {
      raw = JSON.parse(text);
    } catch {
      throw new ValidationError('Request body is not valid JSON');
    }
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw validationErrorFromZod('Invalid request body', parsed.error);
  }
  return parsed.data;
}

// ============================================================
// Wire shapes
// ============================================================

export function unitToJson(unit: KnowledgeUnit) {
  return {
    id: unit.id,
    domain_id: unit.domainId,
    task_id: unit.taskId,
    content: unit.content,
    version: unit.version,
    fingerprint: unit.fingerprint,
    flagged: unit.flagged,
    archived: unit.archived,
    created_at: unit.createdAt.toISOString(),
    updated_at: unit.updatedAt.toISOString()
  };
}

export function decisionToJson(decision: ApprovalDecision) {
  return {
    id: decision.id,
    unit_id: decision.unitId,
    unit_version: decision.unitVersion,
    decision: decision.decision,
    reviewer: decision.reviewer ?? null,
    decided_at: decision.decidedAt.toISOString()
  };
}

export function activityToJson(entry: ActivityLogEntry) {
  return {
    id: entry.id,
    domain_id: entry.domainId,
    task_id: entry.taskId,
    action_text: entry.actionText,
    result_text: entry.resultText,
    created_at: entry.createdAt.toISOString()
  };
}

export function summaryToJson(summary: ConsolidationSummary) {
  return {
    run_id: summary.runId,
    since: summary.since.toISOString(),
    until: summary.until.toISOString(),
    entries_processed: summary.entriesProcessed,
    units_created: summary.unitsCreated,
    units_updated: summary.unitsUpdated,
    units_unchanged: summary.unitsUnchanged,
    domains_touched: summary.domainsTouched,
    reinforced_signals: summary.reinforcedSignals.map((s) => ({
      domain_id: s.domainId,
      task_id: s.taskId,
      count: s.count
    })),
    duration_ms: summary.durationMs
  };
}

export function runToJson(run: ConsolidationRun) {
  return {
    id: run.id,
    job_name: run.jobName,
    status: run.status,
    since: run.since.toISOString(),
    until: run.until.toISOString(),
    started_at: run.startedAt.toISOString(),
    finished_at: run.finishedAt ? run.finishedAt.toISOString() : null,
    error: run.error ?? null
  };
}

export function digestToJson(digest: DailyDigest) {
  return {
    date: digest.date,
    domains_touched: digest.domainsTouched,
    units_created: digest.unitsCreated,
    units_flagged_pending: digest.unitsFlaggedPending,
    approved_today: digest.approvedToday,
    rejected_today: digest.rejectedToday
  };
}

/**
 * Shared onError handler for the app and every mounted router
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  const status = statusForError(err);
  if (status >= 500) {
    console.error(`[API] ${c.req.method} ${c.req.path} failed:`, err);
  }
  return c.json(errorBody(err), status);
}
