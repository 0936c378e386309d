/**
 * SQLite-based KnowledgeRepository
 * Single-writer store; WAL mode lets readers proceed during a consolidation.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';

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
import { DecisionValueSchema, RunStatusSchema } from './types.js';
import type { KnowledgeRepository, RunCompletion, TimeRange } from './knowledge-repository.js';
import { ConflictError, KnowledgeRouterError, NotFoundError } from './errors.js';
import {
  createSQLiteDatabase,
  rethrowStoreError,
  sqliteAll,
  sqliteClose,
  sqliteExec,
  sqliteGet,
  sqliteRun,
  toDateFromSQLite,
  toSQLiteTimestamp,
  type SQLiteDatabase,
  type SQLiteOptions
} from './sqlite-wrapper.js';

// ============================================================
// Row schemas
// ============================================================

const DomainRow = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  priority: z.number()
});

const ActivityRow = z.object({
  id: z.string(),
  domain_id: z.string(),
  task_id: z.string(),
  action_text: z.string(),
  result_text: z.string(),
  created_at: z.string()
});

const UnitRow = z.object({
  id: z.string(),
  domain_id: z.string(),
  task_id: z.string(),
  content: z.string(),
  version: z.number(),
  fingerprint: z.string(),
  flagged: z.number(),
  archived: z.number(),
  created_at: z.string(),
  updated_at: z.string()
});

const DecisionRow = z.object({
  id: z.string(),
  unit_id: z.string(),
  unit_version: z.number(),
  decision: DecisionValueSchema,
  reviewer: z.string().nullable(),
  decided_at: z.string()
});

const RunRow = z.object({
  id: z.string(),
  job_name: z.string(),
  since: z.string(),
  until: z.string(),
  status: RunStatusSchema,
  summary_json: z.string().nullable(),
  error: z.string().nullable(),
  started_at: z.string(),
  finished_at: z.string().nullable()
});

const StoredSummary = z.object({
  runId: z.string(),
  since: z.coerce.date(),
  until: z.coerce.date(),
  entriesProcessed: z.number(),
  unitsCreated: z.number(),
  unitsUpdated: z.number(),
  unitsUnchanged: z.number(),
  domainsTouched: z.array(z.string()),
  reinforcedSignals: z.array(z.object({ domainId: z.string(), taskId: z.string(), count: z.number() })),
  durationMs: z.number()
});

const CountRow = z.object({ count: z.number() });
const GroupCountRow = z.object({ key: z.string(), count: z.number() });

const SCHEMA = `
  -- Static domain registry
  CREATE TABLE IF NOT EXISTS knowledge_domains (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    priority INTEGER NOT NULL
  );

  -- Activity log (append-only, written by domain handlers)
  CREATE TABLE IF NOT EXISTS activity_log (
    id TEXT PRIMARY KEY,
    domain_id TEXT NOT NULL,
    task_id TEXT NOT NULL,
    action_text TEXT NOT NULL,
    result_text TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  -- Versioned knowledge units
  CREATE TABLE IF NOT EXISTS knowledge_units (
    id TEXT PRIMARY KEY,
    domain_id TEXT NOT NULL REFERENCES knowledge_domains(id),
    task_id TEXT NOT NULL,
    content TEXT NOT NULL,
    version INTEGER NOT NULL CHECK (version >= 1),
    fingerprint TEXT NOT NULL,
    flagged INTEGER NOT NULL DEFAULT 1,
    archived INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (domain_id, task_id, fingerprint)
  );

  -- Every evidence line a unit has absorbed, including archived units
  CREATE TABLE IF NOT EXISTS unit_fingerprints (
    domain_id TEXT NOT NULL,
    task_id TEXT NOT NULL,
    fingerprint TEXT NOT NULL,
    unit_id TEXT NOT NULL REFERENCES knowledge_units(id),
    absorbed_at TEXT NOT NULL,
    PRIMARY KEY (domain_id, task_id, fingerprint)
  );

  CREATE TABLE IF NOT EXISTS approval_decisions (
    id TEXT PRIMARY KEY,
    unit_id TEXT NOT NULL REFERENCES knowledge_units(id),
    unit_version INTEGER NOT NULL,
    decision TEXT NOT NULL CHECK (decision IN ('approved', 'rejected')),
    reviewer TEXT,
    decided_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS consolidation_runs (
    id TEXT PRIMARY KEY,
    job_name TEXT NOT NULL,
    since TEXT NOT NULL,
    until TEXT NOT NULL,
    status TEXT NOT NULL,
    summary_json TEXT,
    error TEXT,
    started_at TEXT NOT NULL,
    finished_at TEXT
  );

  -- Single-flight leases
  CREATE TABLE IF NOT EXISTS job_locks (
    job_name TEXT PRIMARY KEY,
    holder TEXT NOT NULL,
    acquired_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_activity_created ON activity_log(created_at);
  CREATE INDEX IF NOT EXISTS idx_activity_domain_task ON activity_log(domain_id, task_id);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_units_active ON knowledge_units(domain_id, task_id) WHERE archived = 0;
  CREATE INDEX IF NOT EXISTS idx_units_flagged ON knowledge_units(flagged, archived, domain_id);
  CREATE INDEX IF NOT EXISTS idx_units_created ON knowledge_units(created_at);
  CREATE INDEX IF NOT EXISTS idx_decisions_unit ON approval_decisions(unit_id);
  CREATE INDEX IF NOT EXISTS idx_decisions_decided ON approval_decisions(decided_at);
  CREATE INDEX IF NOT EXISTS idx_runs_job_status ON consolidation_runs(job_name, status, started_at);
`;

/**
 * A summary that cannot be read back is treated as absent
 */
function parseStoredSummary(json: string): ConsolidationSummary | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return undefined;
  }
  const parsed = StoredSummary.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error
    && 'code' in error
    && (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY');
}

export class SQLiteKnowledgeStore implements KnowledgeRepository {
  private db: SQLiteDatabase;
  private initialized = false;

  constructor(private dbPath: string, options?: SQLiteOptions) {
    this.db = createSQLiteDatabase(dbPath, {
      readonly: options?.readonly ?? false,
      walMode: options?.walMode ?? !options?.readonly,
      busyTimeoutMs: options?.busyTimeoutMs
    });
  }

  /**
   * Initialize database schema
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    try {
      sqliteExec(this.db, SCHEMA);
    } catch (error) {
      rethrowStoreError(error, 'initialize schema');
    }
    this.initialized = true;
  }

  close(): void {
    sqliteClose(this.db);
  }

  // ============================================================
  // Domains
  // ============================================================

  /**
   * Insert registry rows that do not exist yet. Existing rows are left as-is.
   */
  async seedDomains(domains: KnowledgeDomain[]): Promise<void> {
    await this.initialize();

    const insert = this.db.prepare(`
      INSERT INTO knowledge_domains (id, name, description, priority)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO NOTHING
    `);
    const seed = this.db.transaction((rows: KnowledgeDomain[]) => {
      for (const d of rows) {
        insert.run(d.id, d.name, d.description, d.priority);
      }
    });

    this.guard('seed domains', () => seed(domains));
  }

  async listDomains(): Promise<KnowledgeDomain[]> {
    await this.initialize();
    return this.guard('list domains', () =>
      sqliteAll(this.db, `SELECT * FROM knowledge_domains ORDER BY priority ASC, id ASC`, [], DomainRow)
    );
  }

  // ============================================================
  // Activity log
  // ============================================================

  async appendActivity(input: ActivityLogEntryInput, now: Date): Promise<ActivityLogEntry> {
    await this.initialize();

    const entry: ActivityLogEntry = {
      id: randomUUID(),
      domainId: input.domainId,
      taskId: input.taskId,
      actionText: input.actionText,
      resultText: input.resultText,
      createdAt: input.createdAt ?? now
    };

    this.guard('append activity', () =>
      sqliteRun(
        this.db,
        `INSERT INTO activity_log (id, domain_id, task_id, action_text, result_text, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [entry.id, entry.domainId, entry.taskId, entry.actionText, entry.resultText, toSQLiteTimestamp(entry.createdAt)]
      )
    );

    return entry;
  }

  /**
   * Entries with created_at in [since, until), oldest first
   */
  async getActivityInRange(range: TimeRange): Promise<ActivityLogEntry[]> {
    await this.initialize();

    const rows = this.guard('read activity', () =>
      sqliteAll(
        this.db,
        `SELECT * FROM activity_log
         WHERE created_at >= ? AND created_at < ?
         ORDER BY created_at ASC, id ASC`,
        [toSQLiteTimestamp(range.since), toSQLiteTimestamp(range.until)],
        ActivityRow
      )
    );

    return rows.map((row) => ({
      id: row.id,
      domainId: row.domain_id,
      taskId: row.task_id,
      actionText: row.action_text,
      resultText: row.result_text,
      createdAt: toDateFromSQLite(row.created_at)
    }));
  }

  async countActivityByDomain(range: TimeRange): Promise<Record<string, number>> {
    await this.initialize();

    const rows = this.guard('count activity', () =>
      sqliteAll(
        this.db,
        `SELECT domain_id AS key, COUNT(*) AS count FROM activity_log
         WHERE created_at >= ? AND created_at < ?
         GROUP BY domain_id ORDER BY domain_id`,
        [toSQLiteTimestamp(range.since), toSQLiteTimestamp(range.until)],
        GroupCountRow
      )
    );
    return Object.fromEntries(rows.map((r) => [r.key, r.count]));
  }

  // ============================================================
  // Knowledge units
  // ============================================================

  async getUnit(unitId: string): Promise<KnowledgeUnit | null> {
    await this.initialize();
    const row = this.guard('get unit', () =>
      sqliteGet(this.db, `SELECT * FROM knowledge_units WHERE id = ?`, [unitId], UnitRow)
    );
    return row ? this.rowToUnit(row) : null;
  }

  async findActiveUnit(domainId: string, taskId: string): Promise<KnowledgeUnit | null> {
    await this.initialize();
    const row = this.guard('find unit', () =>
      sqliteGet(
        this.db,
        `SELECT * FROM knowledge_units WHERE domain_id = ? AND task_id = ? AND archived = 0`,
        [domainId, taskId],
        UnitRow
      )
    );
    return row ? this.rowToUnit(row) : null;
  }

  async hasAbsorbedFingerprint(domainId: string, taskId: string, fingerprint: string): Promise<boolean> {
    await this.initialize();
    const row = this.guard('check fingerprint', () =>
      sqliteGet(
        this.db,
        `SELECT COUNT(*) AS count FROM unit_fingerprints
         WHERE domain_id = ? AND task_id = ? AND fingerprint = ?`,
        [domainId, taskId, fingerprint],
        CountRow
      )
    );
    return (row?.count ?? 0) > 0;
  }

  async listFlaggedUnits(domainId?: string): Promise<KnowledgeUnit[]> {
    await this.initialize();

    const rows = this.guard('list flagged', () =>
      domainId
        ? sqliteAll(
            this.db,
            `SELECT * FROM knowledge_units
             WHERE flagged = 1 AND archived = 0 AND domain_id = ?
             ORDER BY updated_at ASC, id ASC`,
            [domainId],
            UnitRow
          )
        : sqliteAll(
            this.db,
            `SELECT * FROM knowledge_units
             WHERE flagged = 1 AND archived = 0
             ORDER BY updated_at ASC, id ASC`,
            [],
            UnitRow
          )
    );
    return rows.map((row) => this.rowToUnit(row));
  }

  async countUnitsByDomain(): Promise<Record<string, number>> {
    await this.initialize();
    const rows = this.guard('count units', () =>
      sqliteAll(
        this.db,
        `SELECT domain_id AS key, COUNT(*) AS count FROM knowledge_units
         WHERE archived = 0
         GROUP BY domain_id ORDER BY domain_id`,
        [],
        GroupCountRow
      )
    );
    return Object.fromEntries(rows.map((r) => [r.key, r.count]));
  }

  async countUnitsCreated(range: TimeRange): Promise<number> {
    return this.count(
      `SELECT COUNT(*) AS count FROM knowledge_units WHERE created_at >= ? AND created_at < ?`,
      [toSQLiteTimestamp(range.since), toSQLiteTimestamp(range.until)]
    );
  }

  async countPendingUpdated(range: TimeRange): Promise<number> {
    return this.count(
      `SELECT COUNT(*) AS count FROM knowledge_units
       WHERE flagged = 1 AND archived = 0 AND updated_at >= ? AND updated_at < ?`,
      [toSQLiteTimestamp(range.since), toSQLiteTimestamp(range.until)]
    );
  }

  async countPendingApprovals(): Promise<number> {
    return this.count(`SELECT COUNT(*) AS count FROM knowledge_units WHERE flagged = 1 AND archived = 0`, []);
  }

  async applyConsolidation(writes: PlannedWrite[], at: Date): Promise<void> {
    await this.initialize();
    const ts = toSQLiteTimestamp(at);

    const insertUnit = this.db.prepare(`
      INSERT INTO knowledge_units
        (id, domain_id, task_id, content, version, fingerprint, flagged, archived, created_at, updated_at)
      VALUES (?, ?, ?, ?, 1, ?, 1, 0, ?, ?)
    `);
    // Guarded on version and archived so a concurrent rejection aborts the batch
    const updateUnit = this.db.prepare(`
      UPDATE knowledge_units
      SET content = ?, version = version + 1, fingerprint = ?, flagged = 1, updated_at = ?
      WHERE id = ? AND version = ? AND archived = 0
    `);
    const insertFingerprint = this.db.prepare(`
      INSERT INTO unit_fingerprints (domain_id, task_id, fingerprint, unit_id, absorbed_at)
      VALUES (?, ?, ?, ?, ?)
    `);

    const apply = this.db.transaction((batch: PlannedWrite[]) => {
      for (const write of batch) {
        if (write.kind === 'create') {
          insertUnit.run(write.unitId, write.domainId, write.taskId, write.content, write.fingerprint, ts, ts);
        } else {
          const result = updateUnit.run(write.content, write.fingerprint, ts, write.unitId, write.expectedVersion);
          if (result.changes !== 1) {
            throw new ConflictError(`Unit ${write.unitId} changed during consolidation`, {
              unitId: write.unitId,
              expectedVersion: write.expectedVersion
            });
          }
        }
        for (const line of write.evidence) {
          insertFingerprint.run(write.domainId, write.taskId, line, write.unitId, ts);
        }
      }
    });

    try {
      apply(writes);
    } catch (error) {
      if (error instanceof KnowledgeRouterError) throw error;
      if (isUniqueViolation(error)) {
        throw new ConflictError('Knowledge unit already exists for this evidence', {
          cause: error instanceof Error ? error.message : String(error)
        });
      }
      rethrowStoreError(error, 'apply consolidation');
    }
  }

  // ============================================================
  // Approval decisions
  // ============================================================

  async decideUnit(
    unitId: string,
    decision: DecisionValue,
    at: Date,
    reviewer?: string
  ): Promise<ApprovalDecision> {
    await this.initialize();

    const record: ApprovalDecision = {
      id: randomUUID(),
      unitId,
      unitVersion: 0,
      decision,
      reviewer,
      decidedAt: at
    };

    const decide = this.db.transaction(() => {
      const unit = sqliteGet(this.db, `SELECT * FROM knowledge_units WHERE id = ?`, [unitId], UnitRow);
      if (!unit) {
        throw new NotFoundError(`Knowledge unit ${unitId} not found`, { unitId });
      }

      const changes = sqliteRun(
        this.db,
        `UPDATE knowledge_units SET flagged = 0, archived = ?
         WHERE id = ? AND flagged = 1 AND archived = 0`,
        [decision === 'rejected' ? 1 : 0, unitId]
      );
      if (changes !== 1) {
        throw new ConflictError(`Knowledge unit ${unitId} is not awaiting a decision`, { unitId });
      }

      record.unitVersion = unit.version;
      sqliteRun(
        this.db,
        `INSERT INTO approval_decisions (id, unit_id, unit_version, decision, reviewer, decided_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [record.id, unitId, unit.version, decision, reviewer ?? null, toSQLiteTimestamp(at)]
      );
    });

    this.guard('decide unit', () => decide());
    return record;
  }

  async listDecisions(unitId: string): Promise<ApprovalDecision[]> {
    await this.initialize();
    const rows = this.guard('list decisions', () =>
      sqliteAll(
        this.db,
        `SELECT * FROM approval_decisions WHERE unit_id = ? ORDER BY decided_at ASC, id ASC`,
        [unitId],
        DecisionRow
      )
    );
    return rows.map((row) => ({
      id: row.id,
      unitId: row.unit_id,
      unitVersion: row.unit_version,
      decision: row.decision,
      reviewer: row.reviewer ?? undefined,
      decidedAt: toDateFromSQLite(row.decided_at)
    }));
  }

  async countDecisions(range: TimeRange): Promise<Record<DecisionValue, number>> {
    await this.initialize();
    const rows = this.guard('count decisions', () =>
      sqliteAll(
        this.db,
        `SELECT decision AS key, COUNT(*) AS count FROM approval_decisions
         WHERE decided_at >= ? AND decided_at < ?
         GROUP BY decision`,
        [toSQLiteTimestamp(range.since), toSQLiteTimestamp(range.until)],
        GroupCountRow
      )
    );

    const counts: Record<DecisionValue, number> = { approved: 0, rejected: 0 };
    for (const row of rows) {
      const key = DecisionValueSchema.safeParse(row.key);
      if (key.success) counts[key.data] = row.count;
    }
    return counts;
  }

  // ============================================================
  // Runs and leases
  // ============================================================

  /**
   * Take the lease if nobody holds it or the previous holder's lease expired
   */
  async tryAcquireLock(jobName: string, holder: string, now: Date, ttlMs: number): Promise<boolean> {
    await this.initialize();
    const nowTs = toSQLiteTimestamp(now);
    const expiresTs = toSQLiteTimestamp(new Date(now.getTime() + ttlMs));

    const changes = this.guard('acquire lock', () =>
      sqliteRun(
        this.db,
        `INSERT INTO job_locks (job_name, holder, acquired_at, expires_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(job_name) DO UPDATE SET
           holder = excluded.holder,
           acquired_at = excluded.acquired_at,
           expires_at = excluded.expires_at
         WHERE job_locks.expires_at <= ?`,
        [jobName, holder, nowTs, expiresTs, nowTs]
      )
    );
    return changes === 1;
  }

  async releaseLock(jobName: string, holder: string): Promise<void> {
    await this.initialize();
    this.guard('release lock', () =>
      sqliteRun(this.db, `DELETE FROM job_locks WHERE job_name = ? AND holder = ?`, [jobName, holder])
    );
  }

  async startRun(run: Omit<ConsolidationRun, 'status' | 'summary' | 'error' | 'finishedAt'>): Promise<void> {
    await this.initialize();
    this.guard('start run', () =>
      sqliteRun(
        this.db,
        `INSERT INTO consolidation_runs (id, job_name, since, until, status, started_at)
         VALUES (?, ?, ?, ?, 'running', ?)`,
        [run.id, run.jobName, toSQLiteTimestamp(run.since), toSQLiteTimestamp(run.until), toSQLiteTimestamp(run.startedAt)]
      )
    );
  }

  async finishRun(runId: string, completion: RunCompletion): Promise<void> {
    await this.initialize();
    this.guard('finish run', () =>
      sqliteRun(
        this.db,
        `UPDATE consolidation_runs SET status = ?, summary_json = ?, error = ?, finished_at = ? WHERE id = ?`,
        [
          completion.status,
          completion.summary ? JSON.stringify(completion.summary) : null,
          completion.error ?? null,
          toSQLiteTimestamp(completion.finishedAt),
          runId
        ]
      )
    );
  }

  async getLastRun(jobName: string, status?: RunStatus): Promise<ConsolidationRun | null> {
    await this.initialize();
    const row = this.guard('get last run', () =>
      status
        ? sqliteGet(
            this.db,
            `SELECT * FROM consolidation_runs WHERE job_name = ? AND status = ?
             ORDER BY started_at DESC, rowid DESC LIMIT 1`,
            [jobName, status],
            RunRow
          )
        : sqliteGet(
            this.db,
            `SELECT * FROM consolidation_runs WHERE job_name = ?
             ORDER BY started_at DESC, rowid DESC LIMIT 1`,
            [jobName],
            RunRow
          )
    );
    return row ? this.rowToRun(row) : null;
  }

  // ============================================================
  // Helpers
  // ============================================================

  private async count(sql: string, params: string[]): Promise<number> {
    await this.initialize();
    const row = this.guard('count', () => sqliteGet(this.db, sql, params, CountRow));
    return row?.count ?? 0;
  }

  /**
   * Run a storage operation, converting SQLite availability errors
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      rethrowStoreError(error, operation);
    }
  }

  private rowToUnit(row: z.infer<typeof UnitRow>): KnowledgeUnit {
    return {
      id: row.id,
      domainId: row.domain_id,
      taskId: row.task_id,
      content: row.content,
      version: row.version,
      fingerprint: row.fingerprint,
      flagged: row.flagged === 1,
      archived: row.archived === 1,
      createdAt: toDateFromSQLite(row.created_at),
      updatedAt: toDateFromSQLite(row.updated_at)
    };
  }

  private rowToRun(row: z.infer<typeof RunRow>): ConsolidationRun {
    let summary: ConsolidationSummary | undefined;
    if (row.summary_json) {
      summary = parseStoredSummary(row.summary_json);
    }

    return {
      id: row.id,
      jobName: row.job_name,
      since: toDateFromSQLite(row.since),
      until: toDateFromSQLite(row.until),
      status: row.status,
      summary,
      error: row.error ?? undefined,
      startedAt: toDateFromSQLite(row.started_at),
      finishedAt: row.finished_at ? toDateFromSQLite(row.finished_at) : undefined
    };
  }
}
