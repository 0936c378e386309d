/**
 * Approval Queue
 * flagged → approved (flagged=false) | rejected (archived, kept for dedup)
 */

import type { ApprovalDecision, KnowledgeDomain, KnowledgeUnit } from './types.js';
import { DecisionValueSchema } from './types.js';
import type { KnowledgeRepository } from './knowledge-repository.js';
import { ValidationError } from './errors.js';
import type { Clock } from './consolidation-job.js';

export class ApprovalQueue {
  private readonly domainIds: Set<string>;

  constructor(
    private repository: KnowledgeRepository,
    domains: KnowledgeDomain[],
    private now: Clock = () => new Date()
  ) {
    this.domainIds = new Set(domains.map((d) => d.id));
  }

  /**
   * Units awaiting review, oldest change first
   */
  async listFlagged(domainId?: string): Promise<KnowledgeUnit[]> {
    if (domainId !== undefined && !this.domainIds.has(domainId)) {
      throw new ValidationError(`Unknown domain "${domainId}"`, { domainId });
    }
    return this.repository.listFlaggedUnits(domainId);
  }

  /**
   * Record a decision. Only one decision can win for a flagged unit; a later
   * or concurrent one receives ConflictError.
   */
  async decide(unitId: string, decision: unknown, reviewer?: string): Promise<ApprovalDecision> {
    const parsed = DecisionValueSchema.safeParse(decision);
    if (!parsed.success) {
      throw new ValidationError(`Invalid decision ${JSON.stringify(decision)}; expected "approved" or "rejected"`, {
        decision
      });
    }

    const record = await this.repository.decideUnit(unitId, parsed.data, this.now(), reviewer);
    console.log(`[ApprovalQueue] unit ${unitId} v${record.unitVersion} ${record.decision}${reviewer ? ` by ${reviewer}` : ''}`);
    return record;
  }

  async getUnit(unitId: string): Promise<KnowledgeUnit | null> {
    return this.repository.getUnit(unitId);
  }

  async history(unitId: string): Promise<ApprovalDecision[]> {
    return this.repository.listDecisions(unitId);
  }
}
