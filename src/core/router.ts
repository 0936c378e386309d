/**
 * Disposition Router
 * Thresholds: auto_assign (≥ high), hold (≥ medium), manual_review (< medium)
 */

import type { Disposition, DispositionAction, DomainScore, RouterConfig } from './types.js';
import { ValidationError } from './errors.js';

export class Router {
  constructor(private readonly config: RouterConfig) {}

  /**
   * Decide what to do with a scored task.
   * Identical input always yields the identical disposition.
   */
  route(scores: DomainScore[], confidence: number): Disposition {
    if (scores.length === 0) {
      throw new ValidationError('Cannot route without domain scores');
    }
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new ValidationError(`Confidence must be within [0, 1], got ${confidence}`);
    }

    // First maximum wins, so ties keep the caller's (registration) order
    let top = scores[0];
    for (const score of scores) {
      if (score.normalizedScore > top.normalizedScore) {
        top = score;
      }
    }

    const action = this.classifyAction(confidence);
    const domainId = action === 'manual_review' && this.config.manualReviewDomainId
      ? this.config.manualReviewDomainId
      : top.domainId;

    return { domainId, action };
  }

  classifyAction(confidence: number): DispositionAction {
    const { highConfidenceThreshold, mediumConfidenceThreshold } = this.config;

    if (confidence >= highConfidenceThreshold) {
      return 'auto_assign';
    }
    if (confidence >= mediumConfidenceThreshold) {
      return 'hold';
    }
    return 'manual_review';
  }
}
