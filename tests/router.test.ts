import { describe, it, expect } from 'vitest';

import { Router } from '../src/core/router.js';
import { ValidationError } from '../src/core/errors.js';
import type { DomainScore } from '../src/core/types.js';

const router = new Router({
  highConfidenceThreshold: 0.75,
  mediumConfidenceThreshold: 0.45,
  manualReviewDomainId: 'general'
});

function score(domainId: string, normalizedScore: number): DomainScore {
  return { domainId, rawScore: normalizedScore, normalizedScore, matches: 1 };
}

const scores = [score('kubernetes', 70), score('infrastructure', 30), score('general', 0)];

describe('Router', () => {
  it('auto-assigns at or above the high threshold', () => {
    expect(router.route(scores, 0.75)).toEqual({ domainId: 'kubernetes', action: 'auto_assign' });
    expect(router.route(scores, 1)).toEqual({ domainId: 'kubernetes', action: 'auto_assign' });
  });

  it('holds between the medium and high thresholds', () => {
    expect(router.route(scores, 0.45)).toEqual({ domainId: 'kubernetes', action: 'hold' });
    expect(router.route(scores, 0.7499)).toEqual({ domainId: 'kubernetes', action: 'hold' });
  });

  it('sends low confidence to the manual review domain', () => {
    expect(router.route(scores, 0.4499)).toEqual({ domainId: 'general', action: 'manual_review' });
    expect(router.route(scores, 0)).toEqual({ domainId: 'general', action: 'manual_review' });
  });

  it('keeps the top domain for manual review when no review domain is configured', () => {
    const bare = new Router({ highConfidenceThreshold: 0.75, mediumConfidenceThreshold: 0.45 });
    expect(bare.route(scores, 0.1)).toEqual({ domainId: 'kubernetes', action: 'manual_review' });
  });

  it('picks the first of tied top scores', () => {
    const tied = [score('security', 50), score('ml', 50)];
    expect(router.route(tied, 0.9).domainId).toBe('security');
  });

  it('does not rely on the input being sorted', () => {
    const unsorted = [score('general', 10), score('ml', 60), score('security', 30)];
    expect(router.route(unsorted, 0.8).domainId).toBe('ml');
  });

  it('rejects empty scores and out-of-range confidence', () => {
    expect(() => router.route([], 0.5)).toThrow(ValidationError);
    expect(() => router.route(scores, 1.2)).toThrow(ValidationError);
    expect(() => router.route(scores, -0.1)).toThrow(ValidationError);
    expect(() => router.route(scores, Number.NaN)).toThrow(ValidationError);
  });
});
