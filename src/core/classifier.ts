/**
 * Keyword Classifier
 * Scores a task against every registered domain using weighted keyword
 * evidence plus complexity / priority indicators.
 *
 * Pure: no I/O, no shared mutable state, no randomness.
 */

import type {
  ClassificationResult,
  ClassifierConfig,
  DomainConfig,
  DomainScore,
  Task
} from './types.js';
import { TaskPrioritySchema } from './types.js';
import { ConfigurationError } from './errors.js';

interface CompiledDomain {
  config: DomainConfig;
  priority: number;
  primary: RegExp[];
  secondary: RegExp[];
  categories: Set<string>;
}

interface DomainEvidence {
  domain: CompiledDomain;
  rawScore: number;
  matches: number;
}

const ELEVATED_PRIORITIES = new Set(['high', 'critical']);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Match a keyword on letter/number boundaries so "pod" does not hit "tripod"
 * while punctuated keywords such as "ci/cd" still match.
 */
function compileKeyword(keyword: string): RegExp {
  const normalized = keyword.normalize('NFKC').toLowerCase().trim();
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(normalized)}(?![\\p{L}\\p{N}])`, 'gu');
}

function countMatches(text: string, patterns: RegExp[]): number {
  let total = 0;
  for (const pattern of patterns) {
    total += text.match(pattern)?.length ?? 0;
  }
  return total;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Multi-factor domain classifier
 *
 * @example
 * ```typescript
 * const classifier = new Classifier(config.domains, config.classifier);
 * const result = classifier.score({ id: 't-1', text: 'helm rollback failed for the api pod' });
 * // result.recommendedDomainId === 'kubernetes'
 * ```
 */
export class Classifier {
  private readonly domains: CompiledDomain[];
  private readonly complexity: RegExp[];
  private readonly priorityIndicators: RegExp[];

  constructor(domains: DomainConfig[], private readonly config: ClassifierConfig) {
    if (domains.length === 0) {
      throw new ConfigurationError('No domains registered');
    }

    this.domains = domains.map((domain, index) => ({
      config: domain,
      priority: index,
      primary: domain.primary.map(compileKeyword),
      secondary: domain.secondary.map(compileKeyword),
      categories: new Set([domain.id, ...domain.categories].map((c) => c.toLowerCase()))
    }));
    this.complexity = config.indicators.complexity.map(compileKeyword);
    this.priorityIndicators = config.indicators.priority.map(compileKeyword);
  }

  /**
   * Score a task. Empty text is valid and yields the equal baseline.
   */
  score(task: Task): ClassificationResult {
    const text = task.text.normalize('NFKC').toLowerCase();
    const category = this.readCategory(task);

    const complexityHits = countMatches(text, this.complexity);
    let priorityHits = countMatches(text, this.priorityIndicators);
    if (this.hasElevatedPriority(task)) {
      priorityHits += 1;
    }

    const evidence: DomainEvidence[] = this.domains.map((domain) => {
      const { weights } = domain.config;
      const primaryHits = countMatches(text, domain.primary);
      const secondaryHits = countMatches(text, domain.secondary);
      const categoryMatch = category !== null && domain.categories.has(category);

      let rawScore = weights.primary * primaryHits + weights.secondary * secondaryHits;
      if (categoryMatch) {
        rawScore += weights.category;
      }
      // Indicators only amplify a domain that already has evidence
      if (primaryHits + secondaryHits > 0 || categoryMatch) {
        rawScore += weights.complexity * complexityHits + weights.priority * priorityHits;
      }

      return { domain, rawScore, matches: primaryHits + secondaryHits };
    });

    const scores = this.normalize(evidence);
    return {
      scores,
      recommendedDomainId: scores[0].domainId,
      confidence: this.confidence(scores)
    };
  }

  private normalize(evidence: DomainEvidence[]): DomainScore[] {
    const total = evidence.reduce((acc, e) => acc + e.rawScore, 0);
    const baseline = 100 / evidence.length;

    return evidence
      .map((e) => ({
        domainId: e.domain.config.id,
        rawScore: e.rawScore,
        normalizedScore: total > 0 ? (e.rawScore / total) * 100 : baseline,
        matches: e.matches,
        priority: e.domain.priority
      }))
      .sort((a, b) => b.normalizedScore - a.normalizedScore || a.priority - b.priority)
      .map(({ priority: _priority, ...score }) => score);
  }

  /**
   * Confidence from top share, margin over the runner-up and keyword support
   */
  private confidence(scores: DomainScore[]): number {
    const top = scores[0];
    if (top.rawScore === 0) return 0;

    const weights = this.config.confidence;
    const topShare = top.normalizedScore / 100;
    const margin = (top.normalizedScore - (scores[1]?.normalizedScore ?? 0)) / 100;
    const support = Math.min(1, top.matches / weights.supportSaturation);

    const value = weights.top * topShare + weights.margin * margin + weights.support * support;
    return Math.round(clamp01(value) * 10000) / 10000;
  }

  private readCategory(task: Task): string | null {
    const category = task.context?.category;
    return typeof category === 'string' && category.trim().length > 0
      ? category.trim().toLowerCase()
      : null;
  }

  private hasElevatedPriority(task: Task): boolean {
    const parsed = TaskPrioritySchema.safeParse(
      typeof task.context?.priority === 'string' ? task.context.priority.toLowerCase() : task.context?.priority
    );
    return parsed.success && ELEVATED_PRIORITIES.has(parsed.data);
  }
}

/**
 * One-shot scoring against a domain list
 */
export function scoreTask(task: Task, domains: DomainConfig[], config: ClassifierConfig): ClassificationResult {
  return new Classifier(domains, config).score(task);
}
