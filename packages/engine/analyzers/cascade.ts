// Ordered rating rules: the first rule whose predicate holds decides the rating

import type { Rating } from '../types/evidence.js';

export interface RatingRule<F> {
  id: string;
  rating: Rating;
  when: (facts: F) => boolean;
  logic: (facts: F) => string;
  summary: (facts: F) => string;
}

/** Neutral outcome when no rule matches; the rating is always clean */
export interface CascadeFallback<F> {
  logic: (facts: F) => string;
  summary: (facts: F) => string;
}

export interface CascadeOutcome {
  rating: Rating;
  ratingLogic: string;
  summary: string;
  /** Matching rule id, or undefined when the fallback applied */
  ruleId?: string;
}

export function applyCascade<F>(
  rules: readonly RatingRule<F>[],
  facts: F,
  fallback: CascadeFallback<F>,
): CascadeOutcome {
  const rule = rules.find((r) => r.when(facts));
  if (!rule) {
    return { rating: 'clean', ratingLogic: fallback.logic(facts), summary: fallback.summary(facts) };
  }
  return {
    rating: rule.rating,
    ratingLogic: rule.logic(facts),
    summary: rule.summary(facts),
    ruleId: rule.id,
  };
}
