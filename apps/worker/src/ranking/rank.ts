import type { Candidate, ScoredCandidate } from '@dealrelay/shared';

import type { CommissionWeights } from './weights.js';

export function scoreCandidate(c: Candidate, weights: CommissionWeights): ScoredCandidate {
  const commissionWeight = weights.weightOf(c.categoryId);
  return { ...c, commissionWeight, score: commissionWeight * c.discountPercent };
}

/** Total order: score desc, discount desc, earliest detection, then product id. */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.discountPercent !== b.discountPercent) return b.discountPercent - a.discountPercent;
  const ta = a.detectedAt.getTime();
  const tb = b.detectedAt.getTime();
  if (ta !== tb) return ta - tb;
  return a.productId < b.productId ? -1 : a.productId > b.productId ? 1 : 0;
}

/**
 * Score and order candidates for publishing. Output depends only on the set of inputs,
 * never on their order.
 */
export function rank(candidates: Candidate[], weights: CommissionWeights, batchSize?: number): ScoredCandidate[] {
  const sorted = candidates.map((c) => scoreCandidate(c, weights)).sort(compareScored);
  return batchSize == null ? sorted : sorted.slice(0, Math.max(0, Math.trunc(batchSize)));
}
