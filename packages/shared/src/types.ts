// Shared, app-agnostic domain types used by the worker and the persistence package.
// Keep these "business domain" focused and avoid importing runtime dependencies here.

/** A detected price drop for one product, after validation. */
export interface Candidate {
  productId: string;
  title: string;
  currentPrice: number; // decimal units
  referencePrice: number | null; // pre-drop baseline, e.g. 30-day average
  discountPercent: number; // always derived from the two prices
  categoryId: string;
  categoryName: string | null;
  brand: string | null;
  popularityRank: number | null; // lower = more popular; null = unknown
  rating: number | null; // 0-5
  reviewCount: number | null;
  isPrime: boolean | null;
  isFulfilledByPlatform: boolean | null;
  imageUrl: string | null;
  productUrl: string | null;
  detectedAt: Date;
}

export interface ScoredCandidate extends Candidate {
  score: number;
  commissionWeight: number;
}

export interface DedupRecord {
  productId: string;
  lastDetectedAt: Date;
  lastPublishedAt: Date | null;
  publishedPostId: string | null;
}

export type CycleState =
  | 'FETCHING'
  | 'PERSIST_FILTERING'
  | 'PUBLISH_FILTERING'
  | 'RANKING'
  | 'PUBLISHING'
  | 'DONE'
  | 'FAILED';

export interface CycleStats {
  cycleId: string;
  state: CycleState;
  startedAt: string; // ISO
  finishedAt: string; // ISO
  elapsedMs: number;
  categoriesChecked: number;
  categoriesFailed: number;
  fetched: number;
  invalid: number;
  persisted: number;
  filteredOut: number;
  publishConsidered: number;
  published: number;
  deferred: number;
  errors: number;
  upstreamCalls: number;
  quotaRemaining: number | null;
  failureReason: string | null;
}
