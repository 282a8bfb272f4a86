import type { Candidate, ServerEnv } from '@dealrelay/shared';

import { loadRestrictedKeywords, type NicheLexicon } from '../config/data.js';
import type { CommissionWeights } from '../ranking/weights.js';
import { getNicheLexicon, matchNiche } from './niches.js';

export type FilterVerdict = { ok: true } | { ok: false; reason: string };

export type PersistTierConfig = {
  minDiscountPercent: number;
  minPrice: number;
  maxPrice: number;
  minSavings: number;
  minTitleLength: number;
  restrictedKeywords: string[];
  minRating: number;
  minReviewCount: number;
  maxPopularityRank: number;
  requirePrime: boolean;
  requireFulfilledByPlatform: boolean;
  /** Categories at or above this commission weight skip the prime requirement. */
  primeExemptMinWeight: number;
};

export type PublishTierConfig = {
  niche: { name: string; lexicon: NicheLexicon } | null;
  minDiscountPercent: number;
  minPrice: number;
  maxPrice: number;
  minRating: number;
  minReviewCount: number;
  samplePriceFloor: number;
};

export type FilterChainConfig = {
  persist: PersistTierConfig;
  publish: PublishTierConfig;
};

export function filterConfigFromEnv(env: ServerEnv): FilterChainConfig {
  return {
    persist: {
      minDiscountPercent: env.MIN_DISCOUNT_PERCENT,
      minPrice: env.MIN_PRODUCT_PRICE,
      maxPrice: env.MAX_PRODUCT_PRICE,
      minSavings: env.MIN_PRICE_DROP,
      minTitleLength: 10,
      restrictedKeywords: loadRestrictedKeywords(),
      minRating: env.MIN_REVIEW_RATING,
      minReviewCount: env.MIN_REVIEW_COUNT,
      maxPopularityRank: env.MAX_SALES_RANK,
      requirePrime: env.REQUIRE_PRIME,
      requireFulfilledByPlatform: env.REQUIRE_FULFILLED_BY_PLATFORM,
      primeExemptMinWeight: 8,
    },
    publish: {
      niche: env.PUBLISH_NICHE ? { name: env.PUBLISH_NICHE, lexicon: getNicheLexicon(env.PUBLISH_NICHE) } : null,
      minDiscountPercent: env.NICHE_MIN_DISCOUNT,
      minPrice: env.NICHE_MIN_PRICE,
      maxPrice: env.NICHE_MAX_PRICE,
      minRating: env.NICHE_MIN_RATING,
      minReviewCount: env.NICHE_MIN_REVIEWS,
      samplePriceFloor: env.NICHE_SAMPLE_PRICE_FLOOR,
    },
  };
}

function roundCents(n: number) {
  return Math.round(n * 100) / 100;
}

const pass: FilterVerdict = { ok: true };
const reject = (reason: string): FilterVerdict => ({ ok: false, reason });

/**
 * Two-tier predicate set. The persist tier decides what is worth storing; the stricter
 * publish tier decides what may be posted. Optional fields that are missing never reject.
 */
export class FilterChain {
  constructor(
    readonly config: FilterChainConfig,
    private readonly weights: CommissionWeights,
  ) {}

  checkPersistTier(c: Candidate): FilterVerdict {
    const p = this.config.persist;

    if (c.discountPercent < p.minDiscountPercent) return reject('discount_below_min');
    if (c.currentPrice < p.minPrice) return reject('price_below_min');
    if (c.currentPrice > p.maxPrice) return reject('price_above_max');

    const savings = c.referencePrice != null ? roundCents(c.referencePrice - c.currentPrice) : 0;
    if (savings < p.minSavings) return reject('savings_below_min');

    if (c.title.trim().length < p.minTitleLength) return reject('title_too_short');
    const title = c.title.toLowerCase();
    if (p.restrictedKeywords.some((kw) => title.includes(kw.toLowerCase()))) return reject('restricted_keyword');

    if (c.rating != null && c.rating < p.minRating) return reject('rating_below_min');
    if (c.reviewCount != null && c.reviewCount < p.minReviewCount) return reject('reviews_below_min');
    if (c.popularityRank != null && c.popularityRank > p.maxPopularityRank) return reject('popularity_rank_above_max');

    if (p.requirePrime && c.isPrime === false && this.weights.weightOf(c.categoryId) < p.primeExemptMinWeight) {
      return reject('not_prime');
    }
    if (p.requireFulfilledByPlatform && c.isFulfilledByPlatform === false) return reject('not_platform_fulfilled');

    return pass;
  }

  checkPublishTier(c: Candidate, nicheMode = this.config.publish.niche != null): FilterVerdict {
    const p = this.config.publish;
    if (!nicheMode || !p.niche) return pass;

    if (!matchNiche(c, p.niche.lexicon).matched) return reject(`not_${p.niche.name}`);
    if (c.discountPercent < p.minDiscountPercent) return reject('niche_discount_below_min');
    if (c.currentPrice < p.minPrice) return reject('niche_price_below_min');
    if (c.currentPrice > p.maxPrice) return reject('niche_price_above_max');
    if (c.rating != null && c.rating < p.minRating) return reject('niche_rating_below_min');
    if (c.reviewCount != null && c.reviewCount < p.minReviewCount) return reject('niche_reviews_below_min');
    if (c.currentPrice < p.samplePriceFloor) return reject('below_sample_price_floor');

    return pass;
  }

  passesPersistTier(c: Candidate): boolean {
    return this.checkPersistTier(c).ok;
  }

  passesPublishTier(c: Candidate, nicheMode?: boolean): boolean {
    return this.checkPublishTier(c, nicheMode).ok;
  }
}
