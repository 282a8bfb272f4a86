import { describe, expect, it } from 'vitest';

import { getNicheLexicon, matchNiche } from '../src/filtering/niches.js';
import { FilterChain, type FilterChainConfig } from '../src/filtering/filters.js';
import { createCommissionWeights } from '../src/ranking/weights.js';
import { candidate } from './fakes.js';

const weights = createCommissionWeights({
  defaultCommissionWeight: 2,
  categories: [
    { id: 'beauty-lux', name: 'Luxury Beauty', commissionWeight: 10 },
    { id: 'home', name: 'Home & Kitchen', commissionWeight: 4 },
  ],
});

function config(overrides: { persist?: Partial<FilterChainConfig['persist']>; niche?: boolean } = {}): FilterChainConfig {
  return {
    persist: {
      minDiscountPercent: 15,
      minPrice: 15,
      maxPrice: 300,
      minSavings: 5,
      minTitleLength: 10,
      restrictedKeywords: ['tobacco', 'weapon'],
      minRating: 3.5,
      minReviewCount: 10,
      maxPopularityRank: 100_000,
      requirePrime: false,
      requireFulfilledByPlatform: false,
      primeExemptMinWeight: 8,
      ...overrides.persist,
    },
    publish: {
      niche: overrides.niche ? { name: 'beauty', lexicon: getNicheLexicon('beauty') } : null,
      minDiscountPercent: 20,
      minPrice: 20,
      maxPrice: 200,
      minRating: 4,
      minReviewCount: 50,
      samplePriceFloor: 15,
    },
  };
}

describe('FilterChain persist tier', () => {
  const chain = new FilterChain(config(), weights);

  it('accepts a candidate with every optional field missing', () => {
    expect(chain.checkPersistTier(candidate())).toEqual({ ok: true });
  });

  it.each([
    ['discount_below_min', { currentPrice: 45, referencePrice: 50, discountPercent: 10 }],
    ['price_below_min', { currentPrice: 10, referencePrice: 20, discountPercent: 50 }],
    ['price_above_max', { currentPrice: 310, referencePrice: 500, discountPercent: 38 }],
    ['savings_below_min', { currentPrice: 17, referencePrice: 20, discountPercent: 15 }],
    ['title_too_short', { title: '  Mug   ' }],
    ['restricted_keyword', { title: 'Premium TOBACCO Pipe Cleaner Kit' }],
    ['rating_below_min', { rating: 3.2 }],
    ['reviews_below_min', { reviewCount: 4 }],
    ['popularity_rank_above_max', { popularityRank: 250_000 }],
  ])('rejects with %s', (reason, overrides) => {
    expect(chain.checkPersistTier(candidate(overrides))).toEqual({ ok: false, reason });
  });

  it('accepts values exactly on the thresholds', () => {
    const c = candidate({ currentPrice: 15, referencePrice: 20, discountPercent: 25, rating: 3.5, reviewCount: 10 });
    expect(chain.passesPersistTier(c)).toBe(true);
  });

  it('only rejects trust flags that are explicitly false', () => {
    const strict = new FilterChain(config({ persist: { requirePrime: true, requireFulfilledByPlatform: true } }), weights);
    expect(strict.passesPersistTier(candidate({ categoryId: 'home' }))).toBe(true);
    expect(strict.checkPersistTier(candidate({ categoryId: 'home', isPrime: false }))).toEqual({ ok: false, reason: 'not_prime' });
    expect(strict.checkPersistTier(candidate({ isFulfilledByPlatform: false }))).toEqual({
      ok: false,
      reason: 'not_platform_fulfilled',
    });
  });

  it('waives the prime requirement for high-commission categories', () => {
    const strict = new FilterChain(config({ persist: { requirePrime: true } }), weights);
    expect(strict.passesPersistTier(candidate({ categoryId: 'beauty-lux', isPrime: false }))).toBe(true);
  });
});

describe('FilterChain publish tier', () => {
  const lipstick = candidate({
    title: 'Matte Liquid Lipstick Long Wear',
    categoryName: 'Makeup',
    currentPrice: 24,
    referencePrice: 40,
    discountPercent: 40,
    rating: 4.6,
    reviewCount: 800,
  });

  it('passes everything through without a niche', () => {
    const chain = new FilterChain(config(), weights);
    expect(chain.passesPublishTier(candidate())).toBe(true);
  });

  it('requires a niche match and the stricter floors', () => {
    const chain = new FilterChain(config({ niche: true }), weights);
    expect(chain.checkPublishTier(lipstick)).toEqual({ ok: true });
    expect(chain.checkPublishTier(candidate({ title: 'Cordless Drill Driver Set 20V' }))).toEqual({
      ok: false,
      reason: 'not_beauty',
    });
    expect(chain.checkPublishTier({ ...lipstick, discountPercent: 18 })).toEqual({
      ok: false,
      reason: 'niche_discount_below_min',
    });
    expect(chain.checkPublishTier({ ...lipstick, currentPrice: 250 })).toEqual({ ok: false, reason: 'niche_price_above_max' });
    expect(chain.checkPublishTier({ ...lipstick, reviewCount: 12 })).toEqual({ ok: false, reason: 'niche_reviews_below_min' });
  });

  it('does not reject on missing rating or review count', () => {
    const chain = new FilterChain(config({ niche: true }), weights);
    expect(chain.passesPublishTier({ ...lipstick, rating: null, reviewCount: null })).toBe(true);
  });

  it('can be evaluated with the niche switched off per call', () => {
    const chain = new FilterChain(config({ niche: true }), weights);
    expect(chain.passesPublishTier(candidate({ title: 'Cordless Drill Driver Set 20V' }), false)).toBe(true);
  });
});

describe('matchNiche', () => {
  const lexicon = getNicheLexicon('beauty');

  it('matches by category name, title keyword or brand', () => {
    expect(matchNiche(candidate({ categoryName: 'Luxury Beauty', title: 'Gift Box Deluxe Edition' }), lexicon)).toEqual({
      matched: true,
      by: 'category',
    });
    expect(matchNiche(candidate({ categoryName: null, title: 'Volumizing Mascara Black' }), lexicon)).toEqual({
      matched: true,
      by: 'keyword',
    });
    expect(matchNiche(candidate({ categoryName: null, title: 'Gift Box Deluxe Edition', brand: 'CeraVe' }), lexicon)).toEqual({
      matched: true,
      by: 'brand',
    });
  });

  it('does not match unrelated products', () => {
    expect(matchNiche(candidate({ categoryName: 'Tools', title: 'Cordless Drill Driver Set 20V', brand: 'Acme' }), lexicon)).toEqual({
      matched: false,
    });
  });
});
