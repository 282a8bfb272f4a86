import { describe, expect, it } from 'vitest';

import { computeDiscountPercent, mergeRaw, normalizeCandidate } from '../src/pricing/normalize.js';

const detectedAt = new Date('2026-03-01T12:00:00.000Z');

describe('computeDiscountPercent', () => {
  it('derives the discount from the two prices', () => {
    expect(computeDiscountPercent(30, 50)).toBe(40);
  });

  it('is 0 without a usable reference price', () => {
    expect(computeDiscountPercent(30, null)).toBe(0);
    expect(computeDiscountPercent(30, 0)).toBe(0);
  });

  it('clamps price increases at 0', () => {
    expect(computeDiscountPercent(60, 50)).toBe(0);
  });
});

describe('normalizeCandidate', () => {
  it('builds a candidate and ignores the upstream discount figure', () => {
    const res = normalizeCandidate(
      {
        asin: ' B00TEST01 ',
        title: '  Ceramic   Pour-Over Coffee Set ',
        currentPrice: '24.5',
        referencePrice: 49,
        discountPercent: 99,
        categoryId: 1055398,
        salesRank: 1200,
        rating: 44,
        reviewCount: 310,
        isPrime: true,
        isFba: false,
        brand: '',
      },
      { detectedAt },
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.candidate).toEqual({
      productId: 'B00TEST01',
      title: 'Ceramic Pour-Over Coffee Set',
      currentPrice: 24.5,
      referencePrice: 49,
      discountPercent: 50,
      categoryId: '1055398',
      categoryName: null,
      brand: null,
      popularityRank: 1200,
      rating: 4.4,
      reviewCount: 310,
      isPrime: true,
      isFulfilledByPlatform: false,
      imageUrl: null,
      productUrl: null,
      detectedAt,
    });
  });

  it('falls back to the category being fetched', () => {
    const res = normalizeCandidate({ productId: 'A1', title: 'Desk Lamp with USB Port', currentPrice: 20 }, {
      categoryId: '172282',
      detectedAt,
    });
    expect(res.ok && res.candidate.categoryId).toBe('172282');
  });

  it('keeps optional fields null when they are missing', () => {
    const res = normalizeCandidate({ productId: 'A2', title: 'Desk Lamp with USB Port', currentPrice: 20 }, {
      categoryId: '172282',
      detectedAt,
    });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.candidate.referencePrice).toBeNull();
    expect(res.candidate.discountPercent).toBe(0);
    expect(res.candidate.rating).toBeNull();
    expect(res.candidate.reviewCount).toBeNull();
    expect(res.candidate.popularityRank).toBeNull();
  });

  it('reads a zero rating as unrated', () => {
    const res = normalizeCandidate(
      { productId: 'A3', title: 'Desk Lamp with USB Port', currentPrice: 20, rating: 0, reviewCount: 0 },
      { categoryId: '172282', detectedAt },
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.candidate.rating).toBeNull();
    expect(res.candidate.reviewCount).toBe(0);
  });

  it.each([
    ['productId', { title: 'Desk Lamp with USB Port', currentPrice: 20, categoryId: '1' }],
    ['title', { productId: 'A3', title: '   ', currentPrice: 20, categoryId: '1' }],
    ['currentPrice', { productId: 'A3', title: 'Desk Lamp with USB Port', currentPrice: 0, categoryId: '1' }],
    ['categoryId', { productId: 'A3', title: 'Desk Lamp with USB Port', currentPrice: 20 }],
  ])('rejects a record without %s', (field, raw) => {
    const res = normalizeCandidate(raw, { detectedAt });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe('validation_error');
    expect(res.error.field).toBe(field);
  });

  it('rejects a payload that is not an object', () => {
    const res = normalizeCandidate('not a record', { detectedAt });
    expect(res.ok).toBe(false);
  });
});

describe('mergeRaw', () => {
  it('fills only the fields the listing lacks', () => {
    const merged = mergeRaw(
      { productId: 'A1', title: 'Listing title', currentPrice: 20, rating: null },
      { productId: 'OTHER', title: 'Detail title', rating: 4.5, reviewCount: 80 },
    );
    expect(merged).toEqual({ productId: 'A1', title: 'Listing title', currentPrice: 20, rating: 4.5, reviewCount: 80 });
  });
});
