import { describe, expect, it } from 'vitest';

import { rank } from '../src/ranking/rank.js';
import { createCommissionWeights, topCategoriesByWeight } from '../src/ranking/weights.js';
import { candidate } from './fakes.js';

const weights = createCommissionWeights({
  defaultCommissionWeight: 2,
  categories: [
    { id: 'lux', name: 'Luxury Beauty', commissionWeight: 10 },
    { id: 'home', name: 'Home & Kitchen', commissionWeight: 4 },
    { id: 'toys', name: 'Toys & Games', commissionWeight: 3 },
  ],
});

const early = new Date('2026-03-01T10:00:00.000Z');
const late = new Date('2026-03-01T11:00:00.000Z');

describe('rank', () => {
  it('scores by commission weight times discount', () => {
    const out = rank(
      [
        candidate({ productId: 'a', categoryId: 'home', discountPercent: 30 }),
        candidate({ productId: 'b', categoryId: 'lux', discountPercent: 20 }),
        candidate({ productId: 'c', categoryId: 'unlisted', discountPercent: 50 }),
      ],
      weights,
    );
    expect(out.map((c) => [c.productId, c.score])).toEqual([
      ['b', 200],
      ['a', 120],
      ['c', 100],
    ]);
    expect(out[2]?.commissionWeight).toBe(2);
  });

  it('breaks ties by discount, then detection time, then product id', () => {
    const input = [
      candidate({ productId: 'z', categoryId: 'home', discountPercent: 30, detectedAt: early }),
      // same score (120), lower discount
      candidate({ productId: 'y', categoryId: 'lux', discountPercent: 12, detectedAt: early }),
      candidate({ productId: 'x', categoryId: 'home', discountPercent: 30, detectedAt: late }),
      candidate({ productId: 'w', categoryId: 'home', discountPercent: 30, detectedAt: early }),
    ];
    expect(rank(input, weights).map((c) => c.productId)).toEqual(['w', 'z', 'x', 'y']);
  });

  it('is independent of input order', () => {
    const input = Array.from({ length: 12 }, (_, i) =>
      candidate({ productId: `p${String(i).padStart(2, '0')}`, categoryId: i % 2 ? 'home' : 'toys', discountPercent: 20 + (i % 3) }),
    );
    const forward = rank(input, weights).map((c) => c.productId);
    const backward = rank([...input].reverse(), weights).map((c) => c.productId);
    expect(backward).toEqual(forward);
  });

  it('truncates to the batch size', () => {
    const input = Array.from({ length: 12 }, (_, i) => candidate({ productId: `p${String(i).padStart(2, '0')}` }));
    const out = rank(input, weights, 10);
    expect(out).toHaveLength(10);
    expect(out[0]?.productId).toBe('p00');
    expect(out[9]?.productId).toBe('p09');
  });
});

describe('topCategoriesByWeight', () => {
  it('keeps the K highest-weighted categories, ties in configured order', () => {
    expect(topCategoriesByWeight(['toys', 'unlisted', 'home', 'lux', 'home'], weights, 3)).toEqual(['lux', 'home', 'toys']);
  });
});

describe('default category catalog', () => {
  it('loads the bundled commission weights', () => {
    const bundled = createCommissionWeights();
    expect(bundled.weightOf('11055981')).toBe(10);
    expect(bundled.weightOf('172282')).toBe(3);
    expect(bundled.weightOf('999')).toBe(2);
    expect(bundled.knownCategoryIds()).toHaveLength(10);
    expect(Object.keys(bundled).sort()).toEqual(['knownCategoryIds', 'weightOf']);
  });
});
