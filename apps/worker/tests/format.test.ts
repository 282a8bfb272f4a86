import { describe, expect, it } from 'vitest';

import { cleanTitle, formatDealPost, postLength } from '../src/posting/format.js';
import { candidate } from './fakes.js';

const link = { productBaseUrl: 'https://shop.example/dp/', associateTag: 'test-tag' };
const midnight = new Date('2026-03-01T00:30:00.000Z');

describe('cleanTitle', () => {
  it('strips bracketed text and the storefront prefix', () => {
    expect(cleanTitle('Amazon.com: Hydrating Face Serum (2 Pack) [New Formula]  30ml')).toBe('Hydrating Face Serum 30ml');
  });

  it('caps titles at 100 characters', () => {
    const out = cleanTitle('word '.repeat(40));
    expect(postLength(out)).toBeLessThanOrEqual(100);
    expect(out.endsWith('...')).toBe(true);
  });
});

describe('formatDealPost', () => {
  it('renders prices, savings and the tagged link', () => {
    expect(formatDealPost(candidate(), link, { now: midnight })).toBe(
      '🔥 40% OFF DEAL!\n\nStainless Steel Water Bottle 32oz\n\nWas: $50.00\nNow: $30.00\nSave: $20.00\n\n' +
        'https://shop.example/dp/P-1?tag=test-tag\n\n#Deals #Sale #Discount',
    );
  });

  it('links the plain product page without an associate tag', () => {
    const text = formatDealPost(candidate(), { productBaseUrl: 'https://shop.example/dp/' }, { now: midnight });
    expect(text.split('\n')[8]).toBe('https://shop.example/dp/P-1');
  });

  it('rotates niche templates by UTC hour', () => {
    const text = formatDealPost(candidate(), link, { niche: 'beauty', now: new Date('2026-03-01T01:00:00.000Z') });
    expect(text.split('\n')[0]).toBe('💄 GLOW UP FOR LESS 💄');
  });

  it('shortens only the title to fit the length cap', () => {
    const c = candidate({ title: 'A'.repeat(100), productUrl: `https://shop.example/p/${'x'.repeat(150)}` });
    const text = formatDealPost(c, link, { now: midnight });
    expect(postLength(text)).toBe(280);
    expect(text.split('\n')[2]).toBe(`${'A'.repeat(10)}...`);
  });
});
