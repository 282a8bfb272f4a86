import { describe, expect, it } from 'vitest';

import { UpstreamError } from '../src/errors.js';
import { RateBudgetedFetcher } from '../src/pricing/fetcher.js';
import { createManualClock } from '../src/utils/time.js';
import { createFakePriceSource } from './fakes.js';

function setup(opts: { tokensPerMinute: number; buffer: number; minIntervalMs?: number }) {
  const clock = createManualClock(0);
  const issuedAt: number[] = [];
  const source = createFakePriceSource({
    listings: { '*': [] },
    quota: 42,
    onList: async () => {
      issuedAt.push(clock.now());
    },
  });
  const fetcher = new RateBudgetedFetcher(source, { ...opts, clock });
  return { clock, issuedAt, source, fetcher };
}

describe('RateBudgetedFetcher', () => {
  it('never issues more than tokensPerMinute - buffer calls per window', async () => {
    const { fetcher, issuedAt, clock } = setup({ tokensPerMinute: 20, buffer: 5, minIntervalMs: 0 });

    for (let i = 0; i < 20; i++) await fetcher.listPriceDrops({});

    expect(fetcher.callsPerWindow).toBe(15);
    expect(issuedAt.filter((t) => t < 60_000)).toHaveLength(15);
    expect(issuedAt.filter((t) => t >= 60_000)).toHaveLength(5);
    expect(clock.now()).toBeGreaterThanOrEqual(60_000);
    expect(fetcher.snapshot().totalWaitMs).toBe(60_000);
  });

  it('holds the cap when callers run concurrently', async () => {
    const { fetcher, issuedAt, clock } = setup({ tokensPerMinute: 20, buffer: 5, minIntervalMs: 0 });

    await Promise.all(Array.from({ length: 20 }, () => fetcher.listPriceDrops({})));

    expect(issuedAt).toHaveLength(20);
    expect(clock.slept).toEqual([60_000]);
    expect(fetcher.snapshot()).toMatchObject({ windowStartedAt: 60_000, callsInWindow: 5, totalCalls: 20 });
  });

  it('spaces consecutive calls by the minimum interval', async () => {
    const { fetcher, issuedAt } = setup({ tokensPerMinute: 60, buffer: 0, minIntervalMs: 1000 });

    await fetcher.listPriceDrops({});
    await fetcher.listPriceDrops({});
    await fetcher.listPriceDrops({});

    expect(issuedAt).toEqual([0, 1000, 2000]);
  });

  it('derives the minimum interval from the per-minute rate', async () => {
    const { fetcher, clock } = setup({ tokensPerMinute: 30, buffer: 0 });

    await fetcher.listPriceDrops({});
    await fetcher.listPriceDrops({});

    expect(clock.slept).toEqual([2000]);
  });

  it('does not charge the budget for quota lookups', async () => {
    const { fetcher } = setup({ tokensPerMinute: 20, buffer: 5 });
    await expect(fetcher.remainingQuota()).resolves.toBe(42);
    expect(fetcher.snapshot().totalCalls).toBe(0);
  });

  it('counts a failed call against the budget and surfaces UpstreamError', async () => {
    const clock = createManualClock(0);
    const source = createFakePriceSource({ listings: {}, products: { X1: new Error('socket hang up') } });
    const fetcher = new RateBudgetedFetcher(source, { tokensPerMinute: 20, buffer: 5, clock });

    const err = await fetcher.getProduct('X1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err instanceof UpstreamError && err.message).toBe('getProduct:X1 failed: socket hang up');
    expect(fetcher.snapshot().callsInWindow).toBe(1);
  });
});
