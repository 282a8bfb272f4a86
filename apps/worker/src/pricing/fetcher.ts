import type { PriceDropFilters } from '@dealrelay/shared';

import { UpstreamError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/log.js';
import { Mutex } from '../utils/mutex.js';
import { MINUTE_MS, systemClock, type Clock } from '../utils/time.js';
import type { PriceSource } from './client.js';

const log = createLogger('rate-budget');

export type RateBudgetOptions = {
  tokensPerMinute: number;
  /** Stop this many calls short of the per-minute cap. */
  buffer: number;
  /** Minimum spacing between two consecutive calls. Defaults to 60000 / tokensPerMinute. */
  minIntervalMs?: number;
  windowMs?: number;
  clock?: Clock;
};

export type RateLedger = {
  windowStartedAt: number | null;
  callsInWindow: number;
  lastCallAt: number | null;
  totalCalls: number;
  totalWaitMs: number;
};

/**
 * Price-source wrapper that enforces the upstream token budget: a rolling cap of
 * `tokensPerMinute - buffer` calls per window plus a minimum spacing between calls.
 *
 * Over budget it waits rather than failing. The ledger is shared by every caller and
 * guarded by one lock, so concurrent fan-out workers draw from the same budget.
 */
export class RateBudgetedFetcher {
  private readonly lock = new Mutex();
  private readonly clock: Clock;
  private readonly cap: number;
  private readonly minIntervalMs: number;
  private readonly windowMs: number;
  private readonly ledger: RateLedger = {
    windowStartedAt: null,
    callsInWindow: 0,
    lastCallAt: null,
    totalCalls: 0,
    totalWaitMs: 0,
  };

  constructor(
    private readonly source: PriceSource,
    opts: RateBudgetOptions,
  ) {
    const tpm = Math.max(1, Math.trunc(opts.tokensPerMinute));
    this.cap = Math.max(1, tpm - Math.max(0, Math.trunc(opts.buffer)));
    this.windowMs = opts.windowMs ?? MINUTE_MS;
    this.minIntervalMs = Math.max(0, opts.minIntervalMs ?? Math.ceil(this.windowMs / tpm));
    this.clock = opts.clock ?? systemClock;
  }

  get callsPerWindow() {
    return this.cap;
  }

  snapshot(): RateLedger {
    return { ...this.ledger };
  }

  /**
   * Reserve one call slot, waiting as long as the budget requires. Returns the time waited.
   * The slot is counted whether or not the call that follows returns data.
   */
  async acquire(): Promise<number> {
    return await this.lock.runExclusive(async () => {
      const l = this.ledger;
      let waited = 0;
      let now = this.clock.now();

      if (l.windowStartedAt == null || now - l.windowStartedAt >= this.windowMs) {
        l.windowStartedAt = now;
        l.callsInWindow = 0;
      }

      if (l.callsInWindow >= this.cap) {
        const wait = Math.max(0, l.windowStartedAt + this.windowMs - now);
        log.info('window cap reached, waiting for next window', { waitMs: wait, calls: l.callsInWindow, cap: this.cap });
        await this.clock.sleep(wait);
        waited += wait;
        l.windowStartedAt = this.clock.now();
        l.callsInWindow = 0;
      }

      now = this.clock.now();
      if (l.lastCallAt != null) {
        const since = now - l.lastCallAt;
        if (since < this.minIntervalMs) {
          const wait = this.minIntervalMs - since;
          await this.clock.sleep(wait);
          waited += wait;
        }
      }

      l.lastCallAt = this.clock.now();
      l.callsInWindow += 1;
      l.totalCalls += 1;
      l.totalWaitMs += waited;
      return waited;
    });
  }

  /** Run one upstream request under the budget. Any failure surfaces as UpstreamError. */
  async fetch<T>(label: string, request: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await request();
    } catch (e) {
      if (e instanceof UpstreamError) throw e;
      throw new UpstreamError(`${label} failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  listPriceDrops(filters: PriceDropFilters): Promise<unknown[]> {
    return this.fetch('listPriceDrops', () => this.source.listPriceDrops(filters));
  }

  getProduct(productId: string): Promise<unknown | null> {
    return this.fetch(`getProduct:${productId}`, () => this.source.getProduct(productId));
  }

  /** Quota lookups are free upstream and do not draw from the budget. */
  async remainingQuota(): Promise<number> {
    try {
      return await this.source.remainingQuota();
    } catch (e) {
      if (e instanceof UpstreamError) throw e;
      throw new UpstreamError(`remainingQuota failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
