import type { Candidate, PriceDropFilters } from '@dealrelay/shared';

import { UpstreamError, errorMessage } from '../errors.js';
import { mergeRaw, normalizeCandidate } from '../pricing/normalize.js';
import type { RateBudgetedFetcher } from '../pricing/fetcher.js';
import { topCategoriesByWeight, type CommissionWeights } from '../ranking/weights.js';
import { createLogger } from '../utils/log.js';
import { runPool } from '../utils/pool.js';
import { systemClock, type Clock } from '../utils/time.js';

const log = createLogger('fanout');

export type BudgetedSource = Pick<RateBudgetedFetcher, 'listPriceDrops' | 'getProduct'>;

export type FanOutConfig = {
  topCategories: number;
  concurrency: number;
  productsPerCategory: number;
  /** Pause between per-product lookups inside one category. */
  requestPauseMs: number;
  /** Query hints passed with every listing call. */
  hints: Omit<PriceDropFilters, 'categoryId' | 'limit'>;
};

export type FetchResult = {
  candidates: Candidate[];
  invalid: number;
  categoriesChecked: number;
  categoriesFailed: number;
};

type CategoryResult = { candidates: Candidate[]; invalid: number };

function dedupeByProductId(list: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  const out: Candidate[] = [];
  for (const c of list) {
    if (seen.has(c.productId)) continue;
    seen.add(c.productId);
    out.push(c);
  }
  return out;
}

function rawProductId(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const id = 'productId' in raw && raw.productId != null ? raw.productId : 'asin' in raw ? raw.asin : null;
  return typeof id === 'string' && id.trim() ? id.trim() : null;
}

/**
 * Pulls price drops for the highest-weighted categories over a fixed worker pool. One
 * category's upstream failure is logged and contributes nothing; siblings carry on.
 */
export class CategoryFanOut {
  private readonly clock: Clock;

  constructor(
    private readonly source: BudgetedSource,
    private readonly weights: CommissionWeights,
    private readonly config: FanOutConfig,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  selectCategories(categoryIds: string[]): string[] {
    return topCategoriesByWeight(categoryIds, this.weights, this.config.topCategories);
  }

  async fetchCategories(categoryIds: string[], concurrencyLimit = this.config.concurrency): Promise<FetchResult> {
    const selected = this.selectCategories(categoryIds);
    log.info('fanning out', { categories: selected, concurrency: concurrencyLimit });

    const settled = await runPool(selected, concurrencyLimit, (categoryId) => this.fetchCategory(categoryId));

    const merged: Candidate[] = [];
    let invalid = 0;
    let failed = 0;
    settled.forEach((r, i) => {
      if (r.ok) {
        merged.push(...r.value.candidates);
        invalid += r.value.invalid;
        return;
      }
      failed += 1;
      log.error('category failed', { categoryId: selected[i], error: errorMessage(r.error) });
    });

    return {
      candidates: dedupeByProductId(merged),
      invalid,
      categoriesChecked: selected.length,
      categoriesFailed: failed,
    };
  }

  private async fetchCategory(categoryId: string): Promise<CategoryResult> {
    const listing = await this.source.listPriceDrops({
      ...this.config.hints,
      categoryId,
      limit: this.config.productsPerCategory,
    });
    const entries = listing.slice(0, this.config.productsPerCategory);

    const candidates: Candidate[] = [];
    let invalid = 0;
    for (const [i, entry] of entries.entries()) {
      if (i > 0 && this.config.requestPauseMs > 0) await this.clock.sleep(this.config.requestPauseMs);

      const raw = await this.withDetail(categoryId, entry);
      const res = normalizeCandidate(raw, { categoryId, detectedAt: new Date(this.clock.now()) });
      if (res.ok) candidates.push(res.candidate);
      else {
        invalid += 1;
        log.debug('invalid record', { categoryId, field: res.error.field, error: res.error.message });
      }
    }

    log.info('category done', { categoryId, listed: entries.length, valid: candidates.length, invalid });
    return { candidates, invalid };
  }

  private async withDetail(categoryId: string, entry: unknown): Promise<unknown> {
    const productId = rawProductId(entry);
    if (!productId) return entry;
    try {
      const detail = await this.source.getProduct(productId);
      return detail == null ? entry : mergeRaw(entry, detail);
    } catch (e) {
      if (!(e instanceof UpstreamError)) throw e;
      log.warn('product lookup failed, using listing data', { categoryId, productId, error: e.message });
      return entry;
    }
  }
}

/** One listing call with no category split. An upstream failure propagates to the caller. */
export async function fetchSingleSource(
  source: BudgetedSource,
  filters: PriceDropFilters,
  clock: Clock = systemClock,
): Promise<FetchResult> {
  const listing = await source.listPriceDrops(filters);
  const candidates: Candidate[] = [];
  let invalid = 0;
  const detectedAt = new Date(clock.now());
  for (const entry of listing) {
    const res = normalizeCandidate(entry, { categoryId: filters.categoryId ?? null, detectedAt });
    if (res.ok) candidates.push(res.candidate);
    else invalid += 1;
  }
  return { candidates: dedupeByProductId(candidates), invalid, categoriesChecked: 0, categoriesFailed: 0 };
}
