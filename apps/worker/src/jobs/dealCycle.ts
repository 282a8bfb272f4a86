import { randomUUID } from 'node:crypto';

import { parseCsv, type Candidate, type CycleState, type CycleStats, type ServerEnv } from '@dealrelay/shared';
import type { DealStore } from '@dealrelay/db';

import type { DedupStore } from '../dedup/store.js';
import { PersistenceUnavailableError, UpstreamError, errorMessage } from '../errors.js';
import type { FilterChain } from '../filtering/filters.js';
import type { RateBudgetedFetcher } from '../pricing/fetcher.js';
import { formatDealPost, type PostLinkConfig } from '../posting/format.js';
import type { PublishGovernor } from '../posting/governor.js';
import type { Publisher } from '../posting/publisher.js';
import { rank } from '../ranking/rank.js';
import type { CommissionWeights } from '../ranking/weights.js';
import { createLogger } from '../utils/log.js';
import { systemClock, type Clock } from '../utils/time.js';
import { CategoryFanOut, fetchSingleSource, type FanOutConfig, type FetchResult } from './categoryFanOut.js';

const log = createLogger('deal-cycle');

export type PipelineConfig = {
  fanOutEnabled: boolean;
  categoryIds: string[];
  fanOut: FanOutConfig;
  batchSize: number;
  niche: string | null;
  link: PostLinkConfig;
};

export type PipelineDeps = {
  fetcher: Pick<RateBudgetedFetcher, 'listPriceDrops' | 'getProduct' | 'remainingQuota' | 'snapshot'>;
  store: DealStore;
  publisher: Publisher;
  dedup: DedupStore;
  filters: FilterChain;
  weights: CommissionWeights;
  governor: PublishGovernor;
  clock?: Clock;
};

type PendingDeal = { candidate: Candidate; dealId: string };

export function pipelineConfigFromEnv(env: ServerEnv, weights: CommissionWeights): PipelineConfig {
  const configured = parseCsv(env.DEAL_CATEGORIES);
  return {
    fanOutEnabled: env.DEAL_FANOUT_ENABLED,
    categoryIds: configured.length ? configured : weights.knownCategoryIds(),
    fanOut: {
      topCategories: env.DEAL_TOP_CATEGORIES,
      concurrency: env.DEAL_FANOUT_CONCURRENCY,
      productsPerCategory: env.DEAL_PRODUCTS_PER_CATEGORY,
      requestPauseMs: env.DEAL_REQUEST_PAUSE_MS,
      hints: {
        minDiscountPercent: env.MIN_DISCOUNT_PERCENT,
        minPrice: env.MIN_PRODUCT_PRICE,
        maxPrice: env.MAX_PRODUCT_PRICE,
        maxSalesRank: env.MAX_SALES_RANK,
      },
    },
    batchSize: env.DEAL_BATCH_SIZE,
    niche: env.PUBLISH_NICHE ?? null,
    link: { productBaseUrl: env.PRODUCT_BASE_URL, associateTag: env.AFFILIATE_TAG ?? null },
  };
}

function emptyStats(cycleId: string, startedAt: Date): CycleStats {
  return {
    cycleId,
    state: 'FETCHING',
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    elapsedMs: 0,
    categoriesChecked: 0,
    categoriesFailed: 0,
    fetched: 0,
    invalid: 0,
    persisted: 0,
    filteredOut: 0,
    publishConsidered: 0,
    published: 0,
    deferred: 0,
    errors: 0,
    upstreamCalls: 0,
    quotaRemaining: null,
    failureReason: null,
  };
}

/**
 * One deal cycle: fetch, persist-tier filter and store, publish-tier filter, rank, publish.
 *
 * Only an unreachable fetch stage or persistence layer aborts a cycle; everything else is
 * counted and the cycle moves on. Persisted deals that were not published stay pending and are
 * reconsidered by later cycles until their detect window runs out.
 */
export class DealPipeline {
  private readonly clock: Clock;
  private readonly fanOut: CategoryFanOut;
  private readonly pending = new Map<string, PendingDeal>();
  private running = false;

  constructor(
    private readonly deps: PipelineDeps,
    readonly config: PipelineConfig,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.fanOut = new CategoryFanOut(deps.fetcher, deps.weights, config.fanOut, this.clock);
  }

  /** Product ids persisted but not yet published. */
  pendingIds(): string[] {
    return [...this.pending.keys()];
  }

  resetPublishPeriod(): void {
    const now = new Date(this.clock.now());
    this.deps.governor.resetPeriod(now);
    log.info('publish period reset', { at: now.toISOString() });
  }

  async runCycle(): Promise<CycleStats> {
    if (this.running) throw new Error('deal cycle already running');
    this.running = true;
    const startedAt = new Date(this.clock.now());
    const stats = emptyStats(randomUUID(), startedAt);
    const callsBefore = this.deps.fetcher.snapshot().totalCalls;
    try {
      await this.execute(stats, startedAt);
    } catch (e) {
      this.fail(stats, e);
    } finally {
      this.running = false;
    }

    const finishedAt = new Date(this.clock.now());
    stats.finishedAt = finishedAt.toISOString();
    stats.elapsedMs = finishedAt.getTime() - startedAt.getTime();
    stats.upstreamCalls = this.deps.fetcher.snapshot().totalCalls - callsBefore;

    await this.deps.store.recordMetrics(stats).catch((e: unknown) => {
      log.warn('failed to record cycle metrics', { error: errorMessage(e) });
    });

    if (stats.state === 'DONE') log.info('SUCCESS', { ...stats });
    else log.error('FAILURE', { ...stats });
    return stats;
  }

  private fail(stats: CycleStats, e: unknown) {
    stats.failureReason = `${stats.state}: ${errorMessage(e)}`;
    stats.state = 'FAILED';
  }

  private enter(stats: CycleStats, state: CycleState) {
    stats.state = state;
    log.debug(`state ${state}`, { cycleId: stats.cycleId });
  }

  private async execute(stats: CycleStats, now: Date) {
    // FETCHING
    const fetched = await this.fetchCandidates();
    stats.categoriesChecked = fetched.categoriesChecked;
    stats.categoriesFailed = fetched.categoriesFailed;
    if (fetched.categoriesChecked > 0 && fetched.categoriesFailed === fetched.categoriesChecked) {
      throw new UpstreamError(`all ${fetched.categoriesChecked} categories failed`);
    }
    stats.fetched = fetched.candidates.length + fetched.invalid;
    stats.invalid = fetched.invalid;
    stats.filteredOut += fetched.invalid;
    stats.quotaRemaining = await this.deps.fetcher.remainingQuota().catch((e: unknown) => {
      log.warn('quota lookup failed', { error: errorMessage(e) });
      return null;
    });

    // PERSIST_FILTERING
    this.enter(stats, 'PERSIST_FILTERING');
    try {
      await this.deps.store.healthCheck();
    } catch (e) {
      throw new PersistenceUnavailableError(`persistence unreachable: ${errorMessage(e)}`, { cause: e });
    }
    for (const c of fetched.candidates) {
      await this.persistOne(c, now, stats);
    }

    // PUBLISH_FILTERING
    this.enter(stats, 'PUBLISH_FILTERING');
    const eligible = this.publishEligible(now, stats);

    // RANKING
    this.enter(stats, 'RANKING');
    const batch = rank(eligible, this.deps.weights, this.config.batchSize);
    stats.publishConsidered = batch.length;

    // PUBLISHING
    this.enter(stats, 'PUBLISHING');
    let failures = 0;
    for (const c of batch) {
      const outcome = await this.publishOne(c, stats);
      if (outcome === 'blocked') break;
      if (outcome === 'failed') failures += 1;
    }
    stats.deferred = eligible.length - stats.published - failures;

    this.enter(stats, 'DONE');
  }

  private async fetchCandidates(): Promise<FetchResult> {
    if (!this.config.fanOutEnabled) {
      return await fetchSingleSource(
        this.deps.fetcher,
        { ...this.config.fanOut.hints, limit: this.config.fanOut.productsPerCategory },
        this.clock,
      );
    }
    return await this.fanOut.fetchCategories(this.config.categoryIds);
  }

  /** Seed the in-memory cooldowns from storage the first time a product is seen. */
  private async ensureDedupRecord(productId: string, now: Date) {
    if (this.deps.dedup.has(productId)) return;
    const since = new Date(now.getTime() - this.deps.dedup.lookbackMs);
    const found = await this.deps.store.findRecent(productId, since);
    if (!found) return;
    this.deps.dedup.seed({
      productId,
      lastDetectedAt: found.lastDetectedAt,
      lastPublishedAt: found.lastPublishedAt,
      publishedPostId: found.postId,
    });
  }

  private async persistOne(c: Candidate, now: Date, stats: CycleStats) {
    const { dedup, filters, store } = this.deps;
    try {
      await this.ensureDedupRecord(c.productId, now);
    } catch (e) {
      stats.errors += 1;
      log.error('dedup lookup failed', { productId: c.productId, error: errorMessage(e) });
      return;
    }

    if (dedup.isInDetectCooldown(c.productId, now)) {
      stats.filteredOut += 1;
      log.trace('in detect cooldown', { productId: c.productId });
      return;
    }

    const verdict = filters.checkPersistTier(c);
    if (!verdict.ok) {
      stats.filteredOut += 1;
      log.trace('persist tier rejected', { productId: c.productId, reason: verdict.reason });
      return;
    }

    let dealId: string;
    try {
      dealId = await store.saveCandidate(c);
    } catch (e) {
      stats.errors += 1;
      log.error('save failed', { productId: c.productId, error: errorMessage(e) });
      return;
    }

    dedup.recordDetected(c.productId, now);
    stats.persisted += 1;
    this.pending.set(c.productId, { candidate: c, dealId });
  }

  private publishEligible(now: Date, stats: CycleStats): Candidate[] {
    const { dedup, filters } = this.deps;
    const out: Candidate[] = [];
    for (const [productId, p] of this.pending) {
      if (now.getTime() - p.candidate.detectedAt.getTime() >= dedup.windows.detectCooldownMs) {
        this.pending.delete(productId);
        log.debug('pending deal expired', { productId });
        continue;
      }
      if (dedup.isInPublishCooldown(productId, now)) {
        this.pending.delete(productId);
        stats.filteredOut += 1;
        continue;
      }
      const verdict = filters.checkPublishTier(p.candidate);
      if (!verdict.ok) {
        this.pending.delete(productId);
        stats.filteredOut += 1;
        log.trace('publish tier rejected', { productId, reason: verdict.reason });
        continue;
      }
      out.push(p.candidate);
    }
    return out;
  }

  private async publishOne(c: Candidate, stats: CycleStats): Promise<'published' | 'blocked' | 'failed'> {
    const { governor, publisher, dedup, store } = this.deps;
    const p = this.pending.get(c.productId);
    if (!p) return 'failed';

    const text = formatDealPost(c, this.config.link, {
      niche: this.config.niche,
      now: new Date(this.clock.now()),
    });
    const slot = await governor.withPublishSlot(() => publisher.publish(text));

    if (slot.status === 'blocked') {
      log.info('publish budget exhausted, deferring the rest', {
        reason: slot.gate.reason,
        retryAfterMs: slot.gate.retryAfterMs,
      });
      return 'blocked';
    }
    if (slot.status === 'failed') {
      stats.errors += 1;
      log.error('publish failed', { productId: c.productId, error: errorMessage(slot.error) });
      return 'failed';
    }

    const publishedAt = new Date(this.clock.now());
    const postId = slot.value;
    this.pending.delete(c.productId);
    dedup.recordPublished(c.productId, publishedAt, postId);
    stats.published += 1;
    log.info('published', { productId: c.productId, postId, publisher: publisher.name });

    try {
      await store.markPublished({ dealId: p.dealId, postId, publishedAt });
    } catch (e) {
      stats.errors += 1;
      log.error('failed to mark deal published', { productId: c.productId, postId, error: errorMessage(e) });
    }
    return 'published';
  }
}
