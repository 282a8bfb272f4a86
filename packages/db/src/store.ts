import type { SupabaseClient } from '@supabase/supabase-js';
import type { Candidate, CycleStats } from '@dealrelay/shared';
import { z } from 'zod';

export type PersistedDeal = {
  id: string;
  productId: string;
  detectedAt: Date;
  publishedAt: Date | null;
  postId: string | null;
};

/**
 * What storage knows about one product inside the lookback window. The latest detection and the
 * latest publication may come from different rows: a re-detected product gets a fresh row while
 * the publication stays on the older one.
 */
export type RecentDealHistory = {
  productId: string;
  lastDetectedAt: Date;
  lastPublishedAt: Date | null;
  postId: string | null;
};

/**
 * Persistence boundary of the deal pipeline. Stores timestamps only; cooldown and budget
 * policy is decided by the worker.
 */
export interface DealStore {
  /** Throws when the store cannot be reached at all. */
  healthCheck(): Promise<void>;
  saveCandidate(candidate: Candidate): Promise<string>;
  findRecent(productId: string, since: Date): Promise<RecentDealHistory | null>;
  markPublished(params: { dealId: string; postId: string; publishedAt: Date }): Promise<void>;
  recordMetrics(stats: CycleStats): Promise<void>;
}

const dealRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  product_id: z.string(),
  detected_at: z.string(),
  published_at: z.string().nullable(),
  post_id: z.string().nullable(),
});

function toPersistedDeal(row: z.infer<typeof dealRowSchema>): PersistedDeal {
  return {
    id: row.id,
    productId: row.product_id,
    detectedAt: new Date(row.detected_at),
    publishedAt: row.published_at ? new Date(row.published_at) : null,
    postId: row.post_id,
  };
}

export function mergeHistory(
  productId: string,
  latestDetected: PersistedDeal | null,
  latestPublished: PersistedDeal | null,
): RecentDealHistory | null {
  if (!latestDetected && !latestPublished) return null;
  const detectedAt = [latestDetected?.detectedAt, latestPublished?.detectedAt].filter((d): d is Date => d != null);
  return {
    productId,
    lastDetectedAt: new Date(Math.max(...detectedAt.map((d) => d.getTime()))),
    lastPublishedAt: latestPublished?.publishedAt ?? null,
    postId: latestPublished?.postId ?? null,
  };
}

function fail(op: string, error: { message: string; code?: string }): never {
  throw new Error(`deal_store_${op}_failed${error.code ? `:${error.code}` : ''}: ${error.message}`);
}

export function createSupabaseDealStore(client: SupabaseClient): DealStore {
  return {
    async healthCheck() {
      const { error } = await client.from('deals').select('id', { head: true, count: 'exact' }).limit(1);
      if (error) fail('health', error);
    },

    async saveCandidate(c) {
      const { data, error } = await client
        .from('deals')
        .insert({
          product_id: c.productId,
          title: c.title,
          current_price: c.currentPrice,
          reference_price: c.referencePrice,
          discount_percent: c.discountPercent,
          savings_amount: c.referencePrice != null ? c.referencePrice - c.currentPrice : null,
          category_id: c.categoryId,
          category_name: c.categoryName,
          brand: c.brand,
          popularity_rank: c.popularityRank,
          rating: c.rating,
          review_count: c.reviewCount,
          is_prime: c.isPrime,
          is_fulfilled_by_platform: c.isFulfilledByPlatform,
          image_url: c.imageUrl,
          product_url: c.productUrl,
          detected_at: c.detectedAt.toISOString(),
        })
        .select('id')
        .single();
      if (error) fail('save', error);
      const parsed = z.object({ id: z.union([z.string(), z.number()]).transform(String) }).safeParse(data);
      if (!parsed.success) throw new Error('deal_store_save_failed: insert returned no id');
      return parsed.data.id;
    },

    async findRecent(productId, since) {
      const cutoff = since.toISOString();
      const columns = 'id, product_id, detected_at, published_at, post_id';
      const [detected, published] = await Promise.all([
        client
          .from('deals')
          .select(columns)
          .eq('product_id', productId)
          .gte('detected_at', cutoff)
          .order('detected_at', { ascending: false })
          .limit(1),
        client
          .from('deals')
          .select(columns)
          .eq('product_id', productId)
          .gte('published_at', cutoff)
          .order('published_at', { ascending: false })
          .limit(1),
      ]);
      if (detected.error) fail('find', detected.error);
      if (published.error) fail('find', published.error);
      const latestDetected = z.array(dealRowSchema).parse(detected.data ?? [])[0];
      const latestPublished = z.array(dealRowSchema).parse(published.data ?? [])[0];
      return mergeHistory(
        productId,
        latestDetected ? toPersistedDeal(latestDetected) : null,
        latestPublished ? toPersistedDeal(latestPublished) : null,
      );
    },

    async markPublished({ dealId, postId, publishedAt }) {
      const { error } = await client
        .from('deals')
        .update({ published_at: publishedAt.toISOString(), post_id: postId })
        .eq('id', dealId);
      if (error) fail('mark_published', error);
    },

    async recordMetrics(stats) {
      const { error } = await client.from('cycle_metrics').insert({
        cycle_id: stats.cycleId,
        state: stats.state,
        started_at: stats.startedAt,
        finished_at: stats.finishedAt,
        elapsed_ms: stats.elapsedMs,
        categories_checked: stats.categoriesChecked,
        categories_failed: stats.categoriesFailed,
        fetched: stats.fetched,
        invalid: stats.invalid,
        persisted: stats.persisted,
        filtered_out: stats.filteredOut,
        publish_considered: stats.publishConsidered,
        published: stats.published,
        deferred: stats.deferred,
        errors: stats.errors,
        upstream_calls: stats.upstreamCalls,
        quota_remaining: stats.quotaRemaining,
        failure_reason: stats.failureReason,
      });
      if (error) fail('metrics', error);
    },
  };
}
