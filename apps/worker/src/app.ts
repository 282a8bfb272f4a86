import { createSupabaseDealStore, getSupabase, type DealStore } from '@dealrelay/db';
import { getServerEnv, type ServerEnv } from '@dealrelay/shared';

import { DedupStore, dedupWindowsFromHours } from './dedup/store.js';
import { FilterChain, filterConfigFromEnv } from './filtering/filters.js';
import { DealPipeline, pipelineConfigFromEnv } from './jobs/dealCycle.js';
import { createHttpPriceSource, getPriceApiConfig } from './pricing/client.js';
import { RateBudgetedFetcher } from './pricing/fetcher.js';
import { PublishGovernor } from './posting/governor.js';
import { createPublisher } from './posting/publisher.js';
import { createCommissionWeights } from './ranking/weights.js';
import { setLogLevel } from './utils/log.js';

/** Build a fully wired pipeline from the environment. */
export function createDealPipeline(env: ServerEnv = getServerEnv(), store?: DealStore): DealPipeline {
  setLogLevel(env.WORKER_LOG_LEVEL);

  const weights = createCommissionWeights();
  const fetcher = new RateBudgetedFetcher(createHttpPriceSource(getPriceApiConfig(env)), {
    tokensPerMinute: env.PRICE_API_TOKENS_PER_MINUTE,
    buffer: env.PRICE_API_TOKEN_BUFFER,
    minIntervalMs: env.PRICE_API_MIN_INTERVAL_MS,
  });

  return new DealPipeline(
    {
      fetcher,
      store: store ?? createSupabaseDealStore(getSupabase(env)),
      publisher: createPublisher(env),
      dedup: new DedupStore(dedupWindowsFromHours(env.DETECT_COOLDOWN_HOURS, env.PUBLISH_COOLDOWN_HOURS)),
      filters: new FilterChain(filterConfigFromEnv(env), weights),
      weights,
      governor: new PublishGovernor({
        maxPerHour: env.MAX_POSTS_PER_HOUR,
        minIntervalMs: env.MIN_POST_INTERVAL_SECONDS * 1000,
      }),
    },
    pipelineConfigFromEnv(env, weights),
  );
}
