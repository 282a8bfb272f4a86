import {
  getServerEnv,
  priceDropsResponseSchema,
  quotaResponseSchema,
  type PriceDropFilters,
  type ServerEnv,
} from '@dealrelay/shared';

import { UpstreamError } from '../errors.js';

/**
 * Capability interface of the price-history service. Returns raw, unvalidated records; all
 * semantic validation happens in the normalizer.
 */
export interface PriceSource {
  listPriceDrops(filters: PriceDropFilters): Promise<unknown[]>;
  getProduct(productId: string): Promise<unknown | null>;
  remainingQuota(): Promise<number>;
}

type PriceApiConfig = {
  baseUrl: string;
  apiKey: string;
};

export function getPriceApiConfig(env: ServerEnv = getServerEnv()): PriceApiConfig {
  const baseUrl = env.PRICE_API_BASE_URL ?? '';
  const apiKey = env.PRICE_API_KEY ?? '';
  if (!baseUrl || !apiKey) {
    throw new Error('Missing price API env vars. Set PRICE_API_BASE_URL, PRICE_API_KEY.');
  }
  return { baseUrl: baseUrl.replace(/\/+$/, ''), apiKey };
}

function toQuery(filters: PriceDropFilters): string {
  const qs = new URLSearchParams();
  for (const [k, v] of Object.entries(filters)) {
    if (v == null || v === '') continue;
    qs.set(k, String(v));
  }
  const s = qs.toString();
  return s ? `?${s}` : '';
}

/**
 * Single request, no retries: a failed call surfaces as UpstreamError and the next scheduled
 * cycle is the retry. 404 maps to `null` (genuine absence).
 */
async function getJson(cfg: PriceApiConfig, path: string): Promise<unknown | null> {
  const url = `${cfg.baseUrl}${path}`;
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'GET',
      headers: { accept: 'application/json', authorization: `Bearer ${cfg.apiKey}` },
    });
  } catch (e) {
    throw new UpstreamError(`price API unreachable: ${path}`, { cause: e });
  }

  if (res.status === 404) return null;
  const text = await res.text().catch(() => '');
  if (!res.ok) {
    throw new UpstreamError(`price API HTTP ${res.status}: ${text.slice(0, 300)}`, { status: res.status });
  }

  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (e) {
    throw new UpstreamError(`price API returned invalid JSON for ${path}`, { status: res.status, cause: e });
  }
}

export function createHttpPriceSource(cfg: PriceApiConfig = getPriceApiConfig()): PriceSource {
  return {
    async listPriceDrops(filters) {
      const json = await getJson(cfg, `/v1/price-drops${toQuery(filters)}`);
      if (json == null) return [];
      const parsed = priceDropsResponseSchema.safeParse(json);
      if (!parsed.success) throw new UpstreamError('price API: unexpected price-drops payload');
      return parsed.data.deals;
    },

    async getProduct(productId) {
      return await getJson(cfg, `/v1/products/${encodeURIComponent(productId)}`);
    },

    async remainingQuota() {
      const json = await getJson(cfg, '/v1/quota');
      const parsed = quotaResponseSchema.safeParse(json);
      if (!parsed.success) throw new UpstreamError('price API: unexpected quota payload');
      return parsed.data.tokensLeft;
    },
  };
}
