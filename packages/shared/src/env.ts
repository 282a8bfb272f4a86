import { z } from 'zod';

function formatZodError(e: z.ZodError): string {
  const flat = e.flatten();
  const lines = Object.entries(flat.fieldErrors).flatMap(([k, v]) =>
    (v ?? []).map((msg) => `${k}: ${msg}`),
  );
  const formErrors = flat.formErrors.map((msg) => `env: ${msg}`);
  return [...lines, ...formErrors].join('\n');
}

function emptyToUndefined(v: unknown): unknown {
  return typeof v === 'string' && v.trim() === '' ? undefined : v;
}

const boolFlag = (fallback: boolean) =>
  z.preprocess((v) => {
    const raw = emptyToUndefined(v);
    if (raw === undefined) return fallback;
    if (typeof raw === 'boolean') return raw;
    return String(raw).trim().toLowerCase() === 'true';
  }, z.boolean());

const num = (fallback: number) => z.preprocess(emptyToUndefined, z.coerce.number().min(0).default(fallback));
const int = (fallback: number, min = 0) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(fallback));

const serverEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Worker
  WORKER_LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
    .default('info'),

  // Price-history source
  PRICE_API_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  PRICE_API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  PRICE_API_TOKENS_PER_MINUTE: int(1200, 1),
  PRICE_API_TOKEN_BUFFER: int(10),
  PRICE_API_MIN_INTERVAL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).optional()),

  // Category fan-out
  DEAL_FANOUT_ENABLED: boolFlag(true),
  DEAL_CATEGORIES: z.preprocess(emptyToUndefined, z.string().optional()),
  DEAL_TOP_CATEGORIES: int(5, 1),
  DEAL_FANOUT_CONCURRENCY: int(3, 1),
  DEAL_PRODUCTS_PER_CATEGORY: int(20, 1),
  DEAL_REQUEST_PAUSE_MS: int(100),

  // Persist tier
  MIN_DISCOUNT_PERCENT: num(15),
  MIN_PRICE_DROP: num(5),
  MIN_PRODUCT_PRICE: num(15),
  MAX_PRODUCT_PRICE: num(300),
  MIN_REVIEW_RATING: num(3.5),
  MIN_REVIEW_COUNT: int(10),
  MAX_SALES_RANK: int(100_000, 1),
  REQUIRE_PRIME: boolFlag(false),
  REQUIRE_FULFILLED_BY_PLATFORM: boolFlag(false),

  // Publish tier (niche)
  PUBLISH_NICHE: z.preprocess(emptyToUndefined, z.enum(['beauty']).optional()),
  NICHE_MIN_DISCOUNT: num(20),
  NICHE_MIN_PRICE: num(20),
  NICHE_MAX_PRICE: num(200),
  NICHE_MIN_RATING: num(4),
  NICHE_MIN_REVIEWS: int(50),
  NICHE_SAMPLE_PRICE_FLOOR: num(15),

  // Dedup windows
  DETECT_COOLDOWN_HOURS: num(24),
  PUBLISH_COOLDOWN_HOURS: num(24),

  // Ranking + publish governor
  DEAL_BATCH_SIZE: int(50, 1),
  MAX_POSTS_PER_HOUR: int(20, 1),
  MIN_POST_INTERVAL_SECONDS: int(300),

  // Schedules (UTC cron)
  DEAL_CYCLE_CRON: z.preprocess(emptyToUndefined, z.string().default('*/15 * * * *')),
  PUBLISH_RESET_CRON: z.preprocess(emptyToUndefined, z.string().default('0 0 * * *')),

  // Publishing (fail-closed)
  PUBLISHING_ENABLED: boolFlag(false),
  X_API_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default('https://api.twitter.com')),
  X_USER_ACCESS_TOKEN: z.preprocess(emptyToUndefined, z.string().optional()),
  AFFILIATE_TAG: z.preprocess(emptyToUndefined, z.string().optional()),
  PRODUCT_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default('https://www.amazon.com/dp/')),

  // Persistence
  SUPABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export function getServerEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid server environment variables:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function parseCsv(raw: string | undefined | null): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
