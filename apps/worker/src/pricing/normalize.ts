import { rawCandidateSchema, type Candidate, type RawCandidate } from '@dealrelay/shared';

import { ValidationError } from '../errors.js';

export type NormalizeResult = { ok: true; candidate: Candidate } | { ok: false; error: ValidationError };

function normalizeWhitespace(s: string) {
  return s.replace(/\s+/g, ' ').trim();
}

function positiveOrNull(n: number | null | undefined): number | null {
  return n != null && Number.isFinite(n) && n > 0 ? n : null;
}

function nonNegativeOrNull(n: number | null | undefined): number | null {
  return n != null && Number.isFinite(n) && n >= 0 ? n : null;
}

function roundCents(n: number) {
  return Math.round(n * 100) / 100;
}

/**
 * Discount from the two prices, clamped at 0. Upstream discount figures are never trusted:
 * a missing or non-positive reference yields 0.
 */
export function computeDiscountPercent(currentPrice: number, referencePrice: number | null | undefined): number {
  if (referencePrice == null || !Number.isFinite(referencePrice) || referencePrice <= 0) return 0;
  if (!Number.isFinite(currentPrice)) return 0;
  return Math.max(0, ((referencePrice - currentPrice) / referencePrice) * 100);
}

/**
 * Upstream rating scale varies (0-5 or 10-50). Anything above 5 is assumed to be the x10 scale.
 * The price source reports 0 for a product nobody has rated (its lowest real rating is 10, one
 * star), so 0 and negatives become null and skip the rating floor.
 */
function normalizeRating(raw: number | null | undefined): number | null {
  const r = positiveOrNull(raw);
  if (r == null) return null;
  const scaled = r > 5 ? r / 10 : r;
  return scaled > 5 ? null : scaled;
}

function normalizeRaw(raw: RawCandidate, fallbackCategoryId: string | null, detectedAt: Date): NormalizeResult {
  const productId = (raw.productId ?? raw.asin ?? '').trim();
  if (!productId) return { ok: false, error: new ValidationError('productId', 'missing product identifier') };

  const title = normalizeWhitespace(raw.title ?? '');
  if (!title) return { ok: false, error: new ValidationError('title', `missing title for ${productId}`) };

  const currentPrice = positiveOrNull(raw.currentPrice);
  if (currentPrice == null) {
    return { ok: false, error: new ValidationError('currentPrice', `missing or non-positive price for ${productId}`) };
  }

  const categoryId = raw.categoryId != null ? String(raw.categoryId).trim() : (fallbackCategoryId ?? '');
  if (!categoryId) return { ok: false, error: new ValidationError('categoryId', `missing category for ${productId}`) };

  const referencePrice = positiveOrNull(raw.referencePrice);
  const reviewCount = nonNegativeOrNull(raw.reviewCount);

  return {
    ok: true,
    candidate: {
      productId,
      title,
      currentPrice: roundCents(currentPrice),
      referencePrice: referencePrice != null ? roundCents(referencePrice) : null,
      discountPercent: computeDiscountPercent(currentPrice, referencePrice),
      categoryId,
      categoryName: raw.categoryName?.trim() || null,
      brand: raw.brand?.trim() || null,
      popularityRank: positiveOrNull(raw.salesRank),
      rating: normalizeRating(raw.rating),
      reviewCount: reviewCount != null ? Math.trunc(reviewCount) : null,
      isPrime: raw.isPrime ?? null,
      isFulfilledByPlatform: raw.isFba ?? null,
      imageUrl: raw.imageUrl?.trim() || null,
      productUrl: raw.productUrl?.trim() || null,
      detectedAt,
    },
  };
}

/**
 * Adapter from an untyped upstream record to a Candidate. Produces either a fully valid
 * Candidate or a ValidationError.
 */
export function normalizeCandidate(
  input: unknown,
  opts: { categoryId?: string | null; detectedAt: Date },
): NormalizeResult {
  const parsed = rawCandidateSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'payload';
    return { ok: false, error: new ValidationError(field, issue?.message ?? 'invalid payload') };
  }
  return normalizeRaw(parsed.data, opts.categoryId ?? null, opts.detectedAt);
}

function asRecord(v: unknown): Record<string, unknown> | null {
  if (typeof v !== 'object' || v === null || Array.isArray(v)) return null;
  return Object.fromEntries(Object.entries(v));
}

/**
 * Overlay a product lookup onto a listing entry: the listing keeps its own values and only
 * missing fields are filled from the lookup.
 */
export function mergeRaw(listing: unknown, detail: unknown): unknown {
  const base = asRecord(listing);
  const extra = asRecord(detail);
  if (!base || !extra) return listing;
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(extra)) {
    if (v == null || k === 'productId' || k === 'asin') continue;
    if (out[k] == null) out[k] = v;
  }
  return out;
}
