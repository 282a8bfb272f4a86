import { z } from 'zod';

// Upstream payloads are loosely typed: every field is optional here and semantic validation
// happens in the worker's normalizer.
const optionalNumber = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number().finite().nullish(),
);

export const rawCandidateSchema = z
  .object({
    productId: z.string().nullish(),
    asin: z.string().nullish(),
    title: z.string().nullish(),
    currentPrice: optionalNumber,
    referencePrice: optionalNumber,
    discountPercent: optionalNumber,
    categoryId: z.union([z.string(), z.number()]).nullish(),
    categoryName: z.string().nullish(),
    brand: z.string().nullish(),
    salesRank: optionalNumber,
    rating: optionalNumber,
    reviewCount: optionalNumber,
    isPrime: z.boolean().nullish(),
    isFba: z.boolean().nullish(),
    imageUrl: z.string().nullish(),
    productUrl: z.string().nullish(),
  })
  .passthrough();

export type RawCandidate = z.infer<typeof rawCandidateSchema>;

export const priceDropsResponseSchema = z.object({
  deals: z.array(z.unknown()).default([]),
});

export const quotaResponseSchema = z.object({
  tokensLeft: z.number().int(),
});

export type PriceDropFilters = {
  categoryId?: string;
  minDiscountPercent?: number;
  minPrice?: number;
  maxPrice?: number;
  maxSalesRank?: number;
  limit?: number;
};
