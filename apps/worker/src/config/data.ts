import { readFileSync } from 'node:fs';

import { z } from 'zod';

const categoriesFileSchema = z.object({
  defaultCommissionWeight: z.number().positive(),
  categories: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      commissionWeight: z.number().positive(),
    }),
  ),
});

const nicheLexiconSchema = z.object({
  categories: z.array(z.string().min(1)),
  keywords: z.array(z.string().min(1)),
  brands: z.array(z.string().min(1)),
});

const nichesFileSchema = z.record(nicheLexiconSchema);
const restrictedKeywordsSchema = z.array(z.string().min(1));

export type CategoryCatalog = z.infer<typeof categoriesFileSchema>;
export type NicheLexicon = z.infer<typeof nicheLexiconSchema>;

function readDataFile<T>(name: string, schema: z.ZodType<T>): T {
  const raw = readFileSync(new URL(`../../data/${name}`, import.meta.url), 'utf8');
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid data file ${name}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

let categories: CategoryCatalog | null = null;
let niches: Record<string, NicheLexicon> | null = null;
let restricted: string[] | null = null;

export function loadCategoryCatalog(): CategoryCatalog {
  categories ??= readDataFile('categories.json', categoriesFileSchema);
  return categories;
}

export function loadNiches(): Record<string, NicheLexicon> {
  niches ??= readDataFile('niches.json', nichesFileSchema);
  return niches;
}

export function loadRestrictedKeywords(): string[] {
  restricted ??= readDataFile('restricted-keywords.json', restrictedKeywordsSchema).map((k) => k.toLowerCase());
  return restricted;
}
