import type { Candidate } from '@dealrelay/shared';

import { loadNiches, type NicheLexicon } from '../config/data.js';

export type NicheName = 'beauty';

export type NicheMatch = { matched: true; by: 'category' | 'keyword' | 'brand' } | { matched: false };

export function getNicheLexicon(name: NicheName): NicheLexicon {
  const lexicon = loadNiches()[name];
  if (!lexicon) throw new Error(`Unknown niche: ${name}`);
  return lexicon;
}

/** Category name OR title keyword OR brand; all case-insensitive substring matches. */
export function matchNiche(c: Candidate, lexicon: NicheLexicon): NicheMatch {
  const category = (c.categoryName ?? '').toLowerCase();
  if (category && lexicon.categories.some((term) => category.includes(term.toLowerCase()))) {
    return { matched: true, by: 'category' };
  }

  const title = c.title.toLowerCase();
  if (lexicon.keywords.some((kw) => title.includes(kw.toLowerCase()))) {
    return { matched: true, by: 'keyword' };
  }

  const brand = (c.brand ?? '').toLowerCase();
  if (brand && lexicon.brands.some((b) => brand.includes(b.toLowerCase()))) {
    return { matched: true, by: 'brand' };
  }

  return { matched: false };
}
