import { loadCategoryCatalog, type CategoryCatalog } from '../config/data.js';

export type CommissionWeights = {
  weightOf(categoryId: string): number;
  /** Every category id in the catalog, in catalog order. */
  knownCategoryIds(): string[];
};

export function createCommissionWeights(catalog: CategoryCatalog = loadCategoryCatalog()): CommissionWeights {
  const byId = new Map(catalog.categories.map((c) => [c.id, c]));
  return {
    weightOf: (id) => byId.get(id)?.commissionWeight ?? catalog.defaultCommissionWeight,
    knownCategoryIds: () => catalog.categories.map((c) => c.id),
  };
}

/**
 * Highest-paying categories first. Ties keep the caller's order, so the configured list
 * decides between equally weighted categories.
 */
export function topCategoriesByWeight(categoryIds: string[], weights: CommissionWeights, k: number): string[] {
  const unique = [...new Set(categoryIds)];
  return unique
    .map((id, i) => ({ id, i, w: weights.weightOf(id) }))
    .sort((a, b) => b.w - a.w || a.i - b.i)
    .slice(0, Math.max(0, Math.trunc(k)))
    .map((x) => x.id);
}
