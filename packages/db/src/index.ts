export { getSupabase } from './client.js';
export { createSupabaseDealStore, mergeHistory } from './store.js';
export type { DealStore, PersistedDeal, RecentDealHistory } from './store.js';
