export * from './affiliate.js';
export * from './env.js';
export * from './ingestion.js';
export type * from './types.js';
