import type { DedupRecord } from '@dealrelay/shared';

import { hoursToMs } from '../utils/time.js';

export type DedupWindows = {
  detectCooldownMs: number;
  publishCooldownMs: number;
};

export function dedupWindowsFromHours(detectHours: number, publishHours: number): DedupWindows {
  return { detectCooldownMs: hoursToMs(detectHours), publishCooldownMs: hoursToMs(publishHours) };
}

/**
 * Per-product detect/publish timestamps with two independent cooldown windows.
 *
 * Records are never deleted; whether a window is still active is computed on each lookup.
 * Every method is synchronous, so each check or update is atomic with respect to other tasks.
 */
export class DedupStore {
  private readonly records = new Map<string, DedupRecord>();

  constructor(readonly windows: DedupWindows) {}

  has(productId: string): boolean {
    return this.records.has(productId);
  }

  get(productId: string): DedupRecord | null {
    const r = this.records.get(productId);
    return r ? { ...r } : null;
  }

  isInDetectCooldown(productId: string, now: Date): boolean {
    const r = this.records.get(productId);
    if (!r) return false;
    return now.getTime() - r.lastDetectedAt.getTime() < this.windows.detectCooldownMs;
  }

  isInPublishCooldown(productId: string, now: Date): boolean {
    const r = this.records.get(productId);
    if (!r?.lastPublishedAt) return false;
    return now.getTime() - r.lastPublishedAt.getTime() < this.windows.publishCooldownMs;
  }

  recordDetected(productId: string, now: Date): void {
    const r = this.records.get(productId);
    if (r) {
      r.lastDetectedAt = now;
      return;
    }
    this.records.set(productId, { productId, lastDetectedAt: now, lastPublishedAt: null, publishedPostId: null });
  }

  recordPublished(productId: string, now: Date, postId: string): void {
    const r = this.records.get(productId);
    if (r) {
      r.lastPublishedAt = now;
      r.publishedPostId = postId;
      return;
    }
    this.records.set(productId, { productId, lastDetectedAt: now, lastPublishedAt: now, publishedPostId: postId });
  }

  /** Load a record found in persistent storage. Newer in-memory timestamps win. */
  seed(record: DedupRecord): void {
    const r = this.records.get(record.productId);
    if (!r) {
      this.records.set(record.productId, { ...record });
      return;
    }
    if (record.lastDetectedAt > r.lastDetectedAt) r.lastDetectedAt = record.lastDetectedAt;
    if (record.lastPublishedAt && (!r.lastPublishedAt || record.lastPublishedAt > r.lastPublishedAt)) {
      r.lastPublishedAt = record.lastPublishedAt;
      r.publishedPostId = record.publishedPostId;
    }
  }

  /** Longest of the two windows; anything older cannot affect a cooldown decision. */
  get lookbackMs(): number {
    return Math.max(this.windows.detectCooldownMs, this.windows.publishCooldownMs);
  }

  get size(): number {
    return this.records.size;
  }
}
